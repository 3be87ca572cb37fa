import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import type { z } from 'zod';

import {
  type ChildResource,
  type GatewayCallOptions,
  GatewayError,
  type MutationPayload,
  type ParentResource,
  type ResourceGateway,
  type Result,
  type TreeId,
  err,
  formatError,
  ok,
} from '@record-tree/core';

import type { Logger } from '../logging/logger';
import {
  type CloudflareDnsRecord,
  type CloudflareResultInfo,
  type CloudflareZone,
  deletedRecordEnvelopeSchema,
  errorEnvelopeSchema,
  recordEnvelopeSchema,
  recordListEnvelopeSchema,
  zoneListEnvelopeSchema,
} from './cloudflare-schemas';

export interface CloudflareGatewayOptions {
  baseUrl: string;
  token: string;
  logger: Logger;
  /** Per request; 0 disables the timeout. */
  timeoutMs?: number;
  zonesPerPage?: number;
  recordsPerPage?: number;
  userAgent?: string;
}

interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | number | undefined>;
  signal?: AbortSignal;
}

type Envelope<T> = {
  success: boolean;
  errors: { code?: string | number; message: string }[];
  result?: T | null;
  result_info?: CloudflareResultInfo | null;
};

const DEFAULT_ZONES_PER_PAGE = 50;
const DEFAULT_RECORDS_PER_PAGE = 100;

function combineSignals(primary: AbortController, external?: AbortSignal): void {
  if (!external) {
    return;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return;
  }
  external.addEventListener(
    'abort',
    () => {
      primary.abort(external.reason);
    },
    { once: true },
  );
}

function toChildResource(parentId: TreeId, record: CloudflareDnsRecord): ChildResource {
  return {
    id: record.id,
    parentId: record.zone_id ?? parentId,
    name: record.name,
    type: record.type,
    content: record.content,
    ttl: record.ttl,
    proxied: record.proxied,
    priority: record.priority,
    comment: record.comment ?? null,
  };
}

function toRequestBody(payload: MutationPayload): Record<string, unknown> {
  const body: Record<string, unknown> = {
    type: payload.type,
    name: payload.name,
    content: payload.content,
    ttl: payload.ttl,
    proxied: payload.proxied,
  };
  if (payload.priority !== undefined) {
    body.priority = payload.priority;
  }
  return body;
}

/** ResourceGateway over the Cloudflare v4 REST API: zones are parents, DNS records children. */
export class CloudflareGateway implements ResourceGateway {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly zonesPerPage: number;
  private readonly recordsPerPage: number;
  private readonly userAgent?: string;

  constructor(options: CloudflareGatewayOptions) {
    if (!options.baseUrl) {
      throw new Error('CloudflareGateway requires a baseUrl');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.logger = options.logger.child({ component: 'gateway' });
    this.timeoutMs = options.timeoutMs ?? 0;
    this.zonesPerPage = options.zonesPerPage ?? DEFAULT_ZONES_PER_PAGE;
    this.recordsPerPage = options.recordsPerPage ?? DEFAULT_RECORDS_PER_PAGE;
    this.userAgent = options.userAgent;
  }

  async listParents(options: GatewayCallOptions = {}): Promise<Result<ParentResource[], GatewayError>> {
    return this.settle(async () => {
      const zones = await this.collectPages<CloudflareZone>(
        '/zones',
        zoneListEnvelopeSchema,
        this.zonesPerPage,
        options.signal,
      );
      return zones.map((zone) => ({ id: zone.id, name: zone.name }));
    });
  }

  async listChildren(
    parentId: TreeId,
    options: GatewayCallOptions = {},
  ): Promise<Result<ChildResource[], GatewayError>> {
    return this.settle(async () => {
      const records = await this.collectPages<CloudflareDnsRecord>(
        `/zones/${encodeURIComponent(parentId)}/dns_records`,
        recordListEnvelopeSchema,
        this.recordsPerPage,
        options.signal,
      );
      return records.map((record) => toChildResource(parentId, record));
    });
  }

  async createChild(
    parentId: TreeId,
    payload: MutationPayload,
    options: GatewayCallOptions = {},
  ): Promise<Result<ChildResource, GatewayError>> {
    return this.settle(async () => {
      const envelope = await this.request<CloudflareDnsRecord>(
        'POST',
        `/zones/${encodeURIComponent(parentId)}/dns_records`,
        recordEnvelopeSchema,
        { body: toRequestBody(payload), signal: options.signal },
      );
      return toChildResource(parentId, this.requireResult(envelope));
    });
  }

  async updateChild(
    parentId: TreeId,
    childId: TreeId,
    payload: MutationPayload,
    options: GatewayCallOptions = {},
  ): Promise<Result<ChildResource, GatewayError>> {
    return this.settle(async () => {
      const envelope = await this.request<CloudflareDnsRecord>(
        'PUT',
        `/zones/${encodeURIComponent(parentId)}/dns_records/${encodeURIComponent(childId)}`,
        recordEnvelopeSchema,
        { body: toRequestBody(payload), signal: options.signal },
      );
      return toChildResource(parentId, this.requireResult(envelope));
    });
  }

  async deleteChild(
    parentId: TreeId,
    childId: TreeId,
    options: GatewayCallOptions = {},
  ): Promise<Result<void, GatewayError>> {
    return this.settle(async () => {
      await this.request<{ id: string }>(
        'DELETE',
        `/zones/${encodeURIComponent(parentId)}/dns_records/${encodeURIComponent(childId)}`,
        deletedRecordEnvelopeSchema,
        { signal: options.signal },
      );
    });
  }

  private async settle<T>(operation: () => Promise<T>): Promise<Result<T, GatewayError>> {
    try {
      return ok(await operation());
    } catch (error) {
      if (error instanceof GatewayError) {
        return err(error);
      }
      return err(new GatewayError(formatError(error), { details: error }));
    }
  }

  private async collectPages<T>(
    path: string,
    schema: z.ZodType<Envelope<T[]>, z.ZodTypeDef, unknown>,
    perPage: number,
    signal?: AbortSignal,
  ): Promise<T[]> {
    const items: T[] = [];
    let page = 1;

    for (;;) {
      const envelope = await this.request('GET', path, schema, {
        query: { page, per_page: perPage },
        signal,
      });
      items.push(...(envelope.result ?? []));

      const totalPages = envelope.result_info?.total_pages ?? page;
      if (page >= totalPages) {
        return items;
      }
      page += 1;
    }
  }

  private requireResult<T>(envelope: Envelope<T>): T {
    if (envelope.result === undefined || envelope.result === null) {
      throw new GatewayError('Unexpected response: missing result');
    }
    return envelope.result;
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<Envelope<T>, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<Envelope<T>> {
    const url = this.buildUrl(path, options.query);
    const headers = new Headers({
      Accept: 'application/json',
      Authorization: `Bearer ${this.token}`,
    });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers.set('Content-Type', 'application/json');
      init.body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    combineSignals(controller, options.signal);
    let timedOut = false;
    let timeout: NodeJS.Timeout | undefined;
    if (this.timeoutMs > 0) {
      timeout = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error('Request timed out'));
      }, this.timeoutMs);
    }
    init.signal = controller.signal;

    this.logger.debug({ method, url: url.toString() }, 'request');

    let response: Response;
    let payload: unknown;
    try {
      response = await fetch(url, init);
      payload = await this.readJson(response);
    } catch (error) {
      if (timedOut) {
        throw new GatewayError('Request timed out', { code: 'TIMEOUT' });
      }
      if (controller.signal.aborted) {
        throw new GatewayError('Request aborted', { code: 'ABORTED' });
      }
      throw new GatewayError(formatError(error), { details: error });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }

    if (!response.ok) {
      throw this.toResponseError(response, payload);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ method, path, issues: parsed.error.issues }, 'unexpected response');
      throw new GatewayError('Unexpected response', {
        status: response.status,
        details: parsed.error.issues,
      });
    }

    if (!parsed.data.success) {
      throw this.toResponseError(response, payload);
    }

    return parsed.data;
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private toResponseError(response: Response, payload: unknown): GatewayError {
    const parsed = errorEnvelopeSchema.safeParse(payload);
    const first = parsed.success ? parsed.data.errors[0] : undefined;
    if (first) {
      return new GatewayError(first.message, {
        status: response.status,
        code: first.code,
        details: payload,
      });
    }

    return new GatewayError(response.statusText || `Request failed with status ${response.status}`, {
      status: response.status,
      details: payload,
    });
  }

  private buildUrl(path: string, query?: RequestOptions['query']): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }
}
