import { from } from 'rxjs';

import {
  type ChildResource,
  type GatewayCallOptions,
  GatewayError,
  type GatewayResult,
  type MutationPayload,
  type ParentResource,
  type ResourceGateway,
  type Result,
  type TreeId,
  err,
  ok,
} from '@record-tree/core';

export type GatewayMethod = keyof ResourceGateway;

export interface GatewayCall {
  method: GatewayMethod;
  parentId?: TreeId;
  childId?: TreeId;
  payload?: MutationPayload;
  signal?: AbortSignal;
}

export interface InMemoryGatewayOptions {
  parents?: ParentResource[];
  children?: ChildResource[];
  /** Answer with observables instead of promises. */
  observable?: boolean;
}

interface HeldCall {
  method: GatewayMethod;
  release: () => void;
}

/**
 * ResourceGateway over in-process maps. Calls can be held until released and
 * failures queued per method, so tests decide the order responses arrive in.
 */
export class InMemoryGateway implements ResourceGateway {
  public readonly calls: GatewayCall[] = [];

  private parents: ParentResource[];
  private readonly records = new Map<TreeId, ChildResource[]>();
  private readonly failures = new Map<GatewayMethod, GatewayError[]>();
  private readonly heldMethods = new Set<GatewayMethod>();
  private held: HeldCall[] = [];
  private readonly observable: boolean;
  private nextId = 1;

  constructor(options: InMemoryGatewayOptions = {}) {
    this.parents = [...(options.parents ?? [])];
    for (const parent of this.parents) {
      this.records.set(parent.id, []);
    }
    for (const child of options.children ?? []) {
      this.recordsOf(child.parentId).push({ ...child });
    }
    this.observable = options.observable ?? false;
  }

  public setParents(parents: ParentResource[]): void {
    this.parents = [...parents];
    for (const parent of parents) {
      if (!this.records.has(parent.id)) {
        this.records.set(parent.id, []);
      }
    }
  }

  public childrenOf(parentId: TreeId): ChildResource[] {
    return (this.records.get(parentId) ?? []).map((child) => ({ ...child }));
  }

  public callsTo(method: GatewayMethod): GatewayCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  /** The next call to `method` answers with this error. */
  public failNext(method: GatewayMethod, error: GatewayError | string): void {
    const queue = this.failures.get(method) ?? [];
    queue.push(typeof error === 'string' ? new GatewayError(error, { status: 500 }) : error);
    this.failures.set(method, queue);
  }

  /** From now on, calls to `method` wait for `release`. */
  public hold(method: GatewayMethod): void {
    this.heldMethods.add(method);
  }

  /** Answers the oldest held call to `method`; false when none is waiting. */
  public release(method: GatewayMethod): boolean {
    const index = this.held.findIndex((call) => call.method === method);
    if (index < 0) {
      return false;
    }
    const [call] = this.held.splice(index, 1);
    call?.release();
    return true;
  }

  public releaseAll(): void {
    const calls = this.held;
    this.held = [];
    for (const call of calls) {
      call.release();
    }
  }

  public listParents(options?: GatewayCallOptions): GatewayResult<ParentResource[]> {
    return this.respond({ method: 'listParents', signal: options?.signal }, () =>
      ok(this.parents.map((parent) => ({ ...parent }))),
    );
  }

  public listChildren(
    parentId: TreeId,
    options?: GatewayCallOptions,
  ): GatewayResult<ChildResource[]> {
    return this.respond({ method: 'listChildren', parentId, signal: options?.signal }, () =>
      this.records.has(parentId) ? ok(this.childrenOf(parentId)) : err(zoneNotFound(parentId)),
    );
  }

  public createChild(
    parentId: TreeId,
    payload: MutationPayload,
    options?: GatewayCallOptions,
  ): GatewayResult<ChildResource> {
    return this.respond({ method: 'createChild', parentId, payload, signal: options?.signal }, () => {
      if (!this.records.has(parentId)) {
        return err(zoneNotFound(parentId));
      }
      const child: ChildResource = { id: `rec-${this.nextId++}`, parentId, ...payload };
      this.recordsOf(parentId).push(child);
      return ok({ ...child });
    });
  }

  public updateChild(
    parentId: TreeId,
    childId: TreeId,
    payload: MutationPayload,
    options?: GatewayCallOptions,
  ): GatewayResult<ChildResource> {
    const call: GatewayCall = {
      method: 'updateChild',
      parentId,
      childId,
      payload,
      signal: options?.signal,
    };
    return this.respond(call, () => {
      const records = this.recordsOf(parentId);
      const index = records.findIndex((child) => child.id === childId);
      const current = records[index];
      if (!current) {
        return err(recordNotFound(childId));
      }
      const updated: ChildResource = { ...current, ...payload, id: childId, parentId };
      records[index] = updated;
      return ok({ ...updated });
    });
  }

  public deleteChild(
    parentId: TreeId,
    childId: TreeId,
    options?: GatewayCallOptions,
  ): GatewayResult<void> {
    return this.respond({ method: 'deleteChild', parentId, childId, signal: options?.signal }, () => {
      const records = this.recordsOf(parentId);
      const index = records.findIndex((child) => child.id === childId);
      if (index < 0) {
        return err(recordNotFound(childId));
      }
      records.splice(index, 1);
      return ok(undefined);
    });
  }

  private recordsOf(parentId: TreeId): ChildResource[] {
    let records = this.records.get(parentId);
    if (!records) {
      records = [];
      this.records.set(parentId, records);
    }
    return records;
  }

  private respond<T>(
    call: GatewayCall,
    compute: () => Result<T, GatewayError>,
  ): GatewayResult<T> {
    this.calls.push(call);
    const failure = this.failures.get(call.method)?.shift();
    const settle = (): Result<T, GatewayError> => (failure ? err(failure) : compute());

    const response = this.heldMethods.has(call.method)
      ? new Promise<Result<T, GatewayError>>((resolve) => {
          const signal = call.signal;
          signal?.addEventListener('abort', () => resolve(err(aborted())), { once: true });
          this.held.push({
            method: call.method,
            release: () => {
              // An aborted request never reaches the remote side.
              if (!signal?.aborted) {
                resolve(settle());
              }
            },
          });
        })
      : Promise.resolve(call.signal?.aborted ? err(aborted()) : settle());

    return this.observable ? from(response) : response;
  }
}

function aborted(): GatewayError {
  return new GatewayError('Request aborted', { code: 'ABORTED' });
}

function zoneNotFound(parentId: TreeId): GatewayError {
  return new GatewayError(`Zone ${parentId} not found`, { status: 404, code: 1001 });
}

function recordNotFound(childId: TreeId): GatewayError {
  return new GatewayError(`Record ${childId} not found`, { status: 404, code: 81044 });
}
