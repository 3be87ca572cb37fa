import type { TreeId } from './tree-node';

/** Transport or remote API failure. Recoverable. */
export class GatewayError extends Error {
  readonly status: number | null;
  readonly code: string | null;
  readonly details: unknown;

  constructor(
    message: string,
    options: { status?: number | null; code?: string | number | null; details?: unknown } = {},
  ) {
    super(message);
    this.name = 'GatewayError';
    this.status = options.status ?? null;
    this.code = options.code === undefined || options.code === null ? null : String(options.code);
    this.details = options.details;
  }
}

/** Malformed dialog input. Blocks dismissal, never surfaced as a notification. */
export class ValidationError extends Error {
  readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    super(`Required: ${fields.join(', ')}`);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

/** Missing or invalid credential. Fatal at startup. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

/** Error information for root, children or mutation failures. */
export interface TreeLoadError {
  scope: 'root' | 'children' | 'mutation';
  nodeId?: TreeId;
  error: GatewayError;
  message: string;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new GatewayError(formatError(error), { details: error });
}
