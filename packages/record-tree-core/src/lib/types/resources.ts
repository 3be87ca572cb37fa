import type { TreeId } from './tree-node';

/** A top-level collection as returned by the gateway (a DNS zone). */
export interface ParentResource {
  id: TreeId;
  name: string;
}

/** A member record owned by exactly one parent resource. */
export interface ChildResource {
  id: TreeId;
  parentId: TreeId;
  /** Fully-qualified name, e.g. `www.example.com` or `example.com` for the apex. */
  name: string;
  /** Open discriminator: `A`, `AAAA`, `CNAME`, `MX`, `TXT`, ... */
  type: string;
  content: string;
  /** Seconds; `1` means automatic. */
  ttl: number;
  /** Routing (proxy) flag. Only meaningful for routable types. */
  proxied: boolean;
  priority?: number;
  comment?: string | null;
}

/** Fields submitted to the gateway when creating or updating a child. */
export interface MutationPayload {
  type: string;
  name: string;
  content: string;
  ttl: number;
  proxied: boolean;
  priority?: number;
}

export interface MutationRequest {
  parentId: TreeId;
  /** Absent for a create. */
  childId?: TreeId;
  payload: MutationPayload;
}

export const AUTOMATIC_TTL = 1;

export const ROUTABLE_RECORD_TYPES: readonly string[] = Object.freeze([
  'A',
  'AAAA',
  'CNAME',
]);

export function isRoutableType(
  type: string,
  routableTypes: readonly string[] = ROUTABLE_RECORD_TYPES,
): boolean {
  return routableTypes.includes(type.toUpperCase());
}
