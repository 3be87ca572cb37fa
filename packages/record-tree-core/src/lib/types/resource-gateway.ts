import type { Observable } from 'rxjs';

import type { ChildResource, MutationPayload, ParentResource } from './resources';
import type { GatewayError } from './tree-errors';
import type { TreeId } from './tree-node';
import type { Result } from './result';

export interface GatewayCallOptions {
  /** Aborted when the caller no longer wants the result. */
  signal?: AbortSignal;
}

/** Gateways may answer with a promise or an observable; the first value wins. */
export type GatewayResult<T> =
  | Promise<Result<T, GatewayError>>
  | Observable<Result<T, GatewayError>>;

/** Contract for the remote service holding parents and their children. */
export interface ResourceGateway {
  listParents(options?: GatewayCallOptions): GatewayResult<ParentResource[]>;
  listChildren(parentId: TreeId, options?: GatewayCallOptions): GatewayResult<ChildResource[]>;
  createChild(
    parentId: TreeId,
    payload: MutationPayload,
    options?: GatewayCallOptions,
  ): GatewayResult<ChildResource>;
  updateChild(
    parentId: TreeId,
    childId: TreeId,
    payload: MutationPayload,
    options?: GatewayCallOptions,
  ): GatewayResult<ChildResource>;
  deleteChild(
    parentId: TreeId,
    childId: TreeId,
    options?: GatewayCallOptions,
  ): GatewayResult<void>;
}
