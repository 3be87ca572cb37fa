import { BehaviorSubject, type Observable } from 'rxjs';

import {
  type ChildTreeNode,
  type GatewayCallOptions,
  type GatewayResult,
  type MutationPayload,
  type NotificationSink,
  type ParentTreeNode,
  type ResourceGateway,
  type TreeId,
  type TreeLoadError,
  type TreeStore,
  resolveGatewayResult,
} from '@record-tree/core';

import type { Logger } from '../logging/logger';
import type { TreeControllerService } from './tree-controller.service';

export type MutationOutcome = 'committed' | 'failed' | 'superseded';

export type MutationKind = 'create' | 'update' | 'delete';

export interface MutationDispatcherOptions {
  store: TreeStore;
  gateway: ResourceGateway;
  controller: TreeControllerService;
  notifications: NotificationSink;
  logger: Logger;
  onError?: (error: TreeLoadError) => void;
}

interface MutationTask<TValue> {
  kind: MutationKind;
  parentId: TreeId;
  childId?: TreeId;
  summary: string;
  run: (options: GatewayCallOptions) => GatewayResult<TValue>;
}

const SUCCESS_TITLES: Record<MutationKind, string> = {
  create: 'Record created',
  update: 'Record updated',
  delete: 'Record deleted',
};

const FAILURE_TITLES: Record<MutationKind, string> = {
  create: 'Create failed',
  update: 'Update failed',
  delete: 'Delete failed',
};

/**
 * Exclusive slot for create/update/delete. A new mutation aborts the one in
 * flight; the superseded run never notifies or touches the tree.
 */
export class MutationDispatcherService {
  private readonly store: TreeStore;
  private readonly gateway: ResourceGateway;
  private readonly controller: TreeControllerService;
  private readonly notifications: NotificationSink;
  private readonly logger: Logger;
  private readonly onError?: (error: TreeLoadError) => void;

  private generation = 0;
  private inFlight: AbortController | null = null;
  private readonly busyState = new BehaviorSubject(false);

  public readonly busy$: Observable<boolean> = this.busyState.asObservable();

  constructor(options: MutationDispatcherOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.controller = options.controller;
    this.notifications = options.notifications;
    this.logger = options.logger.child({ component: 'dispatcher' });
    this.onError = options.onError;
  }

  public get busy(): boolean {
    return this.busyState.value;
  }

  public create(parent: ParentTreeNode, payload: MutationPayload): Promise<MutationOutcome> {
    return this.dispatch({
      kind: 'create',
      parentId: parent.id,
      summary: `${payload.type} ${payload.name}`,
      run: (options) => this.gateway.createChild(parent.id, payload, options),
    });
  }

  public update(
    parent: ParentTreeNode,
    child: ChildTreeNode,
    payload: MutationPayload,
  ): Promise<MutationOutcome> {
    return this.dispatch({
      kind: 'update',
      parentId: parent.id,
      childId: child.id,
      summary: `${payload.type} ${payload.name}`,
      run: (options) => this.gateway.updateChild(parent.id, child.id, payload, options),
    });
  }

  public remove(parent: ParentTreeNode, child: ChildTreeNode): Promise<MutationOutcome> {
    const record = child.payload.resource;
    return this.dispatch({
      kind: 'delete',
      parentId: parent.id,
      childId: child.id,
      summary: `${record.type} ${record.name}`,
      run: (options) => this.gateway.deleteChild(parent.id, child.id, options),
    });
  }

  /** Aborts the mutation in flight, if any, without starting another. */
  public cancel(): void {
    this.generation += 1;
    this.inFlight?.abort();
    this.inFlight = null;
    this.busyState.next(false);
  }

  public dispose(): void {
    this.cancel();
    this.busyState.complete();
  }

  private async dispatch<TValue>(task: MutationTask<TValue>): Promise<MutationOutcome> {
    const generation = ++this.generation;
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;
    this.busyState.next(true);
    this.logger.info(
      { kind: task.kind, zone: task.parentId, record: task.childId, generation },
      'mutation started',
    );

    const result = await resolveGatewayResult(() => task.run({ signal: controller.signal }));

    if (generation !== this.generation) {
      this.logger.debug({ kind: task.kind, generation }, 'mutation superseded');
      return 'superseded';
    }

    this.inFlight = null;
    this.busyState.next(false);

    if (!result.ok) {
      this.logger.warn({ kind: task.kind, err: result.error }, 'mutation failed');
      this.notifications.notify(FAILURE_TITLES[task.kind], result.error.message, 'error');
      this.onError?.({
        scope: 'mutation',
        nodeId: task.childId ?? task.parentId,
        error: result.error,
        message: result.error.message,
      });
      return 'failed';
    }

    this.notifications.notify(SUCCESS_TITLES[task.kind], task.summary, 'info');

    // Re-resolve: the parent may have been replaced by a root refresh meanwhile.
    const parent = this.store.getParentNode(task.parentId);
    if (parent) {
      await this.controller.reloadChildren(parent);
    }

    return 'committed';
  }
}
