import { BehaviorSubject, type Observable, Subject } from 'rxjs';

import {
  type ChildTreeNode,
  GatewayError,
  LOAD_STATES,
  type NotificationSink,
  type ParentTreeNode,
  type ResourceGateway,
  type Result,
  TREE_NODE_KINDS,
  type TreeConfig,
  type TreeConfigInput,
  type TreeLoadError,
  type TreeNode,
  type TreeRowViewModel,
  TreeStore,
  createErrorLeaf,
  err,
  mapChildrenToNodes,
  mapParentsToNodes,
  mergeTreeConfig,
  nodeKey,
  ok,
  resolveGatewayResult,
} from '@record-tree/core';

import type { Logger } from '../logging/logger';

export interface TreeControllerOptions {
  store: TreeStore;
  gateway: ResourceGateway;
  notifications: NotificationSink;
  logger: Logger;
  config?: TreeConfigInput;
}

/**
 * Lazy loading, expansion and cursor state over a TreeStore. Every change is
 * published as a new version on `changes$`.
 */
export class TreeControllerService {
  private readonly store: TreeStore;
  private readonly gateway: ResourceGateway;
  private readonly notifications: NotificationSink;
  private readonly logger: Logger;
  private readonly config: TreeConfig;

  private readonly stateVersion = new BehaviorSubject(0);
  private readonly childActivations = new Subject<ChildTreeNode>();
  private readonly expanded = new Set<string>();
  private readonly childLoads = new Map<ParentTreeNode, Promise<void>>();
  private readonly staleLoads = new Set<ParentTreeNode>();
  private rootGeneration = 0;
  private rootLoadingState = false;
  private rootErrorState: TreeLoadError | null = null;
  private cursorKey: string | null = null;
  private cursorIndex = 0;

  public readonly changes$: Observable<number> = this.stateVersion.asObservable();

  /** Emits when a child is activated; the edit workflow subscribes to this. */
  public readonly childActivated$: Observable<ChildTreeNode> =
    this.childActivations.asObservable();

  constructor(options: TreeControllerOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.notifications = options.notifications;
    this.logger = options.logger.child({ component: 'tree-controller' });
    this.config = mergeTreeConfig(options.config);
  }

  public get rootLoading(): boolean {
    return this.rootLoadingState;
  }

  public get rootError(): TreeLoadError | null {
    return this.rootErrorState;
  }

  public get rows(): TreeRowViewModel[] {
    return this.store.flatten(this.expanded);
  }

  public get selectedRow(): TreeRowViewModel | undefined {
    const rows = this.rows;
    return rows.find((row) => row.key === this.cursorKey) ?? rows[this.clampIndex(rows.length)];
  }

  public get selectedNode(): TreeNode | undefined {
    return this.selectedRow?.node;
  }

  public isExpanded(node: TreeNode): boolean {
    return this.expanded.has(nodeKey(node));
  }

  /**
   * Replaces the parent list. On failure the current parents stay as they
   * are and the error is reported.
   */
  public async loadRoot(): Promise<void> {
    const generation = ++this.rootGeneration;
    this.rootLoadingState = true;
    this.bumpVersion();

    const result = await resolveGatewayResult(() => this.gateway.listParents());
    if (generation !== this.rootGeneration) {
      return;
    }

    this.rootLoadingState = false;

    const parents = result.ok ? mapParentsToNodes(result.value, this.config) : [];
    const outcome = result.ok ? this.rejectDuplicates(this.store.root, parents) : result;

    if (!outcome.ok) {
      const loadError: TreeLoadError = {
        scope: 'root',
        error: outcome.error,
        message: outcome.error.message,
      };
      this.rootErrorState = loadError;
      this.logger.warn({ err: outcome.error }, 'zone list failed');
      this.notifications.notify('Could not load zones', loadError.message, 'error');
      this.config.onError?.(loadError);
      this.bumpVersion();
      return;
    }

    this.rootErrorState = null;
    this.store.replaceChildren(this.store.root, parents);
    this.store.resetLoadStates();
    this.expanded.clear();
    this.logger.info({ zones: parents.length }, 'zones loaded');
    this.bumpVersion();
  }

  public refresh(): Promise<void> {
    return this.loadRoot();
  }

  /**
   * Replaces the children of `parent` with the remote list. While a load for
   * the same parent is in flight this returns that load instead of starting
   * another.
   */
  public loadChildren(parent: ParentTreeNode): Promise<void> {
    if (!this.store.isAttached(parent)) {
      return Promise.resolve();
    }

    const running = this.childLoads.get(parent);
    if (running) {
      return running;
    }

    const load = this.runChildLoads(parent);
    this.childLoads.set(parent, load);
    return load;
  }

  /**
   * Like loadChildren, but a load already in flight may have been answered
   * before the caller's change reached the service, so another one follows it.
   * Resolves once a load started after this call has settled.
   */
  public reloadChildren(parent: ParentTreeNode): Promise<void> {
    if (this.childLoads.has(parent)) {
      this.staleLoads.add(parent);
    }
    return this.loadChildren(parent);
  }

  private async runChildLoads(parent: ParentTreeNode): Promise<void> {
    try {
      do {
        this.staleLoads.delete(parent);
        await this.fetchChildren(parent);
      } while (this.staleLoads.has(parent) && this.store.isAttached(parent));
    } finally {
      this.childLoads.delete(parent);
      this.staleLoads.delete(parent);
    }
  }

  private async fetchChildren(parent: ParentTreeNode): Promise<void> {
    if (!this.store.beginLoad(parent.id)) {
      return;
    }

    this.store.replaceChildren(parent, []);
    this.expanded.add(nodeKey(parent));
    this.bumpVersion();

    const result = await resolveGatewayResult(() => this.gateway.listChildren(parent.id));

    // The root may have been reloaded while the request was out.
    if (!this.store.isAttached(parent)) {
      this.logger.debug({ zone: parent.id }, 'discarding records of a detached zone');
      return;
    }

    const children = result.ok ? mapChildrenToNodes(parent.id, result.value, this.config) : [];
    const outcome = result.ok ? this.rejectDuplicates(parent, children) : result;

    if (!outcome.ok) {
      const loadError: TreeLoadError = {
        scope: 'children',
        nodeId: parent.id,
        error: outcome.error,
        message: outcome.error.message,
      };
      this.store.failLoad(parent.id);
      this.store.replaceChildren(parent, [createErrorLeaf(parent.id, loadError.message)]);
      this.logger.warn({ zone: parent.id, err: outcome.error }, 'record list failed');
      this.notifications.notify(`Could not load ${parent.label}`, loadError.message, 'error');
      this.config.onError?.(loadError);
      this.bumpVersion();
      return;
    }

    this.store.completeLoad(parent.id);
    this.store.replaceChildren(parent, children);
    this.logger.debug({ zone: parent.id, records: children.length }, 'records loaded');
    this.bumpVersion();
  }

  /** A response naming the same resource twice is treated as a failed response. */
  private rejectDuplicates(
    node: TreeNode,
    nodes: readonly TreeNode[],
  ): Result<readonly TreeNode[], GatewayError> {
    const duplicate = this.store.findDuplicate(node, nodes);
    if (duplicate === undefined) {
      return ok(nodes);
    }
    return err(
      new GatewayError(`Response repeats ${duplicate}`, { code: 'DUPLICATE_ID', details: duplicate }),
    );
  }

  /** Parents load, children open the edit workflow, leaves retry their parent. */
  public activate(node: TreeNode | undefined = this.selectedNode): Promise<void> {
    if (!node) {
      return Promise.resolve();
    }

    switch (node.kind) {
      case TREE_NODE_KINDS.PARENT:
        return this.loadChildren(node);
      case TREE_NODE_KINDS.CHILD:
        this.childActivations.next(node);
        return Promise.resolve();
      case TREE_NODE_KINDS.PLACEHOLDER:
      case TREE_NODE_KINDS.INFO:
      case TREE_NODE_KINDS.ERROR: {
        const parent = this.store.findContainingParent(node);
        return parent ? this.loadChildren(parent) : Promise.resolve();
      }
      case TREE_NODE_KINDS.ROOT:
        return Promise.resolve();
    }
  }

  /** Collapses an expanded parent; expands a collapsed one, loading it first when needed. */
  public toggleExpanded(node: TreeNode | undefined = this.selectedNode): Promise<void> {
    const parent = this.store.findContainingParent(node);
    if (!parent) {
      return Promise.resolve();
    }

    const key = nodeKey(parent);
    if (this.expanded.has(key)) {
      this.expanded.delete(key);
      this.setCursor(key);
      return Promise.resolve();
    }

    const state = this.store.getLoadState(parent.id);
    if (state === LOAD_STATES.UNLOADED || state === LOAD_STATES.FAILED) {
      return this.loadChildren(parent);
    }

    this.expanded.add(key);
    this.bumpVersion();
    return Promise.resolve();
  }

  public moveCursor(delta: number): void {
    const rows = this.rows;
    if (rows.length === 0) {
      return;
    }

    const current = rows.findIndex((row) => row.key === this.cursorKey);
    const from = current === -1 ? this.clampIndex(rows.length) : current;
    const next = Math.max(0, Math.min(rows.length - 1, from + delta));
    this.cursorIndex = next;
    this.cursorKey = rows[next]?.key ?? null;
    this.bumpVersion();
  }

  public focus(node: TreeNode): void {
    this.setCursor(nodeKey(node));
  }

  public dispose(): void {
    this.stateVersion.complete();
    this.childActivations.complete();
  }

  private setCursor(key: string): void {
    const index = this.rows.findIndex((row) => row.key === key);
    if (index !== -1) {
      this.cursorKey = key;
      this.cursorIndex = index;
    }
    this.bumpVersion();
  }

  private clampIndex(length: number): number {
    return Math.max(0, Math.min(this.cursorIndex, length - 1));
  }

  private bumpVersion(): void {
    const index = this.rows.findIndex((row) => row.key === this.cursorKey);
    // A key whose row went away holds its line until a reload brings the row back.
    if (index !== -1) {
      this.cursorIndex = index;
    }
    this.stateVersion.next(this.stateVersion.value + 1);
  }
}
