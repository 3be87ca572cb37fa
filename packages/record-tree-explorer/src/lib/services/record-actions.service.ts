import {
  type ChildTreeNode,
  type NotificationSink,
  type TreeStore,
  isChildNode,
} from '@record-tree/core';

import type { ModalWorkflowService } from './modal-workflow.service';
import type { MutationDispatcherService, MutationOutcome } from './mutation-dispatcher.service';
import type { TreeControllerService } from './tree-controller.service';

export interface RecordActionsOptions {
  store: TreeStore;
  controller: TreeControllerService;
  dialogs: ModalWorkflowService;
  dispatcher: MutationDispatcherService;
  notifications: NotificationSink;
}

/** What an action ended with; `cancelled` covers dismissed dialogs. */
export type RecordActionOutcome = MutationOutcome | 'cancelled' | 'unavailable';

/** Add, edit and delete flows: resolve the target, run the dialog, dispatch. */
export class RecordActionsService {
  private readonly store: TreeStore;
  private readonly controller: TreeControllerService;
  private readonly dialogs: ModalWorkflowService;
  private readonly dispatcher: MutationDispatcherService;
  private readonly notifications: NotificationSink;

  constructor(options: RecordActionsOptions) {
    this.store = options.store;
    this.controller = options.controller;
    this.dialogs = options.dialogs;
    this.dispatcher = options.dispatcher;
    this.notifications = options.notifications;
  }

  /** Creates a record under the selected zone, or the zone enclosing the selection. */
  public async addChild(): Promise<RecordActionOutcome> {
    const parent = this.store.findContainingParent(this.controller.selectedNode);
    if (!parent) {
      this.notifications.notify('No zone selected', 'Select a zone first', 'warning');
      return 'unavailable';
    }

    const payload = await this.dialogs.editChild(parent.label);
    if (!payload) {
      return 'cancelled';
    }

    return this.dispatcher.create(parent, payload);
  }

  public editSelected(): Promise<RecordActionOutcome> {
    const node = this.controller.selectedNode;
    if (!isChildNode(node)) {
      this.notifications.notify('No record selected', 'Select a record to edit', 'warning');
      return Promise.resolve('unavailable');
    }
    return this.editChild(node);
  }

  public async editChild(child: ChildTreeNode): Promise<RecordActionOutcome> {
    const parent = this.store.findContainingParent(child);
    if (!parent) {
      return 'unavailable';
    }

    const payload = await this.dialogs.editChild(parent.label, child.payload.resource);
    if (!payload) {
      return 'cancelled';
    }

    return this.dispatcher.update(parent, child, payload);
  }

  public async deleteSelected(): Promise<RecordActionOutcome> {
    const child = this.controller.selectedNode;
    if (!isChildNode(child)) {
      this.notifications.notify('No record selected', 'Select a record to delete', 'warning');
      return 'unavailable';
    }

    const parent = this.store.findContainingParent(child);
    if (!parent) {
      return 'unavailable';
    }

    const confirmed = await this.dialogs.confirmDelete(child.label);
    if (!confirmed) {
      return 'cancelled';
    }

    return this.dispatcher.remove(parent, child);
  }
}
