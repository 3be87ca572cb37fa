import type { Subscription } from 'rxjs';

import {
  type ResourceGateway,
  type TreeConfigInput,
  TreeStore,
  mergeTreeConfig,
} from '@record-tree/core';

import type { Logger } from './logging/logger';
import { ModalWorkflowService } from './services/modal-workflow.service';
import { MutationDispatcherService } from './services/mutation-dispatcher.service';
import { NotificationService } from './services/notification.service';
import { RecordActionsService } from './services/record-actions.service';
import { TreeControllerService } from './services/tree-controller.service';

export interface AppStateOptions {
  gateway: ResourceGateway;
  logger: Logger;
  config?: TreeConfigInput;
  notificationHistory?: number;
}

/** Everything the explorer shares, built once at startup and passed around explicitly. */
export interface AppState {
  gateway: ResourceGateway;
  store: TreeStore;
  notifications: NotificationService;
  controller: TreeControllerService;
  dialogs: ModalWorkflowService;
  dispatcher: MutationDispatcherService;
  actions: RecordActionsService;
  logger: Logger;
  dispose(): void;
}

export function createAppState(options: AppStateOptions): AppState {
  const config = mergeTreeConfig(options.config);
  const logger = options.logger;
  const store = new TreeStore(config.labels.root);
  const notifications = new NotificationService({
    logger,
    historySize: options.notificationHistory,
  });
  const controller = new TreeControllerService({
    store,
    gateway: options.gateway,
    notifications,
    logger,
    config,
  });
  const dialogs = new ModalWorkflowService();
  const dispatcher = new MutationDispatcherService({
    store,
    gateway: options.gateway,
    controller,
    notifications,
    logger,
    onError: config.onError,
  });
  const actions = new RecordActionsService({
    store,
    controller,
    dialogs,
    dispatcher,
    notifications,
  });

  const subscriptions: Subscription[] = [
    controller.childActivated$.subscribe((child) => {
      actions.editChild(child).catch((error: unknown) => {
        logger.error({ err: error, record: child.id }, 'edit workflow failed');
      });
    }),
  ];

  return {
    gateway: options.gateway,
    store,
    notifications,
    controller,
    dialogs,
    dispatcher,
    actions,
    logger,
    dispose() {
      for (const subscription of subscriptions) {
        subscription.unsubscribe();
      }
      dialogs.dispose();
      dispatcher.dispose();
      controller.dispose();
      notifications.dispose();
    },
  };
}
