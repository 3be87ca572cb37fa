/*
 * Public API Surface of @record-tree/explorer
 */

export * from './lib/app-state';
export * from './lib/config/env-config';
export * from './lib/gateway/cloudflare-gateway';
export * from './lib/gateway/cloudflare-schemas';
export * from './lib/logging/logger';

export * from './lib/services/edit-child-form';
export * from './lib/services/modal-workflow.service';
export * from './lib/services/mutation-dispatcher.service';
export * from './lib/services/notification.service';
export * from './lib/services/record-actions.service';
export * from './lib/services/tree-controller.service';

export * from './lib/terminal/keymap';
export * from './lib/terminal/screen';
export * from './lib/terminal/terminal-app';

export * from './cli/program';
