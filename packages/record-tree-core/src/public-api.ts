/*
 * Public API Surface of @record-tree/core
 */

export * from './lib/types/tree-node';
export * from './lib/types/resources';
export * from './lib/types/result';
export * from './lib/types/tree-errors';
export * from './lib/types/tree-config';
export type * from './lib/types/resource-gateway';
export type * from './lib/types/notification';

export * from './lib/engine/labels';
export * from './lib/engine/loading';
export * from './lib/engine/node-factory';
export * from './lib/engine/tree-store';

export * from './lib/utils/gateway-result';
export * from './lib/utils/tree-utils';
