import type { ChildResource, ParentResource } from '@record-tree/core';

import { type AppState, createAppState } from '../app-state';
import { createNullLogger } from '../logging/logger';
import { InMemoryGateway, type InMemoryGatewayOptions } from './in-memory-gateway';

export const zone = (id: string, name: string): ParentResource => ({ id, name });

export const record = (
  id: string,
  parentId: string,
  overrides: Partial<Omit<ChildResource, 'id' | 'parentId'>> = {},
): ChildResource => ({
  id,
  parentId,
  name: 'example.com',
  type: 'A',
  content: '1.1.1.1',
  ttl: 1,
  proxied: true,
  ...overrides,
});

export interface TestApp {
  gateway: InMemoryGateway;
  state: AppState;
}

/** AppState over an in-memory gateway with a silent logger. */
export function createTestApp(options: InMemoryGatewayOptions = {}): TestApp {
  const gateway = new InMemoryGateway(options);
  const state = createAppState({ gateway, logger: createNullLogger() });
  return { gateway, state };
}
