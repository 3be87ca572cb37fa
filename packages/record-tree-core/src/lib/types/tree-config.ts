import { ROUTABLE_RECORD_TYPES } from './resources';
import type { TreeLoadError } from './tree-errors';

export interface TreeLabelsConfig {
  /** Label of the root node. */
  root: string;
  /** Lazy-load marker shown under unloaded parents. */
  placeholder: string;
  /** Informational leaf shown when a parent has no children. */
  empty: string;
}

export interface TreeConfig {
  labels: TreeLabelsConfig;
  /** Types whose summary shows the routing flag instead of the TTL. */
  routableTypes: readonly string[];
  /** Optional error handler for load and mutation failures. */
  onError?: (error: TreeLoadError) => void;
}

export type TreeConfigInput = Partial<Omit<TreeConfig, 'labels'>> & {
  labels?: Partial<TreeLabelsConfig>;
};

export const DEFAULT_TREE_CONFIG: Readonly<TreeConfig> = Object.freeze({
  labels: {
    root: 'Zones',
    placeholder: 'Loading…',
    empty: 'No records',
  },
  routableTypes: ROUTABLE_RECORD_TYPES,
});

export function mergeTreeConfig(config?: TreeConfigInput): TreeConfig {
  return {
    ...DEFAULT_TREE_CONFIG,
    ...config,
    labels: {
      ...DEFAULT_TREE_CONFIG.labels,
      ...config?.labels,
    },
  };
}
