import { LOAD_STATES, type TreeId } from '../types/tree-node';

export type LoadStateMap = Map<TreeId, LOAD_STATES>;

export function getLoadState(states: LoadStateMap, parentId: TreeId): LOAD_STATES {
  return states.get(parentId) ?? LOAD_STATES.UNLOADED;
}

/**
 * Marks a parent as loading. Returns false when a load is already in flight,
 * in which case the caller must not start another one.
 */
export function beginLoadState(states: LoadStateMap, parentId: TreeId): boolean {
  if (getLoadState(states, parentId) === LOAD_STATES.LOADING) {
    return false;
  }

  states.set(parentId, LOAD_STATES.LOADING);
  return true;
}

export function completeLoadState(states: LoadStateMap, parentId: TreeId): void {
  states.set(parentId, LOAD_STATES.LOADED);
}

export function failLoadState(states: LoadStateMap, parentId: TreeId): void {
  states.set(parentId, LOAD_STATES.FAILED);
}

export function clearLoadState(states: LoadStateMap, parentId: TreeId): void {
  states.delete(parentId);
}
