import type { EditChildField } from '../services/edit-child-form';

/** Shape of the objects node's readline emits with `keypress`. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export enum TREE_ACTIONS {
  REFRESH = 'refresh',
  ADD = 'add',
  EDIT = 'edit',
  DELETE = 'delete',
  ACTIVATE = 'activate',
  UP = 'up',
  DOWN = 'down',
  COLLAPSE = 'collapse',
  EXPAND = 'expand',
  QUIT = 'quit',
}

export const TREE_KEYMAP: Readonly<Record<string, TREE_ACTIONS>> = Object.freeze({
  r: TREE_ACTIONS.REFRESH,
  a: TREE_ACTIONS.ADD,
  e: TREE_ACTIONS.EDIT,
  d: TREE_ACTIONS.DELETE,
  return: TREE_ACTIONS.ACTIVATE,
  enter: TREE_ACTIONS.ACTIVATE,
  space: TREE_ACTIONS.ACTIVATE,
  up: TREE_ACTIONS.UP,
  k: TREE_ACTIONS.UP,
  down: TREE_ACTIONS.DOWN,
  j: TREE_ACTIONS.DOWN,
  left: TREE_ACTIONS.COLLAPSE,
  right: TREE_ACTIONS.EXPAND,
  q: TREE_ACTIONS.QUIT,
});

export type EditDialogAction =
  | { type: 'submit' }
  | { type: 'cancel' }
  | { type: 'focus'; step: 1 | -1 }
  | { type: 'backspace' }
  | { type: 'toggle' }
  | { type: 'insert'; text: string };

export type ConfirmDialogAction = { type: 'accept' } | { type: 'cancel' };

function isQuit(key: KeyPress): boolean {
  return key.ctrl === true && key.name === 'c';
}

function printable(key: KeyPress): string | null {
  const sequence = key.sequence;
  if (!sequence || key.ctrl || key.meta || sequence.length !== 1) {
    return null;
  }
  return sequence >= ' ' && sequence !== '\x7f' ? sequence : null;
}

export function resolveTreeAction(key: KeyPress): TREE_ACTIONS | null {
  if (isQuit(key)) {
    return TREE_ACTIONS.QUIT;
  }
  if (key.ctrl || key.meta || !key.name) {
    return null;
  }
  return TREE_KEYMAP[key.name] ?? null;
}

export function resolveEditDialogAction(
  key: KeyPress,
  focusedField: EditChildField,
): EditDialogAction | null {
  switch (key.name) {
    case 'return':
    case 'enter':
      return { type: 'submit' };
    case 'escape':
      return { type: 'cancel' };
    case 'tab':
      return { type: 'focus', step: key.shift ? -1 : 1 };
    case 'up':
      return { type: 'focus', step: -1 };
    case 'down':
      return { type: 'focus', step: 1 };
    case 'backspace':
      return focusedField === 'proxied' ? null : { type: 'backspace' };
  }

  if (focusedField === 'proxied') {
    return key.name === 'space' ? { type: 'toggle' } : null;
  }

  const text = printable(key);
  return text === null ? null : { type: 'insert', text };
}

export function resolveConfirmDialogAction(key: KeyPress): ConfirmDialogAction | null {
  switch (key.name) {
    case 'y':
    case 'return':
    case 'enter':
      return { type: 'accept' };
    case 'n':
    case 'escape':
      return { type: 'cancel' };
    default:
      return null;
  }
}
