import { emitKeypressEvents } from 'node:readline';
import { merge, type Subscription } from 'rxjs';

import type { AppState } from '../app-state';
import type { ConfirmDeleteDialog, EditChildDialog } from '../services/modal-workflow.service';
import {
  type KeyPress,
  TREE_ACTIONS,
  resolveConfirmDialogAction,
  resolveEditDialogAction,
  resolveTreeAction,
} from './keymap';
import { type ScreenModel, renderScreen } from './screen';

/** The parts of stdin the app relies on; raw mode only applies to a TTY. */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

export interface TerminalStreams {
  input: TerminalInput;
  output: TerminalOutput;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/** Binds an AppState to a terminal: keypresses in, full redraws out. */
export class TerminalApp {
  private readonly pending = new Set<Promise<unknown>>();
  private subscription: Subscription | null = null;
  private resolveQuit: (() => void) | null = null;
  private stopped = false;
  private readonly onKeypress = (_text: string | undefined, key: KeyPress | undefined) => {
    if (key) {
      this.handleKey(key);
    }
  };

  constructor(
    private readonly state: AppState,
    private readonly streams: TerminalStreams = { input: process.stdin, output: process.stdout },
    private readonly title = state.store.root.label,
  ) {}

  /** Loads the zones and resolves once the operator quits. */
  public run(): Promise<void> {
    const { input, output } = this.streams;
    const quit = new Promise<void>((resolve) => {
      this.resolveQuit = resolve;
    });

    emitKeypressEvents(input);
    if (input.isTTY) {
      input.setRawMode?.(true);
    }
    input.on('keypress', this.onKeypress);
    input.resume();
    output.write(HIDE_CURSOR);

    this.subscription = merge(
      this.state.controller.changes$,
      this.state.dialogs.active$,
      this.state.notifications.notifications$,
      this.state.dispatcher.busy$,
    ).subscribe(() => this.render());

    this.track(this.state.controller.loadRoot());
    return quit;
  }

  public stop(): void {
    const { input, output } = this.streams;
    this.stopped = true;
    this.subscription?.unsubscribe();
    this.subscription = null;
    input.removeListener('keypress', this.onKeypress);
    if (input.isTTY) {
      input.setRawMode?.(false);
    }
    input.pause();
    output.write(SHOW_CURSOR);
    this.state.dispatcher.cancel();
    this.state.dialogs.cancelActive();
    this.resolveQuit?.();
    this.resolveQuit = null;
  }

  /** Settles once every action started by a keypress has finished. */
  public async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  public screen(): ScreenModel {
    const { controller, dialogs, notifications, dispatcher } = this.state;
    return {
      title: this.title,
      rows: controller.rows,
      selectedKey: controller.selectedRow?.key ?? null,
      dialog: dialogs.active,
      notifications: notifications.notifications,
      busy: dispatcher.busy,
      rootLoading: controller.rootLoading,
      rootError: controller.rootError?.message ?? null,
    };
  }

  public render(): void {
    if (this.stopped) {
      return;
    }
    this.streams.output.write(`${CLEAR_SCREEN}${renderScreen(this.screen()).join('\n')}\n`);
  }

  public handleKey(key: KeyPress): void {
    if (key.ctrl && key.name === 'c') {
      this.stop();
      return;
    }

    const dialog = this.state.dialogs.active;
    if (dialog?.kind === 'edit-child') {
      this.handleEditKey(dialog, key);
    } else if (dialog?.kind === 'confirm-delete') {
      this.handleConfirmKey(dialog, key);
    } else {
      this.handleTreeKey(key);
    }
    this.render();
  }

  private handleTreeKey(key: KeyPress): void {
    const { controller, actions } = this.state;

    switch (resolveTreeAction(key)) {
      case TREE_ACTIONS.QUIT:
        this.stop();
        return;
      case TREE_ACTIONS.REFRESH:
        this.track(controller.refresh());
        return;
      case TREE_ACTIONS.ADD:
        this.track(actions.addChild());
        return;
      case TREE_ACTIONS.EDIT:
        this.track(actions.editSelected());
        return;
      case TREE_ACTIONS.DELETE:
        this.track(actions.deleteSelected());
        return;
      case TREE_ACTIONS.ACTIVATE:
        this.track(controller.activate());
        return;
      case TREE_ACTIONS.UP:
        controller.moveCursor(-1);
        return;
      case TREE_ACTIONS.DOWN:
        controller.moveCursor(1);
        return;
      case TREE_ACTIONS.COLLAPSE:
      case TREE_ACTIONS.EXPAND:
        this.track(controller.toggleExpanded());
        return;
      case null:
        return;
    }
  }

  private handleEditKey(dialog: EditChildDialog, key: KeyPress): void {
    const action = resolveEditDialogAction(key, dialog.focusedField);
    if (!action) {
      return;
    }

    const field = dialog.focusedField;
    switch (action.type) {
      case 'submit':
        dialog.submit();
        return;
      case 'cancel':
        dialog.cancel();
        return;
      case 'focus':
        dialog.focusNext(action.step);
        return;
      case 'toggle':
        dialog.setProxied(!dialog.form.proxied);
        return;
      case 'backspace':
        if (field !== 'proxied') {
          dialog.setText(field, dialog.form[field].slice(0, -1));
        }
        return;
      case 'insert':
        if (field !== 'proxied') {
          dialog.setText(field, `${dialog.form[field]}${action.text}`);
        }
        return;
    }
  }

  private handleConfirmKey(dialog: ConfirmDeleteDialog, key: KeyPress): void {
    const action = resolveConfirmDialogAction(key);
    if (action?.type === 'accept') {
      dialog.accept();
    } else if (action?.type === 'cancel') {
      dialog.cancel();
    }
  }

  private track(work: Promise<unknown>): void {
    const tracked = work
      .catch((error: unknown) => {
        this.state.logger.error({ err: error }, 'action failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
