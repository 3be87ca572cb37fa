import { BehaviorSubject, type Observable } from 'rxjs';

import type {
  ChildResource,
  MutationPayload,
  Result,
  ValidationError,
} from '@record-tree/core';

import {
  EDIT_CHILD_FIELDS,
  type EditChildField,
  type EditChildForm,
  packageEditChildForm,
  seedEditChildForm,
} from './edit-child-form';

/**
 * A suspended interaction. `result` settles exactly once: with a value on
 * success, with `undefined` on cancellation. Later settle attempts are no-ops.
 */
export class DialogSession<TResult> {
  public readonly result: Promise<TResult | undefined>;

  private readonly settleWith: (value: TResult | undefined) => void;
  private readonly settleListeners: Array<() => void> = [];
  private settledState = false;

  constructor() {
    let settle: (value: TResult | undefined) => void = () => undefined;
    this.result = new Promise<TResult | undefined>((resolve) => {
      settle = resolve;
    });
    this.settleWith = settle;
  }

  public get settled(): boolean {
    return this.settledState;
  }

  public cancel(): boolean {
    return this.resolveWith(undefined);
  }

  /** Runs `listener` synchronously when the dialog settles. */
  public onSettled(listener: () => void): void {
    if (this.settledState) {
      listener();
      return;
    }
    this.settleListeners.push(listener);
  }

  protected resolveWith(value: TResult | undefined): boolean {
    if (this.settledState) {
      return false;
    }

    this.settledState = true;
    this.settleWith(value);
    for (const listener of this.settleListeners.splice(0)) {
      listener();
    }
    return true;
  }
}

export class ConfirmDeleteDialog extends DialogSession<boolean> {
  public readonly kind = 'confirm-delete';

  constructor(public readonly childLabel: string) {
    super();
  }

  public accept(): boolean {
    return this.resolveWith(true);
  }
}

export class EditChildDialog extends DialogSession<MutationPayload> {
  public readonly kind = 'edit-child';
  public readonly form: EditChildForm;
  public readonly mode: 'create' | 'update';

  private focusedIndex = 0;
  private validationErrorState: ValidationError | null = null;

  constructor(
    public readonly parentLabel: string,
    private readonly existing?: ChildResource,
  ) {
    super();
    this.form = seedEditChildForm(parentLabel, existing);
    this.mode = existing ? 'update' : 'create';
  }

  public get focusedField(): EditChildField {
    return EDIT_CHILD_FIELDS[this.focusedIndex] ?? 'type';
  }

  public get validationError(): ValidationError | null {
    return this.validationErrorState;
  }

  public focusNext(step = 1): void {
    const count = EDIT_CHILD_FIELDS.length;
    this.focusedIndex = (((this.focusedIndex + step) % count) + count) % count;
  }

  public focus(field: EditChildField): void {
    this.focusedIndex = Math.max(0, EDIT_CHILD_FIELDS.indexOf(field));
  }

  public setText(field: Exclude<EditChildField, 'proxied'>, value: string): void {
    this.form[field] = value;
  }

  public setProxied(value: boolean): void {
    this.form.proxied = value;
  }

  /** Validates and, when the form is complete, resumes the caller with the payload. */
  public submit(): Result<MutationPayload, ValidationError> {
    const result = packageEditChildForm(this.parentLabel, this.form, this.existing);
    if (!result.ok) {
      this.validationErrorState = result.error;
      return result;
    }

    this.validationErrorState = null;
    this.resolveWith(result.value);
    return result;
  }
}

export type ActiveDialog = ConfirmDeleteDialog | EditChildDialog;

/** Runs one dialog at a time. Opening another cancels the current one. */
export class ModalWorkflowService {
  private readonly activeState = new BehaviorSubject<ActiveDialog | null>(null);

  public readonly active$: Observable<ActiveDialog | null> = this.activeState.asObservable();

  public get active(): ActiveDialog | null {
    return this.activeState.value;
  }

  /** Resolves `true` only on an explicit accept. */
  public async confirmDelete(childLabel: string): Promise<boolean> {
    const dialog = this.open(new ConfirmDeleteDialog(childLabel));
    return (await dialog.result) === true;
  }

  /** Resolves with the packaged payload, or `undefined` when cancelled. */
  public editChild(
    parentLabel: string,
    existing?: ChildResource,
  ): Promise<MutationPayload | undefined> {
    return this.open(new EditChildDialog(parentLabel, existing)).result;
  }

  public cancelActive(): void {
    this.activeState.value?.cancel();
  }

  public dispose(): void {
    this.cancelActive();
    this.activeState.complete();
  }

  private open<TDialog extends ActiveDialog>(dialog: TDialog): TDialog {
    this.cancelActive();
    this.activeState.next(dialog);

    dialog.onSettled(() => {
      if (this.activeState.value === dialog) {
        this.activeState.next(null);
      }
    });

    return dialog;
  }
}
