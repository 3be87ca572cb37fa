import { TREE_NODE_KINDS, type TreeRowViewModel } from '@record-tree/core';

import { EDIT_CHILD_FIELDS } from '../services/edit-child-form';
import type { ActiveDialog } from '../services/modal-workflow.service';
import type { TreeNotification } from '../services/notification.service';

export interface ScreenModel {
  title: string;
  rows: readonly TreeRowViewModel[];
  selectedKey: string | null;
  dialog: ActiveDialog | null;
  notifications: readonly TreeNotification[];
  busy: boolean;
  rootLoading: boolean;
  rootError: string | null;
}

export const KEY_HINTS = 'r refresh · a add · e edit · d delete · enter open · q quit';

const INDENT = '  ';

const SEVERITY_TAGS: Record<TreeNotification['severity'], string> = {
  info: '[info]',
  warning: '[warn]',
  error: '[error]',
};

function rowGlyph(row: TreeRowViewModel): string {
  switch (row.kind) {
    case TREE_NODE_KINDS.PARENT:
      return row.expanded ? '▾' : '▸';
    case TREE_NODE_KINDS.ERROR:
      return '!';
    case TREE_NODE_KINDS.PLACEHOLDER:
    case TREE_NODE_KINDS.INFO:
      return '·';
    default:
      return '-';
  }
}

export function renderRow(row: TreeRowViewModel, selected: boolean): string {
  const cursor = selected ? '>' : ' ';
  const loading = row.loading ? ' (loading)' : '';
  return `${cursor} ${INDENT.repeat(row.level)}${rowGlyph(row)} ${row.label}${loading}`;
}

export function renderDialog(dialog: ActiveDialog): string[] {
  if (dialog.kind === 'confirm-delete') {
    return [`Delete ${dialog.childLabel}?`, '  y accept · n cancel'];
  }

  const verb = dialog.mode === 'create' ? 'New record in' : 'Edit record in';
  const lines = [`${verb} ${dialog.parentLabel}`];
  for (const field of EDIT_CHILD_FIELDS) {
    const marker = dialog.focusedField === field ? '>' : ' ';
    const value =
      field === 'proxied' ? (dialog.form.proxied ? 'x' : ' ') : dialog.form[field];
    lines.push(`${marker} ${field.padEnd(8)}[${value}]`);
  }
  if (dialog.validationError) {
    lines.push(`  ${dialog.validationError.message}`);
  }
  lines.push('  tab next · space toggle · enter save · esc cancel');
  return lines;
}

export function renderNotification(notification: TreeNotification): string {
  return `${SEVERITY_TAGS[notification.severity]} ${notification.title}: ${notification.message}`;
}

/** Lines for one full frame, top to bottom. */
export function renderScreen(model: ScreenModel): string[] {
  const lines = [`${model.title}  (${KEY_HINTS})`, ''];

  if (model.rootLoading && model.rows.length === 0) {
    lines.push('  Loading…');
  } else if (model.rows.length === 0) {
    lines.push(model.rootError ? `  ! ${model.rootError}` : '  Nothing to show');
  }
  for (const row of model.rows) {
    lines.push(renderRow(row, row.key === model.selectedKey));
  }

  if (model.dialog) {
    lines.push('', ...renderDialog(model.dialog));
  }

  if (model.busy || model.notifications.length > 0) {
    lines.push('');
  }
  if (model.busy) {
    lines.push('Saving…');
  }
  for (const notification of model.notifications) {
    lines.push(renderNotification(notification));
  }

  return lines;
}
