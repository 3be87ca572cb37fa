import {
  AUTOMATIC_TTL,
  type ChildResource,
  type MutationPayload,
  type Result,
  ValidationError,
  err,
  ok,
} from '@record-tree/core';

/** Name field value standing for the zone apex. */
export const APEX_NAME = '@';

export interface EditChildForm {
  type: string;
  name: string;
  content: string;
  ttl: string;
  proxied: boolean;
}

export type EditChildField = keyof EditChildForm;

export const EDIT_CHILD_FIELDS: readonly EditChildField[] = [
  'type',
  'name',
  'content',
  'ttl',
  'proxied',
];

export const DEFAULT_RECORD_TYPE = 'A';

/** `example.com` → `@`, `www.example.com` → `www` under parent `example.com`. */
export function toNameField(parentLabel: string, name: string): string {
  if (name === parentLabel) {
    return APEX_NAME;
  }

  const suffix = `.${parentLabel}`;
  return name.endsWith(suffix) ? name.slice(0, -suffix.length) : name;
}

/** Inverse of toNameField: `@` → parent, `www` → `www.<parent>`. */
export function fromNameField(parentLabel: string, field: string): string {
  const name = field.trim();
  if (name === APEX_NAME) {
    return parentLabel;
  }
  if (name === parentLabel || name.endsWith(`.${parentLabel}`)) {
    return name;
  }
  return `${name}.${parentLabel}`;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Whole base-10 integer; anything else, or anything past 2^53, means automatic. */
export function parseTtl(value: string): number {
  const text = value.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return AUTOMATIC_TTL;
  }
  const parsed = Number(text);
  return Number.isSafeInteger(parsed) ? parsed : AUTOMATIC_TTL;
}

export function seedEditChildForm(parentLabel: string, existing?: ChildResource): EditChildForm {
  if (!existing) {
    return {
      type: DEFAULT_RECORD_TYPE,
      name: APEX_NAME,
      content: '',
      ttl: String(AUTOMATIC_TTL),
      proxied: true,
    };
  }

  return {
    type: existing.type,
    name: toNameField(parentLabel, existing.name),
    content: existing.content,
    ttl: String(existing.ttl),
    proxied: existing.proxied,
  };
}

/**
 * Builds the gateway payload. Only emptiness is checked; whether the content
 * suits the type is left to the remote service.
 */
export function packageEditChildForm(
  parentLabel: string,
  form: EditChildForm,
  existing?: ChildResource,
): Result<MutationPayload, ValidationError> {
  const missing = (['type', 'name', 'content'] as const).filter(
    (field) => form[field].trim().length === 0,
  );
  if (missing.length > 0) {
    return err(new ValidationError(missing));
  }

  const payload: MutationPayload = {
    type: form.type.trim().toUpperCase(),
    name: fromNameField(parentLabel, form.name),
    content: form.content,
    ttl: parseTtl(form.ttl),
    proxied: form.proxied,
  };

  if (existing?.priority !== undefined) {
    payload.priority = existing.priority;
  }

  return ok(payload);
}
