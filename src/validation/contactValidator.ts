import { ValidationError } from '../lib/errors';
import logger from '../lib/logger';
import { ContactField, ContactInput, RawContactInput } from '../model/contact';

export type ContactInputKey = keyof ContactInput;

interface FieldRule {
  column: ContactField;
  alias: Uncapitalize<ContactField>;
  required: boolean;
  maxLength: number;
  pattern?: RegExp;
}

export const FIELD_RULES: Readonly<Record<ContactInputKey, Readonly<FieldRule>>> = Object.freeze({
  name: {
    column: 'Name',
    alias: 'name',
    required: true,
    maxLength: 25,
    pattern: /^[a-zA-Z. ]+$/,
  },
  lastname: {
    column: 'Lastname',
    alias: 'lastname',
    required: true,
    maxLength: 25,
    pattern: /^[a-zA-Z. -]+$/,
  },
  phone: {
    column: 'Phone',
    alias: 'phone',
    required: false,
    maxLength: 25,
    pattern: /^(\d{3}|\(\d{3}\))?[\s.-]?\d{3}[\s.-]\d{4}(\s*(ext\.?|x)\s*\d{2,5})?$/,
  },
  direction: {
    column: 'Direction',
    alias: 'direction',
    required: false,
    maxLength: 150,
  },
  email: {
    column: 'Email',
    alias: 'email',
    required: false,
    maxLength: 50,
    pattern: /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9._%+-]+\.[a-zA-Z]{2,4}$/,
  },
  web: {
    column: 'Web',
    alias: 'web',
    required: false,
    maxLength: 150,
    pattern: /^(https?:\/\/)?(www\.)?([a-zA-Z0-9_%-]+\.)*[a-zA-Z0-9_%-]+\.[a-zA-Z]{2,5}(\/\S*)?$/,
  },
});

const FIELD_ORDER: readonly ContactInputKey[] = ['name', 'lastname', 'phone', 'direction', 'email', 'web'];

export type FieldCheck =
  | { ok: true; value: string | null }
  | { ok: false; error: ValidationError };

export type ValidationResult =
  | { valid: true; contact: ContactInput; errors: ValidationError[] }
  | { valid: false; errors: ValidationError[] };

/**
 * Checks one value against the rule of `field`. Blank values are treated
 * as absent, which is only an error for required fields.
 */
export function checkField(field: ContactInputKey, raw: unknown): FieldCheck {
  const rule = FIELD_RULES[field];

  if (raw === undefined || raw === null) {
    return rule.required
      ? { ok: false, error: new ValidationError(rule.column, raw, 'Missing required value') }
      : { ok: true, value: null };
  }
  if (typeof raw !== 'string') {
    return { ok: false, error: new ValidationError(rule.column, raw, 'Expected text') };
  }

  const value = raw.trim();
  if (value === '') {
    return rule.required
      ? { ok: false, error: new ValidationError(rule.column, raw, 'Missing required value') }
      : { ok: true, value: null };
  }
  if (value.length > rule.maxLength) {
    return {
      ok: false,
      error: new ValidationError(rule.column, raw, `Longer than ${rule.maxLength} characters`),
    };
  }
  if (rule.pattern && !rule.pattern.test(value)) {
    return { ok: false, error: new ValidationError(rule.column, raw) };
  }
  return { ok: true, value };
}

export function readRawField(input: RawContactInput, field: ContactInputKey): unknown {
  const rule = FIELD_RULES[field];
  return input[rule.column] ?? input[rule.alias];
}

/**
 * Validates a raw contact. Optional fields that fail are dropped and the
 * record carries on without them; a failing required field makes the whole
 * record invalid.
 */
export function validateContact(input: RawContactInput): ValidationResult {
  const errors: ValidationError[] = [];
  const values: Partial<Record<ContactInputKey, string | null>> = {};

  for (const field of FIELD_ORDER) {
    const check = checkField(field, readRawField(input, field));
    if (check.ok) {
      values[field] = check.value;
      continue;
    }

    errors.push(check.error);
    values[field] = null;
    if (FIELD_RULES[field].required) {
      logger.error(`[ContactValidator] ${check.error.message}`, { field: check.error.field });
    } else {
      logger.warn(`[ContactValidator] ${check.error.message}; field dropped`, { field: check.error.field });
    }
  }

  const { name, lastname } = values;
  if (!name || !lastname) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors,
    contact: {
      name,
      lastname,
      phone: values.phone ?? null,
      direction: values.direction ?? null,
      email: values.email ?? null,
      web: values.web ?? null,
    },
  };
}
