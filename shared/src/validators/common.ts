/**
 * Validators for common data validation across services
 */

import { ValidationError } from '../errors';

export const USERNAME_PATTERN = /^[A-Za-z0-9_]{3,50}$/;
export const MIN_PASSWORD_LENGTH = 6;

/**
 * Validate email format
 */
export function validateEmail(email: string): void {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  if (!emailRegex.test(email)) {
    throw ValidationError.forField('email', 'Invalid email format');
  }
}

/**
 * Usernames are 3-50 letters, digits or underscores.
 */
export function validateUsername(username: string): void {
  if (!USERNAME_PATTERN.test(username)) {
    throw ValidationError.forField('username', 'Username must be 3-50 characters of letters, digits or underscores');
  }
}

export function validatePassword(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw ValidationError.forField('password', `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
}

export type FormInput = Record<string, unknown>;

export function isFormInput(value: unknown): value is FormInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects per-field messages so a whole form can be rejected at once.
 */
export class FieldErrors {
  readonly errors: Record<string, string> = {};

  add(field: string, message: string): void {
    if (!(field in this.errors)) {
      this.errors[field] = message;
    }
  }

  has(field: string): boolean {
    return field in this.errors;
  }

  get isEmpty(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  throwIfAny(): void {
    if (!this.isEmpty) {
      throw new ValidationError({ ...this.errors });
    }
  }
}

/**
 * First non-blank value among `names`, trimmed. Numbers are accepted and stringified
 * since JSON clients send them unquoted.
 */
export function readString(input: FormInput, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = input[name];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

interface RangeOptions {
  min: number;
  max: number;
}

export function readInteger(
  input: FormInput,
  errors: FieldErrors,
  field: string,
  range: RangeOptions,
  fallback: number,
  ...aliases: string[]
): number;
export function readInteger(
  input: FormInput,
  errors: FieldErrors,
  field: string,
  range: RangeOptions,
  fallback: undefined,
  ...aliases: string[]
): number | undefined;
export function readInteger(
  input: FormInput,
  errors: FieldErrors,
  field: string,
  range: RangeOptions,
  fallback: number | undefined,
  ...aliases: string[]
): number | undefined {
  const raw = readString(input, field, ...aliases);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    errors.add(field, `${field} must be a whole number`);
    return fallback;
  }
  if (value < range.min || value > range.max) {
    errors.add(field, `${field} must be between ${range.min} and ${range.max}`);
    return fallback;
  }
  return value;
}

export function readNumber(
  input: FormInput,
  errors: FieldErrors,
  field: string,
  range: RangeOptions,
  fallback: number,
  ...aliases: string[]
): number {
  const raw = readString(input, field, ...aliases);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.add(field, `${field} must be a number`);
    return fallback;
  }
  if (value < range.min || value > range.max) {
    errors.add(field, `${field} must be between ${range.min} and ${range.max}`);
    return fallback;
  }
  return value;
}

export function readChoice<T extends string>(
  input: FormInput,
  errors: FieldErrors,
  field: string,
  choices: readonly T[],
  fallback: T,
  normalize: (raw: string) => string,
  ...aliases: string[]
): T {
  const raw = readString(input, field, ...aliases);
  if (raw === undefined) {
    return fallback;
  }
  const normalized = normalize(raw);
  const match = choices.find((choice) => choice === normalized);
  if (match === undefined) {
    errors.add(field, `${field} must be one of: ${choices.join(', ')}`);
    return fallback;
  }
  return match;
}

/**
 * Comma-separated list (or a JSON array of strings), blanks dropped.
 */
export function readList(input: FormInput, ...names: string[]): string[] {
  for (const name of names) {
    const value = input[name];
    if (Array.isArray(value)) {
      return value
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item !== '');
    }
    if (typeof value === 'string' && value.trim() !== '') {
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '');
    }
  }
  return [];
}
