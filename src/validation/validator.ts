/**
 * Gateway - Input Validator
 *
 * Checks a prediction payload field by field and reports every problem in one
 * pass. Values that are valid but statistically unusual are returned as anomaly
 * codes for logging, never rejected.
 */

import { isRecord } from '../utils/helpers.js';
import { ValidationError, type FieldErrors } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export type PassengerClass = 1 | 2 | 3;
export type Sex = 'male' | 'female';
export type Port = 'C' | 'Q' | 'S';

export interface PassengerFeatures {
  readonly pclass: PassengerClass;
  readonly sex: Sex;
  readonly age: number;
  readonly sibsp: number;
  readonly parch: number;
  readonly fare: number;
  readonly embarked: Port;
}

export type AnomalyCode =
  | 'zero_fare'
  | 'age_above_typical'
  | 'sibsp_above_typical'
  | 'parch_above_typical'
  | 'large_family_size'
  | 'child_high_fare'
  | 'first_class_low_fare'
  | 'third_class_high_fare';

export interface ValidationResult {
  features: PassengerFeatures;
  anomalies: AnomalyCode[];
}

// =============================================================================
// Limits and Patterns
// =============================================================================

export const FIELD_LIMITS = {
  age: { min: 0, max: 120, typicalMax: 80 },
  fare: { min: 0, max: 1000, typicalMax: 500 },
  sibsp: { min: 0, max: 20, typicalMax: 8 },
  parch: { min: 0, max: 20, typicalMax: 9 },
} as const;

export const MAX_STRING_LENGTH = 100;

const PASSENGER_FIELDS = ['pclass', 'sex', 'age', 'sibsp', 'parch', 'fare', 'embarked'] as const;
const KNOWN_FIELDS: ReadonlySet<string> = new Set(PASSENGER_FIELDS);

const CONTROL_CHARACTERS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/;
const MARKUP_INJECTION = /(<script|<iframe|<object|<embed|javascript:|vbscript:|on\w+\s*=)/i;
const SQL_INJECTION =
  /(\b(union|select|insert|update|delete|drop|create|alter|exec|execute)\b|['";]|--|\*|\/\*|\*\/)/i;
const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

// =============================================================================
// Field Checks
// =============================================================================

/**
 * Problems with a string value, checked before any interpretation of it
 */
export function inspectString(value: string): string[] {
  const problems: string[] = [];

  if (value.length > MAX_STRING_LENGTH) {
    problems.push(`must be at most ${MAX_STRING_LENGTH} characters`);
  }
  if (CONTROL_CHARACTERS.test(value)) {
    problems.push('contains control characters');
  }
  if (MARKUP_INJECTION.test(value)) {
    problems.push('contains disallowed markup');
  }
  if (SQL_INJECTION.test(value)) {
    problems.push('contains disallowed characters or keywords');
  }

  return problems;
}

type FieldCheck<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function readNumber(raw: unknown): FieldCheck<number> {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : { ok: false, errors: ['must be a finite number'] };
  }

  if (typeof raw === 'string') {
    const problems = inspectString(raw);
    if (problems.length > 0) {
      return { ok: false, errors: problems };
    }
    const trimmed = raw.trim();
    if (NUMERIC_STRING.test(trimmed)) {
      return { ok: true, value: Number(trimmed) };
    }
  }

  return { ok: false, errors: ['must be a number'] };
}

function readInteger(raw: unknown): FieldCheck<number> {
  const number = readNumber(raw);
  if (number.ok && !Number.isInteger(number.value)) {
    return { ok: false, errors: ['must be an integer'] };
  }
  return number;
}

function checkRange(value: number, min: number, max: number): FieldCheck<number> {
  if (value < min || value > max) {
    return { ok: false, errors: [`must be between ${min} and ${max}`] };
  }
  return { ok: true, value };
}

function readChoice<T extends string>(
  raw: unknown,
  choices: readonly T[],
  normalize: (value: string) => string
): FieldCheck<T> {
  if (typeof raw !== 'string') {
    return { ok: false, errors: ['must be a string'] };
  }

  const problems = inspectString(raw);
  if (problems.length > 0) {
    return { ok: false, errors: problems };
  }

  const normalized = normalize(raw.normalize('NFKC').trim());
  const match = choices.find((choice) => choice === normalized);
  if (match === undefined) {
    return { ok: false, errors: [`must be one of ${choices.join(', ')}`] };
  }
  return { ok: true, value: match };
}

const PASSENGER_CLASSES: readonly PassengerClass[] = [1, 2, 3];

function readPassengerClass(raw: unknown): FieldCheck<PassengerClass> {
  const number = readInteger(raw);
  if (!number.ok) {
    return number;
  }
  const match = PASSENGER_CLASSES.find((pclass) => pclass === number.value);
  return match === undefined ? { ok: false, errors: ['must be one of 1, 2, 3'] } : { ok: true, value: match };
}

function andThen<T, U>(check: FieldCheck<T>, next: (value: T) => FieldCheck<U>): FieldCheck<U> {
  return check.ok ? next(check.value) : check;
}

// =============================================================================
// Anomalies
// =============================================================================

export function detectAnomalies(features: PassengerFeatures): AnomalyCode[] {
  const anomalies: AnomalyCode[] = [];
  const familySize = features.sibsp + features.parch + 1;

  if (features.fare === 0) {
    anomalies.push('zero_fare');
  }
  if (features.age > FIELD_LIMITS.age.typicalMax) {
    anomalies.push('age_above_typical');
  }
  if (features.sibsp > FIELD_LIMITS.sibsp.typicalMax) {
    anomalies.push('sibsp_above_typical');
  }
  if (features.parch > FIELD_LIMITS.parch.typicalMax) {
    anomalies.push('parch_above_typical');
  }
  if (familySize > 10) {
    anomalies.push('large_family_size');
  }
  if (features.age < 12 && features.fare > 100) {
    anomalies.push('child_high_fare');
  }
  if (features.pclass === 1 && features.fare < 20) {
    anomalies.push('first_class_low_fare');
  }
  if (features.pclass === 3 && features.fare > 100) {
    anomalies.push('third_class_high_fare');
  }

  return anomalies;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Validate a decoded JSON body. Throws ValidationError listing every field problem.
 */
export function validatePassenger(raw: unknown): ValidationResult {
  if (!isRecord(raw)) {
    throw new ValidationError('Request body must be a JSON object', {
      _body: ['must be a JSON object'],
    });
  }

  // Keyed by whatever the caller sent, so a Map keeps names like __proto__ as data
  const errors = new Map<string, string[]>();

  for (const field of Object.keys(raw)) {
    if (!KNOWN_FIELDS.has(field)) {
      errors.set(field, ['is not a recognized field']);
    }
  }

  const read = <T>(field: (typeof PASSENGER_FIELDS)[number], check: (value: unknown) => FieldCheck<T>): T | undefined => {
    const value = raw[field];
    if (value === undefined || value === null) {
      errors.set(field, ['is required']);
      return undefined;
    }
    const result = check(value);
    if (!result.ok) {
      errors.set(field, result.errors);
      return undefined;
    }
    return result.value;
  };

  const pclass = read('pclass', readPassengerClass);
  const sex = read('sex', (value) => readChoice<Sex>(value, ['male', 'female'], (s) => s.toLowerCase()));
  const age = read('age', (value) =>
    andThen(readNumber(value), (n) => checkRange(n, FIELD_LIMITS.age.min, FIELD_LIMITS.age.max))
  );
  const sibsp = read('sibsp', (value) =>
    andThen(readInteger(value), (n) => checkRange(n, FIELD_LIMITS.sibsp.min, FIELD_LIMITS.sibsp.max))
  );
  const parch = read('parch', (value) =>
    andThen(readInteger(value), (n) => checkRange(n, FIELD_LIMITS.parch.min, FIELD_LIMITS.parch.max))
  );
  const fare = read('fare', (value) =>
    andThen(readNumber(value), (n) => checkRange(n, FIELD_LIMITS.fare.min, FIELD_LIMITS.fare.max))
  );
  const embarked = read('embarked', (value) =>
    readChoice<Port>(value, ['C', 'Q', 'S'], (s) => s.toUpperCase())
  );

  if (
    errors.size > 0 ||
    pclass === undefined ||
    sex === undefined ||
    age === undefined ||
    sibsp === undefined ||
    parch === undefined ||
    fare === undefined ||
    embarked === undefined
  ) {
    const fieldErrors: FieldErrors = Object.fromEntries(errors);
    throw new ValidationError('Request validation failed', fieldErrors);
  }

  const features: PassengerFeatures = Object.freeze({ pclass, sex, age, sibsp, parch, fare, embarked });
  return { features, anomalies: detectAnomalies(features) };
}
