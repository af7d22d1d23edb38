import { ValidationError } from '../common/errors.js';
import type { JsonType } from '../types/rpc.js';

import { isJsonObject } from './envelope.js';

/**
 * One schema entry: a single accepted type, a set of accepted types, or a nested object schema.
 */
export type SchemaRule =
  | { readonly kind: 'type'; readonly type: JsonType }
  | { readonly kind: 'types'; readonly types: readonly JsonType[] }
  | { readonly kind: 'nested'; readonly schema: Schema };

export type Schema = Readonly<Record<string, SchemaRule>>;

export function jsonType(type: JsonType): SchemaRule {
  return { kind: 'type', type };
}

export function types(...accepted: JsonType[]): SchemaRule {
  return { kind: 'types', types: accepted };
}

export function nested(schema: Schema): SchemaRule {
  return { kind: 'nested', schema };
}

/**
 * Classifies a decoded JSON value. Never returns the umbrella `number`.
 */
export function jsonTypeOf(value: unknown): Exclude<JsonType, 'number'> {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

function matches(expected: JsonType, actual: Exclude<JsonType, 'number'>): boolean {
  if (expected === 'number') {
    return actual === 'integer' || actual === 'float';
  }

  return expected === actual;
}

function joinPath(parent: string, key: string): string {
  return parent.length === 0 ? key : `${parent}.${key}`;
}

function validateObject(value: Record<string, unknown>, schema: Schema, parentPath: string): void {
  for (const [key, rule] of Object.entries(schema)) {
    const path = joinPath(parentPath, key);

    if (!Object.hasOwn(value, key)) {
      const expected = rule.kind === 'type' ? [rule.type] : rule.kind === 'types' ? rule.types : ['object' as const];
      throw new ValidationError(`Missing key: ${path}`, path, expected, 'missing');
    }

    const field = value[key];
    const actual = jsonTypeOf(field);

    switch (rule.kind) {
      case 'type':
        if (!matches(rule.type, actual)) {
          throw new ValidationError(
            `Wrong type for key '${path}' (expected ${rule.type}, got ${actual})`,
            path,
            [rule.type],
            actual,
          );
        }
        break;
      case 'types':
        if (!rule.types.some((type) => matches(type, actual))) {
          throw new ValidationError(
            `Wrong type for key '${path}' (expected one of [${rule.types.join(', ')}], got ${actual})`,
            path,
            rule.types,
            actual,
          );
        }
        break;
      case 'nested':
        if (!isJsonObject(field)) {
          throw new ValidationError(`Expected object at key: ${path}`, path, ['object'], actual);
        }
        validateObject(field, rule.schema, path);
        break;
    }
  }
}

/**
 * Checks that `value` is an object holding every key of `schema` with an accepted type.
 * Throws a ValidationError for the first violation, in schema key order.
 */
export function validate(value: unknown, schema: Schema): void {
  if (!isJsonObject(value)) {
    throw new ValidationError('Top-level JSON must be an object.', '', ['object'], jsonTypeOf(value));
  }

  validateObject(value, schema, '');
}
