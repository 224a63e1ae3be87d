// Wire schema derivation
// Walk a zod parameter schema and emit the JSON schema shown to callers

import { z } from 'zod';
import type { JsonSchema, ObjectJsonSchema } from './types.js';

// Element schema for arrays whose item type is not statically known.
// Downstream validators reject an `array` without `items`.
const GENERIC_ITEM: JsonSchema = { type: 'object' };

function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; defaultValue?: unknown } {
  let current = schema;
  let defaultValue: unknown;

  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      if (defaultValue === undefined) {
        defaultValue = current._def.defaultValue();
      }
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      return { inner: current, defaultValue };
    }
  }
}

function withMeta(base: JsonSchema, description: string | undefined, defaultValue: unknown): JsonSchema {
  const out: JsonSchema = { ...base };
  if (description) out.description = description;
  if (defaultValue !== undefined) out.default = defaultValue;
  return out;
}

export function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const { inner, defaultValue } = unwrap(schema);
  const description = schema.description ?? inner.description;

  if (inner instanceof z.ZodObject) {
    return withMeta(objectSchema(inner), description, defaultValue);
  }

  if (inner instanceof z.ZodArray) {
    const element: z.ZodTypeAny = inner.element;
    const { inner: elementInner } = unwrap(element);
    const items =
      elementInner instanceof z.ZodAny || elementInner instanceof z.ZodUnknown
        ? GENERIC_ITEM
        : toJsonSchema(element);
    return withMeta({ type: 'array', items }, description, defaultValue);
  }

  if (inner instanceof z.ZodNumber) {
    return withMeta({ type: inner.isInt ? 'integer' : 'number' }, description, defaultValue);
  }

  if (inner instanceof z.ZodBoolean) {
    return withMeta({ type: 'boolean' }, description, defaultValue);
  }

  if (inner instanceof z.ZodEnum) {
    const options: string[] = [...inner.options];
    return withMeta({ type: 'string', enum: options }, description, defaultValue);
  }

  if (inner instanceof z.ZodLiteral && typeof inner.value === 'string') {
    return withMeta({ type: 'string', enum: [inner.value] }, description, defaultValue);
  }

  if (inner instanceof z.ZodRecord || inner instanceof z.ZodAny || inner instanceof z.ZodUnknown) {
    return withMeta({ type: 'object' }, description, defaultValue);
  }

  if (inner instanceof z.ZodUnion) {
    const members: readonly z.ZodTypeAny[] = inner.options;
    return withMeta({ anyOf: members.map(member => toJsonSchema(member)) }, description, defaultValue);
  }

  return withMeta({ type: 'string' }, description, defaultValue);
}

export function objectSchema(schema: z.AnyZodObject): ObjectJsonSchema {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(shape)) {
    properties[key] = toJsonSchema(field);
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return { type: 'object', properties, required };
}

/**
 * Collect every `array` node lacking an `items` clause.
 * Returns dotted paths; empty for a well-formed schema.
 */
export function findArraysWithoutItems(schema: JsonSchema, path: string = '$'): string[] {
  const problems: string[] = [];

  if (schema.type === 'array' && !schema.items) {
    problems.push(path);
  }
  if (schema.items) {
    problems.push(...findArraysWithoutItems(schema.items, `${path}[]`));
  }
  (schema.anyOf ?? []).forEach((member, i) => {
    problems.push(...findArraysWithoutItems(member, `${path}|${i}`));
  });
  for (const [key, child] of Object.entries(schema.properties ?? {})) {
    problems.push(...findArraysWithoutItems(child, `${path}.${key}`));
  }

  return problems;
}
