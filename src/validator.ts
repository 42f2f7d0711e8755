// Schema Validator: checks an input mapping against a parameter schema

// External packages
import { z } from 'zod';

// Local modules
import type { FieldSchema, FieldType, ParameterSchema, ValidationResult, Violation } from './types.js';

const compiledSchemas = new WeakMap<ParameterSchema, z.ZodTypeAny>();

function compileType(type: FieldType): z.ZodTypeAny {
  switch (type.kind) {
    case 'string':
      return z.string();
    case 'number': {
      let schema = type.integer ? z.number().int() : z.number();
      if (type.min !== undefined) schema = schema.min(type.min);
      if (type.max !== undefined) schema = schema.max(type.max);
      return schema;
    }
    case 'boolean':
      return z.boolean();
    case 'enum':
      return z.enum(type.values);
    case 'array':
      return z.array(compileType(type.items));
    case 'object':
      return z.record(z.unknown());
  }
}

function compileField(fieldSchema: FieldSchema): z.ZodTypeAny {
  const base = compileType(fieldSchema.type);
  const fallback = fieldSchema.default;
  if (fallback !== undefined) {
    // Cloned per call so handlers never share a mutable default
    return base.default(() => structuredClone(fallback));
  }
  return fieldSchema.required ? base : base.optional();
}

// Unknown keys pass through untouched for forward-compatible clients.
function compileSchema(schema: ParameterSchema): z.ZodTypeAny {
  const cached = compiledSchemas.get(schema);
  if (cached) return cached;

  const shape: z.ZodRawShape = {};
  for (const fieldSchema of schema) {
    shape[fieldSchema.name] = compileField(fieldSchema);
  }
  const compiled = z.object(shape).passthrough();
  compiledSchemas.set(schema, compiled);
  return compiled;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(input: Record<string, unknown>, path: (string | number)[]): unknown {
  let current: unknown = input;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

// ["sources", 2, "url"] -> "sources[2].url"
export function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((formatted, segment) => {
    if (typeof segment === 'number') return `${formatted}[${segment}]`;
    return formatted ? `${formatted}.${segment}` : segment;
  }, '');
}

function toViolation(issue: z.ZodIssue, input: Record<string, unknown>): Violation {
  const field = formatPath(issue.path);
  const actual = valueAt(input, issue.path);

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === z.ZodParsedType.undefined && issue.path.length === 1) {
        return { kind: 'MissingField', field };
      }
      return { kind: 'TypeMismatch', field, expected: issue.expected, actual: issue.received };
    case z.ZodIssueCode.invalid_enum_value:
      return {
        kind: 'TypeMismatch',
        field,
        expected: issue.options.map((option) => JSON.stringify(option)).join(' | '),
        actual: JSON.stringify(issue.received)
      };
    case z.ZodIssueCode.too_small:
      if (typeof actual === 'number') {
        return { kind: 'OutOfRange', field, bound: Number(issue.minimum), actual };
      }
      break;
    case z.ZodIssueCode.too_big:
      if (typeof actual === 'number') {
        return { kind: 'OutOfRange', field, bound: Number(issue.maximum), actual };
      }
      break;
  }

  return { kind: 'TypeMismatch', field, expected: issue.message, actual: z.getParsedType(actual) };
}

/**
 * Validates `input` against `schema`, substituting defaults for absent
 * fields. Every violation is collected, in declared field order, so a client
 * can correct all of them in one round trip.
 */
export function validate(schema: ParameterSchema, input: Record<string, unknown>): ValidationResult {
  const result = compileSchema(schema).safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, violations: result.error.issues.map((issue) => toViolation(issue, input)) };
}

export function describeViolation(violation: Violation): string {
  switch (violation.kind) {
    case 'MissingField':
      return `${violation.field}: required field is missing`;
    case 'TypeMismatch':
      return `${violation.field}: expected ${violation.expected}, received ${violation.actual}`;
    case 'OutOfRange':
      return `${violation.field}: ${violation.actual} is outside the allowed bound ${violation.bound}`;
  }
}
