// Parameter schema declarations and their JSON Schema rendering

import type { FieldSchema, FieldType, ParameterSchema, WireValue } from './types.js';

interface FieldOptions<T extends WireValue> {
  description: string;
  required?: boolean;
  default?: T;
}

interface NumberFieldOptions extends FieldOptions<number> {
  integer?: boolean;
  min?: number;
  max?: number;
}

function build(name: string, type: FieldType, options: FieldOptions<WireValue>): FieldSchema {
  const schema: FieldSchema = {
    name,
    type,
    required: options.required ?? false,
    description: options.description
  };
  if (options.default !== undefined) {
    schema.default = options.default;
  }
  return schema;
}

// Builders used by catalog modules to declare their parameters
export const field = {
  string(name: string, options: FieldOptions<string>): FieldSchema {
    return build(name, { kind: 'string' }, options);
  },

  number(name: string, options: NumberFieldOptions): FieldSchema {
    const { integer, min, max, ...rest } = options;
    return build(name, { kind: 'number', integer, min, max }, rest);
  },

  boolean(name: string, options: FieldOptions<boolean>): FieldSchema {
    return build(name, { kind: 'boolean' }, options);
  },

  enum<const T extends readonly [string, ...string[]]>(name: string, values: T, options: FieldOptions<T[number]>): FieldSchema {
    return build(name, { kind: 'enum', values }, options);
  },

  array(name: string, items: FieldType, options: FieldOptions<WireValue[]>): FieldSchema {
    return build(name, { kind: 'array', items }, options);
  },

  object(name: string, options: FieldOptions<{ [key: string]: WireValue }>): FieldSchema {
    return build(name, { kind: 'object' }, options);
  }
};

export function describeType(type: FieldType): string {
  switch (type.kind) {
    case 'number':
      return type.integer ? 'integer' : 'number';
    case 'enum':
      return type.values.map((value) => JSON.stringify(value)).join(' | ');
    case 'array':
      return `array<${describeType(type.items)}>`;
    default:
      return type.kind;
  }
}

export type JsonSchema = { [key: string]: WireValue };

function typeToJsonSchema(type: FieldType): JsonSchema {
  switch (type.kind) {
    case 'string':
    case 'boolean':
    case 'object':
      return { type: type.kind };
    case 'number': {
      const schema: JsonSchema = { type: type.integer ? 'integer' : 'number' };
      if (type.min !== undefined) schema.minimum = type.min;
      if (type.max !== undefined) schema.maximum = type.max;
      return schema;
    }
    case 'enum':
      return { type: 'string', enum: [...type.values] };
    case 'array':
      return { type: 'array', items: typeToJsonSchema(type.items) };
  }
}

export interface ObjectJsonSchema {
  [key: string]: WireValue;
  type: 'object';
  properties: { [key: string]: WireValue };
  required: string[];
}

/**
 * Renders a parameter schema as the JSON Schema object advertised in tool
 * listings. Only fields that are required and carry no default are listed
 * under `required`, mirroring what the validator enforces.
 */
export function toJsonSchema(schema: ParameterSchema): ObjectJsonSchema {
  const properties: { [key: string]: WireValue } = {};
  const required: string[] = [];

  for (const fieldSchema of schema) {
    const property = typeToJsonSchema(fieldSchema.type);
    property.description = fieldSchema.description;
    if (fieldSchema.default !== undefined) {
      property.default = fieldSchema.default;
    }
    properties[fieldSchema.name] = property;

    if (isRequiredField(fieldSchema)) {
      required.push(fieldSchema.name);
    }
  }

  return { type: 'object', properties, required };
}

export function isRequiredField(fieldSchema: FieldSchema): boolean {
  return fieldSchema.required && fieldSchema.default === undefined;
}
