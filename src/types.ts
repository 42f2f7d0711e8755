// Type definitions for capability descriptors, invocations and envelopes

import type { ServerConfig } from './config.js';
import type { Logger } from './logger.js';
import type { ValidatedInput } from './validated-input.js';

// Values that survive JSON serialization unchanged
export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

// Parameter schemas

export type FieldType =
  | { kind: 'string' }
  | { kind: 'number'; integer?: boolean; min?: number; max?: number }
  | { kind: 'boolean' }
  | { kind: 'enum'; values: readonly [string, ...string[]] }
  | { kind: 'array'; items: FieldType }
  | { kind: 'object' };

export interface FieldSchema {
  name: string;
  type: FieldType;
  required: boolean;
  default?: WireValue;
  description: string;
}

// Field order is significant: violations are reported in this order.
export type ParameterSchema = readonly FieldSchema[];

export type Violation =
  | { kind: 'MissingField'; field: string }
  | { kind: 'TypeMismatch'; field: string; expected: string; actual: string }
  | { kind: 'OutOfRange'; field: string; bound: number; actual: number };

export type ValidationResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; violations: Violation[] };

// Descriptors

export type Namespace = 'operation' | 'resource' | 'prompt';

export interface HandlerContext {
  config: ServerConfig;
  // Aborted on client cancellation or dispatcher timeout
  signal: AbortSignal;
  logger: Logger;
}

export type OperationHandler = (input: ValidatedInput, context: HandlerContext) => WireValue | Promise<WireValue>;

export interface OperationDescriptor {
  kind: 'operation';
  name: string;
  description: string;
  parameters: ParameterSchema;
  handler: OperationHandler;
  // Overrides the dispatcher's default timeout
  timeoutMs?: number;
}

export type ResourceProducer = (context: HandlerContext) => string | Promise<string>;

export interface ResourceDescriptor {
  kind: 'resource';
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  producer: ResourceProducer;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type PromptRenderer = (input: ValidatedInput, context: HandlerContext) => PromptMessage[] | Promise<PromptMessage[]>;

export interface PromptDescriptor {
  kind: 'prompt';
  name: string;
  description: string;
  parameters: ParameterSchema;
  renderer: PromptRenderer;
}

export interface DescriptorMap {
  operation: OperationDescriptor;
  resource: ResourceDescriptor;
  prompt: PromptDescriptor;
}

export type CapabilityDescriptor = DescriptorMap[Namespace];

// Invocation

export interface InvocationRequest {
  namespace: Namespace;
  // Name for operations and prompts, URI for resources
  name: string;
  input: Record<string, unknown>;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type ErrorDescriptor =
  | { kind: 'NotFound'; namespace: Namespace; name: string; message: string }
  | { kind: 'ValidationError'; violations: Violation[]; message: string }
  | { kind: 'HandlerError'; message: string; cause?: string }
  | { kind: 'Timeout'; timeoutMs: number; message: string }
  | { kind: 'Cancelled'; message: string };

export type InvocationResult<T = WireValue> =
  | { success: true; payload: T; error: null }
  | { success: false; payload: null; error: ErrorDescriptor };

// Listing views

export interface OperationSummary {
  name: string;
  description: string;
  parameters: ParameterSchema;
}

export interface ResourceSummary {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export type PromptSummary = OperationSummary;
