// Invocation Dispatcher: resolves, validates, invokes and wraps every call

// Local modules
import type { ServerConfig } from './config.js';
import { HandlerFailure } from './errors.js';
import { logger as defaultLogger, Logger, toError } from './logger.js';
import { CapabilityRegistry } from './registry.js';
import type {
  DispatchOptions,
  ErrorDescriptor,
  HandlerContext,
  InvocationRequest,
  InvocationResult,
  Namespace,
  OperationSummary,
  PromptMessage,
  PromptSummary,
  ResourceSummary,
  WireValue
} from './types.js';
import { ValidatedInput } from './validated-input.js';
import { describeViolation, validate } from './validator.js';
import { isPromptMessageList, isWireValue } from './wire.js';

export interface DispatcherOptions {
  config: ServerConfig;
  logger?: Logger;
}

type Outcome =
  | { type: 'done'; value: unknown }
  | { type: 'failed'; error: unknown }
  | { type: 'timeout'; timeoutMs: number }
  | { type: 'cancelled' };

export function success<T>(payload: T): InvocationResult<T> {
  return { success: true, payload, error: null };
}

export function failure<T = WireValue>(error: ErrorDescriptor): InvocationResult<T> {
  return { success: false, payload: null, error };
}

function notFound<T>(namespace: Namespace, name: string): InvocationResult<T> {
  return failure({ kind: 'NotFound', namespace, name, message: `Unknown ${namespace}: ${name}` });
}

/**
 * Turns invocation requests into envelopes. Nothing a handler does, throws
 * or returns escapes as an exception: every outcome is reported as data.
 *
 * Lookup and validation are synchronous; the handler call is the only
 * await point and no lock is held across it.
 */
export class Dispatcher {
  private readonly registry: CapabilityRegistry;
  private readonly config: ServerConfig;
  private readonly logger: Logger;

  constructor(registry: CapabilityRegistry, options: DispatcherOptions) {
    this.registry = registry;
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
  }

  async dispatch(request: InvocationRequest, options: DispatchOptions = {}): Promise<InvocationResult> {
    switch (request.namespace) {
      case 'operation':
        return this.callOperation(request.name, request.input, options);
      case 'resource':
        return this.readResource(request.name, options);
      case 'prompt': {
        const result = await this.renderPrompt(request.name, request.input, options);
        return result.success
          ? success(result.payload.map((message) => ({ role: message.role, content: message.content })))
          : result;
      }
    }
  }

  async callOperation(name: string, input: Record<string, unknown>, options: DispatchOptions = {}): Promise<InvocationResult> {
    const descriptor = this.registry.find('operation', name);
    if (!descriptor) {
      return notFound('operation', name);
    }

    const validation = validate(descriptor.parameters, input);
    if (!validation.ok) {
      return failure({
        kind: 'ValidationError',
        violations: validation.violations,
        message: validation.violations.map(describeViolation).join('; ')
      });
    }

    const validated = new ValidatedInput(validation.value);
    const outcome = await this.invoke(
      `operation:${name}`,
      (context) => descriptor.handler(validated, context),
      { ...options, timeoutMs: options.timeoutMs ?? descriptor.timeoutMs }
    );

    return this.toEnvelope<WireValue>(`operation:${name}`, outcome, (value) =>
      isWireValue(value) ? success(value) : this.wireFailure(`operation:${name}`)
    );
  }

  async readResource(uri: string, options: DispatchOptions = {}): Promise<InvocationResult<string>> {
    const descriptor = this.registry.find('resource', uri);
    if (!descriptor) {
      return notFound('resource', uri);
    }

    const outcome = await this.invoke(`resource:${uri}`, (context) => descriptor.producer(context), options);

    return this.toEnvelope<string>(`resource:${uri}`, outcome, (value) =>
      typeof value === 'string' ? success(value) : this.wireFailure(`resource:${uri}`)
    );
  }

  async renderPrompt(name: string, input: Record<string, unknown>, options: DispatchOptions = {}): Promise<InvocationResult<PromptMessage[]>> {
    const descriptor = this.registry.find('prompt', name);
    if (!descriptor) {
      return notFound('prompt', name);
    }

    const validation = validate(descriptor.parameters, input);
    if (!validation.ok) {
      return failure({
        kind: 'ValidationError',
        violations: validation.violations,
        message: validation.violations.map(describeViolation).join('; ')
      });
    }

    const validated = new ValidatedInput(validation.value);
    const outcome = await this.invoke(`prompt:${name}`, (context) => descriptor.renderer(validated, context), options);

    return this.toEnvelope<PromptMessage[]>(`prompt:${name}`, outcome, (value) =>
      isPromptMessageList(value) ? success(value) : this.wireFailure(`prompt:${name}`)
    );
  }

  listOperations(): OperationSummary[] {
    return Array.from(this.registry.listAll('operation'), ({ name, description, parameters }) => ({ name, description, parameters }));
  }

  listResources(): ResourceSummary[] {
    return Array.from(this.registry.listAll('resource'), ({ uri, name, description, mimeType }) => ({ uri, name, description, mimeType }));
  }

  listPrompts(): PromptSummary[] {
    return Array.from(this.registry.listAll('prompt'), ({ name, description, parameters }) => ({ name, description, parameters }));
  }

  private wireFailure<T>(label: string): InvocationResult<T> {
    this.logger.error(`Handler returned a value that cannot be serialized`, label);
    return failure({
      kind: 'HandlerError',
      message: 'Handler returned a value that cannot be serialized',
      cause: 'wire-unsafe result'
    });
  }

  private toEnvelope<T>(label: string, outcome: Outcome, accept: (value: unknown) => InvocationResult<T>): InvocationResult<T> {
    switch (outcome.type) {
      case 'done':
        return accept(outcome.value);
      case 'failed': {
        const error = toError(outcome.error);
        this.logger.error('Handler failed', label, error);
        if (outcome.error instanceof HandlerFailure) {
          return failure({ kind: 'HandlerError', message: error.message, cause: outcome.error.causeTag });
        }
        return failure({ kind: 'HandlerError', message: error.message });
      }
      case 'timeout':
        this.logger.warn(`Timed out after ${outcome.timeoutMs}ms`, label);
        return failure({
          kind: 'Timeout',
          timeoutMs: outcome.timeoutMs,
          message: `Invocation timed out after ${outcome.timeoutMs}ms`
        });
      case 'cancelled':
        this.logger.warn('Cancelled by client', label);
        return failure({ kind: 'Cancelled', message: 'Invocation was cancelled' });
    }
  }

  /**
   * Runs a handler against a signal that aborts on client cancellation or
   * timeout. Whichever settles first decides the outcome; a result arriving
   * after a timeout or cancellation is logged and dropped.
   */
  private invoke(label: string, run: (context: HandlerContext) => unknown, options: DispatchOptions): Promise<Outcome> {
    const external = options.signal;
    if (external?.aborted) {
      return Promise.resolve({ type: 'cancelled' });
    }

    const timeoutMs = options.timeoutMs ?? this.config.dispatch.timeoutMs;
    const controller = new AbortController();
    const context: HandlerContext = { config: this.config, signal: controller.signal, logger: this.logger };

    return new Promise<Outcome>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (outcome: Outcome): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const onAbort = (): void => {
        controller.abort(external?.reason);
        finish({ type: 'cancelled' });
      };
      external?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
          finish({ type: 'timeout', timeoutMs });
        }, timeoutMs);
      }

      // Promise.resolve().then also captures synchronous throws
      void Promise.resolve()
        .then(() => run(context))
        .then(
          (value) => {
            if (settled) {
              this.logger.debug('Discarding late result', label);
              return;
            }
            finish({ type: 'done', value });
          },
          (error: unknown) => {
            if (settled) {
              this.logger.debug(`Discarding late failure: ${toError(error).message}`, label);
              return;
            }
            finish({ type: 'failed', error });
          }
        );
    });
  }
}
