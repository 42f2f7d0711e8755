import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { HandlerFailure } from './errors.js';
import { Logger, LogLevel } from './logger.js';
import { CapabilityRegistry } from './registry.js';
import { field } from './schema.js';
import type { HandlerContext, OperationHandler, WireValue } from './types.js';

const config = loadConfig({}, []);

function setup(handlers: Record<string, OperationHandler> = {}, timeouts: Record<string, number> = {}) {
  const registry = new CapabilityRegistry();
  const echo = vi.fn<OperationHandler>((input) => input.string('text'));

  registry.register('operation', {
    kind: 'operation',
    name: 'echo',
    description: 'Echo text back',
    parameters: [field.string('text', { description: 'Text to echo', required: true })],
    handler: echo
  });

  for (const [name, handler] of Object.entries(handlers)) {
    registry.register('operation', {
      kind: 'operation',
      name,
      description: `${name} test operation`,
      parameters: [],
      handler,
      timeoutMs: timeouts[name]
    });
  }

  registry.register('resource', {
    kind: 'resource',
    uri: 'test://greeting',
    name: 'Greeting',
    description: 'A greeting',
    mimeType: 'text/plain',
    producer: () => 'hello'
  });

  registry.register('prompt', {
    kind: 'prompt',
    name: 'greet',
    description: 'Greet someone',
    parameters: [field.string('name', { description: 'Who to greet', required: true })],
    renderer: (input) => [{ role: 'user', content: `Say hello to ${input.string('name')}` }]
  });

  registry.seal();
  const logger = new Logger(LogLevel.DEBUG);
  const dispatcher = new Dispatcher(registry, { config, logger });
  return { dispatcher, echo, logger };
}

function never(): Promise<WireValue> {
  return new Promise(() => undefined);
}

describe('Dispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('callOperation', () => {
    it('wraps a successful payload', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.callOperation('echo', { text: 'hi' })).toEqual({
        success: true,
        payload: 'hi',
        error: null
      });
    });

    it('returns a validation envelope without calling the handler', async () => {
      const { dispatcher, echo } = setup();

      const result = await dispatcher.callOperation('echo', {});

      expect(result).toEqual({
        success: false,
        payload: null,
        error: {
          kind: 'ValidationError',
          violations: [{ kind: 'MissingField', field: 'text' }],
          message: 'text: required field is missing'
        }
      });
      expect(echo).not.toHaveBeenCalled();
    });

    it('returns NotFound for unregistered names and calls no handler', async () => {
      const { dispatcher, echo } = setup();

      const result = await dispatcher.callOperation('missing', {});

      expect(result).toEqual({
        success: false,
        payload: null,
        error: { kind: 'NotFound', namespace: 'operation', name: 'missing', message: 'Unknown operation: missing' }
      });
      expect(echo).toHaveBeenCalledTimes(0);
    });

    it('converts a rejected handler into a HandlerError envelope', async () => {
      const { dispatcher } = setup({
        broken: async () => {
          throw new Error('upstream unavailable');
        }
      });

      expect(await dispatcher.callOperation('broken', {})).toEqual({
        success: false,
        payload: null,
        error: { kind: 'HandlerError', message: 'upstream unavailable' }
      });
    });

    it('converts a synchronous throw into a HandlerError envelope', async () => {
      const { dispatcher } = setup({
        explode: () => {
          throw new TypeError('bad state');
        }
      });

      const result = await dispatcher.callOperation('explode', {});

      expect(result).toMatchObject({ success: false, error: { kind: 'HandlerError', message: 'bad state' } });
    });

    it('copies the cause tag of a HandlerFailure', async () => {
      const { dispatcher } = setup({
        needsKey: () => {
          throw new HandlerFailure('OPENAI_API_KEY is not set', 'missing credential');
        }
      });

      expect(await dispatcher.callOperation('needsKey', {})).toEqual({
        success: false,
        payload: null,
        error: { kind: 'HandlerError', message: 'OPENAI_API_KEY is not set', cause: 'missing credential' }
      });
    });

    it('rejects payloads that cannot be serialized', async () => {
      const { dispatcher } = setup({ notANumber: () => ({ ratio: Number('abc') }) });

      expect(await dispatcher.callOperation('notANumber', {})).toEqual({
        success: false,
        payload: null,
        error: {
          kind: 'HandlerError',
          message: 'Handler returned a value that cannot be serialized',
          cause: 'wire-unsafe result'
        }
      });
    });

    it('threads the configuration into the handler context', async () => {
      let seen: HandlerContext | undefined;
      const { dispatcher } = setup({
        inspect: (_input, context) => {
          seen = context;
          return context.config.research.cliPath;
        }
      });

      const result = await dispatcher.callOperation('inspect', {});

      expect(result).toEqual({ success: true, payload: 'claude', error: null });
      expect(seen?.config).toBe(config);
      expect(seen?.signal.aborted).toBe(false);
    });

    it('times out a handler that never settles and aborts its signal', async () => {
      let signal: AbortSignal | undefined;
      const { dispatcher } = setup({
        stuck: (_input, context) => {
          signal = context.signal;
          return never();
        }
      });

      const result = await dispatcher.callOperation('stuck', {}, { timeoutMs: 20 });

      expect(result).toEqual({
        success: false,
        payload: null,
        error: { kind: 'Timeout', timeoutMs: 20, message: 'Invocation timed out after 20ms' }
      });
      expect(signal?.aborted).toBe(true);
    });

    it('applies the descriptor timeout when the call sets none', async () => {
      const { dispatcher } = setup({ stuck: () => never() }, { stuck: 15 });

      const result = await dispatcher.callOperation('stuck', {});

      expect(result).toMatchObject({ success: false, error: { kind: 'Timeout', timeoutMs: 15 } });
    });

    it('discards a result that arrives after the timeout', async () => {
      let finish: (value: WireValue) => void = () => undefined;
      const { dispatcher, logger } = setup({
        slow: () => new Promise<WireValue>((resolve) => {
          finish = resolve;
        })
      });
      const debug = vi.spyOn(logger, 'debug');

      const result = await dispatcher.callOperation('slow', {}, { timeoutMs: 10 });
      finish('too late');
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(result).toMatchObject({ success: false, error: { kind: 'Timeout' } });
      expect(debug).toHaveBeenCalledWith('Discarding late result', 'operation:slow');
    });

    it('returns Cancelled when the client aborts and forwards the abort', async () => {
      let signal: AbortSignal | undefined;
      const { dispatcher } = setup({
        waiting: (_input, context) => {
          signal = context.signal;
          return never();
        }
      });
      const controller = new AbortController();

      const pending = dispatcher.callOperation('waiting', {}, { signal: controller.signal });
      await new Promise((resolve) => setTimeout(resolve, 0));
      controller.abort();

      expect(await pending).toEqual({
        success: false,
        payload: null,
        error: { kind: 'Cancelled', message: 'Invocation was cancelled' }
      });
      expect(signal?.aborted).toBe(true);
    });

    it('does not start a handler for an already aborted request', async () => {
      const handler = vi.fn<OperationHandler>(() => 'ran');
      const { dispatcher } = setup({ guarded: handler });
      const controller = new AbortController();
      controller.abort();

      const result = await dispatcher.callOperation('guarded', {}, { signal: controller.signal });

      expect(result).toMatchObject({ success: false, error: { kind: 'Cancelled' } });
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('readResource', () => {
    it('wraps the produced text', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.readResource('test://greeting')).toEqual({ success: true, payload: 'hello', error: null });
    });

    it('returns NotFound for an unknown uri', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.readResource('test://missing')).toMatchObject({
        success: false,
        error: { kind: 'NotFound', namespace: 'resource', name: 'test://missing' }
      });
    });
  });

  describe('resource and prompt failures', () => {
    function failing() {
      const registry = new CapabilityRegistry();
      registry.register('resource', {
        kind: 'resource',
        uri: 'test://broken',
        name: 'Broken',
        description: 'Rejects',
        mimeType: 'text/plain',
        producer: async () => {
          throw new Error('disk unavailable');
        }
      });
      registry.register('resource', {
        kind: 'resource',
        uri: 'test://count',
        name: 'Count',
        description: 'Returns a number',
        mimeType: 'text/plain',
        producer: () => JSON.parse('42')
      });
      registry.register('prompt', {
        kind: 'prompt',
        name: 'broken',
        description: 'Throws',
        parameters: [],
        renderer: () => {
          throw new Error('template missing');
        }
      });
      registry.register('prompt', {
        kind: 'prompt',
        name: 'system',
        description: 'Returns a system message',
        parameters: [],
        renderer: () => JSON.parse('[{"role":"system","content":"x"}]')
      });
      registry.seal();
      return new Dispatcher(registry, { config, logger: new Logger(LogLevel.ERROR) });
    }

    const wireUnsafe = {
      kind: 'HandlerError',
      message: 'Handler returned a value that cannot be serialized',
      cause: 'wire-unsafe result'
    };

    it('wraps a rejected producer in a HandlerError envelope', async () => {
      expect(await failing().readResource('test://broken')).toEqual({
        success: false,
        payload: null,
        error: { kind: 'HandlerError', message: 'disk unavailable' }
      });
    });

    it('rejects a producer result that is not text', async () => {
      expect(await failing().readResource('test://count')).toEqual({ success: false, payload: null, error: wireUnsafe });
    });

    it('wraps a throwing renderer in a HandlerError envelope', async () => {
      expect(await failing().renderPrompt('broken', {})).toEqual({
        success: false,
        payload: null,
        error: { kind: 'HandlerError', message: 'template missing' }
      });
    });

    it('rejects rendered messages with an unknown role', async () => {
      expect(await failing().renderPrompt('system', {})).toEqual({ success: false, payload: null, error: wireUnsafe });
    });
  });

  describe('renderPrompt', () => {
    it('renders messages from validated input', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.renderPrompt('greet', { name: 'Ada' })).toEqual({
        success: true,
        payload: [{ role: 'user', content: 'Say hello to Ada' }],
        error: null
      });
    });

    it('validates prompt arguments like operation input', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.renderPrompt('greet', {})).toMatchObject({
        success: false,
        error: { kind: 'ValidationError', violations: [{ kind: 'MissingField', field: 'name' }] }
      });
    });
  });

  describe('dispatch', () => {
    it('routes each namespace to its read path', async () => {
      const { dispatcher } = setup();

      expect(await dispatcher.dispatch({ namespace: 'operation', name: 'echo', input: { text: 'hi' } }))
        .toEqual({ success: true, payload: 'hi', error: null });
      expect(await dispatcher.dispatch({ namespace: 'resource', name: 'test://greeting', input: {} }))
        .toEqual({ success: true, payload: 'hello', error: null });
      expect(await dispatcher.dispatch({ namespace: 'prompt', name: 'greet', input: { name: 'Ada' } }))
        .toEqual({ success: true, payload: [{ role: 'user', content: 'Say hello to Ada' }], error: null });
      expect(await dispatcher.dispatch({ namespace: 'operation', name: 'missing', input: {} }))
        .toMatchObject({ success: false, error: { kind: 'NotFound' } });
    });
  });

  describe('listings', () => {
    it('lists operations in registration order without duplicates', () => {
      const { dispatcher } = setup({ beta: () => 1, alpha: () => 2 });

      const names = dispatcher.listOperations().map((operation) => operation.name);

      expect(names).toEqual(['echo', 'beta', 'alpha']);
      expect(new Set(names).size).toBe(names.length);
    });

    it('returns identical resource listings on repeated calls', () => {
      const { dispatcher } = setup();

      expect(dispatcher.listResources()).toEqual(dispatcher.listResources());
      expect(dispatcher.listResources()).toEqual([
        { uri: 'test://greeting', name: 'Greeting', description: 'A greeting', mimeType: 'text/plain' }
      ]);
    });

    it('lists prompts with their parameters', () => {
      const { dispatcher } = setup();

      expect(dispatcher.listPrompts()).toEqual([
        {
          name: 'greet',
          description: 'Greet someone',
          parameters: [{ name: 'name', type: { kind: 'string' }, required: true, description: 'Who to greet' }]
        }
      ]);
    });
  });
});
