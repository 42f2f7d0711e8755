// Wire-safety checks applied to every handler result before it leaves the dispatcher

import type { PromptMessage, WireValue } from './types.js';

function isPlainObject(value: object): boolean {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * True when `value` is built only from strings, finite numbers, booleans,
 * null, arrays and plain string-keyed objects. Dates, class instances,
 * functions, undefined, NaN and cycles are rejected.
 */
export function isWireValue(value: unknown, seen: Set<object> = new Set()): value is WireValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'object' || value === null) return value === null;

  if (seen.has(value)) return false;
  seen.add(value);

  let safe: boolean;
  if (Array.isArray(value)) {
    // every() skips holes, which JSON would turn into null
    safe = true;
    for (let index = 0; index < value.length && safe; index++) {
      safe = index in value && isWireValue(value[index], seen);
    }
  } else {
    safe = isPlainObject(value) && Object.values(value).every((item) => isWireValue(item, seen));
  }

  seen.delete(value);
  return safe;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPromptMessageList(value: unknown): value is PromptMessage[] {
  return Array.isArray(value) && value.every((message: unknown) =>
    isRecord(message) &&
    (message.role === 'user' || message.role === 'assistant') &&
    typeof message.content === 'string'
  );
}
