// Capability Registry: the startup-populated catalog of operations,
// resources and prompt templates.

// Local modules
import { DuplicateNameError, NotFoundError, RegistrySealedError } from './errors.js';
import type { CapabilityDescriptor, DescriptorMap, Namespace } from './types.js';

type Tables = { [N in Namespace]: Map<string, DescriptorMap[N]> };

// Parameter schemas are acyclic, so a plain recursive walk terminates.
function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null) return;
  Object.freeze(value);
  for (const item of Object.values(value)) {
    deepFreeze(item);
  }
}

// Parameter schemas are frozen too: the validator caches compiled schemas by identity.
function freezeDescriptor<D extends CapabilityDescriptor>(descriptor: D): D {
  const described: CapabilityDescriptor = descriptor;
  if (described.kind !== 'resource') {
    deepFreeze(described.parameters);
  }
  Object.freeze(descriptor);
  return descriptor;
}

export function capabilityKey(descriptor: CapabilityDescriptor): string {
  return descriptor.kind === 'resource' ? descriptor.uri : descriptor.name;
}

/**
 * Holds three independent namespaces keyed by name (or URI for resources).
 *
 * Registration only happens during startup, before `seal()`. After that the
 * registry is read-only, so concurrent invocations share it without locking.
 * Maps preserve insertion order, which is the order clients see in listings.
 */
export class CapabilityRegistry {
  private readonly tables: Tables = {
    operation: new Map(),
    resource: new Map(),
    prompt: new Map()
  };

  private sealed = false;

  register<N extends Namespace>(namespace: N, descriptor: DescriptorMap[N]): void {
    const table: Map<string, DescriptorMap[N]> = this.tables[namespace];
    const key = capabilityKey(descriptor);

    if (this.sealed) {
      throw new RegistrySealedError(namespace, key);
    }
    if (table.has(key)) {
      throw new DuplicateNameError(namespace, key);
    }

    table.set(key, freezeDescriptor(descriptor));
  }

  lookup<N extends Namespace>(namespace: N, key: string): DescriptorMap[N] {
    const table: Map<string, DescriptorMap[N]> = this.tables[namespace];
    const descriptor = table.get(key);
    if (!descriptor) {
      throw new NotFoundError(namespace, key);
    }
    return descriptor;
  }

  find<N extends Namespace>(namespace: N, key: string): DescriptorMap[N] | undefined {
    const table: Map<string, DescriptorMap[N]> = this.tables[namespace];
    return table.get(key);
  }

  // Each iteration walks the live table again, so the sequence is restartable.
  listAll<N extends Namespace>(namespace: N): Iterable<DescriptorMap[N]> {
    const table: Map<string, DescriptorMap[N]> = this.tables[namespace];
    return {
      [Symbol.iterator]: () => table.values()
    };
  }

  size(namespace: Namespace): number {
    return this.tables[namespace].size;
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}
