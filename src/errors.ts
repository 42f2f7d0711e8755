// Error classes for registration, lookup and handler failures

import type { Namespace } from './types.js';

// Raised while the catalog is being registered; aborts startup.
export class DuplicateNameError extends Error {
  readonly namespace: Namespace;
  readonly key: string;

  constructor(namespace: Namespace, key: string) {
    super(`Duplicate ${namespace} registered: ${key}`);
    this.name = 'DuplicateNameError';
    this.namespace = namespace;
    this.key = key;
  }
}

export class RegistrySealedError extends Error {
  constructor(namespace: Namespace, key: string) {
    super(`Cannot register ${namespace} "${key}": registry is sealed`);
    this.name = 'RegistrySealedError';
  }
}

export class NotFoundError extends Error {
  readonly namespace: Namespace;
  readonly key: string;

  constructor(namespace: Namespace, key: string) {
    super(`Unknown ${namespace}: ${key}`);
    this.name = 'NotFoundError';
    this.namespace = namespace;
    this.key = key;
  }
}

/**
 * Thrown by handlers to report a failure with a machine-readable cause tag,
 * e.g. "dependency not installed" or "missing credential". The dispatcher
 * copies the tag into the HandlerError envelope.
 */
export class HandlerFailure extends Error {
  readonly causeTag: string;

  constructor(message: string, causeTag: string) {
    super(message);
    this.name = 'HandlerFailure';
    this.causeTag = causeTag;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
