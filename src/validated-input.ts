// Typed read access to an input mapping that already passed validation.
// The accessors narrow at runtime, so a handler asking for a field the
// schema does not declare with that type fails loudly instead of guessing.

export class ValidatedInput {
  readonly values: Readonly<Record<string, unknown>>;

  constructor(values: Record<string, unknown>) {
    this.values = Object.freeze({ ...values });
  }

  has(name: string): boolean {
    return this.values[name] !== undefined;
  }

  string(name: string): string {
    const value = this.values[name];
    if (typeof value !== 'string') {
      throw new TypeError(`Field "${name}" is not a string`);
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    return this.has(name) ? this.string(name) : undefined;
  }

  number(name: string): number {
    const value = this.values[name];
    if (typeof value !== 'number') {
      throw new TypeError(`Field "${name}" is not a number`);
    }
    return value;
  }

  boolean(name: string): boolean {
    const value = this.values[name];
    if (typeof value !== 'boolean') {
      throw new TypeError(`Field "${name}" is not a boolean`);
    }
    return value;
  }

  enumValue<const T extends readonly string[]>(name: string, values: T): T[number] {
    const raw = this.string(name);
    const match = values.find((candidate): candidate is T[number] => candidate === raw);
    if (match === undefined) {
      throw new TypeError(`Field "${name}" is not one of ${values.join(', ')}`);
    }
    return match;
  }

  array(name: string): unknown[] {
    const value = this.values[name];
    if (!Array.isArray(value)) {
      throw new TypeError(`Field "${name}" is not an array`);
    }
    return value;
  }

  optionalArray(name: string): unknown[] | undefined {
    return this.has(name) ? this.array(name) : undefined;
  }
}
