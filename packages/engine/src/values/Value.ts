import { isLiteralMap, Literal, Scalar } from '@strata/contracts';

import { MissingAttributeError, TypeMismatchError, UnresolvedReferenceError } from '../errors';

/** Read access to the values bound so far, keyed by declaration id */
export interface BindingLookup {
  lookup(id: string): Value | undefined;
}

export type ValueKind = 'scalar' | 'object' | 'reference';

export abstract class Value {
  abstract readonly kind: ValueKind;

  /** True if this value, or anything it was derived from, is sensitive */
  abstract isSensitive(): boolean;

  /**
   * The plain literal behind this value.
   * @throws UnresolvedReferenceError if a reference inside is not bound yet
   */
  abstract resolvedValue(): Literal;

  /** Descends an attribute path; undefined when a step does not exist */
  abstract find(path: readonly string[]): Value | undefined;

  /** Returns a copy flagged sensitive; sensitivity is only ever added */
  abstract markSensitive(): Value;

  /**
   * Like `find`, but a missing step is an error naming `owner`.
   */
  at(path: readonly string[], owner: string): Value {
    const found = this.find(path);
    if (!found) throw new MissingAttributeError(owner, path);
    return found;
  }

  static from(literal: Literal, sensitive: boolean = false): Value {
    if (isLiteralMap(literal)) return new ObjectValue(Object.entries(literal).map(([key, entry]): [string, Value] => [key, Value.from(entry)]), sensitive);
    return new ScalarValue(literal, sensitive);
  }
}

export class ScalarValue extends Value {
  readonly kind = 'scalar';

  constructor(
    readonly value: Scalar,
    private readonly sensitive: boolean = false
  ) {
    super();
  }

  isSensitive(): boolean {
    return this.sensitive;
  }

  resolvedValue(): Scalar {
    return this.value;
  }

  find(path: readonly string[]): Value | undefined {
    return path.length === 0 ? this : undefined;
  }

  markSensitive(): ScalarValue {
    return this.sensitive ? this : new ScalarValue(this.value, true);
  }
}

/** Ordered attribute -> value entries; an entry read through a sensitive object is sensitive */
export class ObjectValue extends Value {
  readonly kind = 'object';

  constructor(
    readonly entries: ReadonlyArray<readonly [string, Value]>,
    private readonly sensitive: boolean = false
  ) {
    super();
  }

  isSensitive(): boolean {
    return this.sensitive || this.entries.some(([, entry]) => entry.isSensitive());
  }

  resolvedValue(): Literal {
    const result: Record<string, Literal> = {};
    for (const [key, entry] of this.entries) result[key] = entry.resolvedValue();
    return result;
  }

  get(key: string): Value | undefined {
    const entry = this.entries.find(([name]) => name === key)?.[1];
    if (!entry) return undefined;
    return this.sensitive ? entry.markSensitive() : entry;
  }

  keys(): string[] {
    return this.entries.map(([key]) => key);
  }

  find(path: readonly string[]): Value | undefined {
    if (path.length === 0) return this;
    const [head, ...rest] = path;
    return this.get(head)?.find(rest);
  }

  markSensitive(): ObjectValue {
    return this.sensitive ? this : new ObjectValue(this.entries, true);
  }
}

/** A pointer into another declaration's binding; reads through to it once bound */
export class ReferenceValue extends Value {
  readonly kind = 'reference';

  constructor(
    readonly target: string,
    readonly path: readonly string[],
    private readonly bindings: BindingLookup
  ) {
    super();
  }

  /**
   * @throws UnresolvedReferenceError before the target is bound
   * @throws MissingAttributeError if the bound target lacks the path
   */
  resolve(): Value {
    const bound = this.bindings.lookup(this.target);
    if (!bound) throw new UnresolvedReferenceError(this.target, this.path);
    return bound.at(this.path, this.target);
  }

  /**
   * @throws UnresolvedReferenceError before the target is bound
   */
  isSensitive(): boolean {
    return this.resolve().isSensitive();
  }

  resolvedValue(): Literal {
    return this.resolve().resolvedValue();
  }

  find(path: readonly string[]): Value | undefined {
    const bound = this.bindings.lookup(this.target);
    return bound?.find([...this.path, ...path]);
  }

  markSensitive(): Value {
    return this.resolve().markSensitive();
  }
}

/**
 * Concatenates literal text and resolved sub-values into one string value.
 * The result is sensitive if any fragment is.
 * @throws TypeMismatchError naming `owner` when a fragment resolves to an object
 */
export function interpolate(fragments: ReadonlyArray<string | Value>, owner: string = 'interpolation'): ScalarValue {
  let text = '';
  let sensitive = false;

  for (const fragment of fragments) {
    if (typeof fragment === 'string') {
      text += fragment;
      continue;
    }

    const resolved = fragment.resolvedValue();
    if (isLiteralMap(resolved)) throw new TypeMismatchError(owner, 'string', 'object');

    text += String(resolved);
    sensitive = sensitive || fragment.isSensitive();
  }

  return new ScalarValue(text, sensitive);
}
