import { ISchema, Literal, LiteralMap, SchemaType } from '@strata/contracts';
import crypto from 'node:crypto';

function typeOf(value: Literal): SchemaType {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'bool';
  return 'object';
}

function read(inputs: LiteralMap, name: string): Literal | undefined {
  return Object.hasOwn(inputs, name) ? inputs[name] : undefined;
}

/**
 * Checks inputs against a schema: required attributes present, types matching,
 * no computed or unknown attributes.
 */
export function checkInputs(kind: string, schema: ISchema, inputs: LiteralMap): void {
  for (const [name, definition] of Object.entries(schema)) {
    const value = read(inputs, name);

    if (definition.computed) {
      if (value !== undefined) throw new Error(`${kind} "${name}" is computed and cannot be set`);
      continue;
    }

    if (value === undefined) {
      if (definition.required) throw new Error(`${kind} requires "${name}" attribute (${definition.type})`);
      continue;
    }

    if (typeOf(value) !== definition.type) throw new Error(`${kind} "${name}" attribute must be a ${definition.type}`);
  }

  for (const name of Object.keys(inputs)) if (!Object.hasOwn(schema, name)) throw new Error(`${kind} does not support attribute "${name}"`);
}

export function stringInput(inputs: LiteralMap, name: string, fallback?: string): string {
  const value = read(inputs, name);
  if (typeof value === 'string') return value;
  if (fallback !== undefined) return fallback;
  throw new Error(`Missing string attribute "${name}"`);
}

export function numberInput(inputs: LiteralMap, name: string, fallback?: number): number {
  const value = read(inputs, name);
  if (typeof value === 'number') return value;
  if (fallback !== undefined) return fallback;
  throw new Error(`Missing number attribute "${name}"`);
}

export function assertPositiveInteger(kind: string, name: string, value: number, max: number = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < 1 || value > max) throw new Error(`${kind} "${name}" must be an integer between 1 and ${max}`);
}

/** sha256 over kind and inputs, so the same inputs always give the same id */
export function digest(kind: string, inputs: LiteralMap, length: number = 12): string {
  return crypto.createHash('sha256').update(`${kind}:${JSON.stringify(inputs)}`).digest('hex').slice(0, length);
}

export function resourceId(prefix: string, kind: string, inputs: LiteralMap): string {
  return `${prefix}-${digest(kind, inputs)}`;
}
