import { isLiteralMap, Literal } from '@strata/contracts';

import { TypeMismatchError } from '../errors';

export type VariableType = 'string' | 'number' | 'bool' | 'object';

export const VARIABLE_TYPES: readonly VariableType[] = ['string', 'number', 'bool', 'object'];

export function isVariableType(value: string): value is VariableType {
  return VARIABLE_TYPES.some((type) => type === value);
}

export function typeOfLiteral(value: Literal): VariableType {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'bool';
  return 'object';
}

/** Narrows an unknown (e.g. parsed JSON) to a literal, or returns undefined */
export function asLiteral(value: unknown): Literal | undefined {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (!isLiteralMap(value)) return undefined;

  const result: Record<string, Literal> = {};
  for (const [key, entry] of Object.entries(value)) {
    const literal = asLiteral(entry);
    if (literal === undefined) return undefined;
    result[key] = literal;
  }
  return result;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'number' && !Number.isFinite(value)) return 'non-finite number';
  const literal = asLiteral(value);
  return literal === undefined ? typeof value : typeOfLiteral(literal);
}

/**
 * Checks a value against a declared type.
 * @throws TypeMismatchError naming `id` when the value does not fit
 */
export function checkType(id: string, type: VariableType, value: unknown): Literal {
  const literal = asLiteral(value);
  if (literal === undefined || typeOfLiteral(literal) !== type) throw new TypeMismatchError(id, type, describe(value));
  return literal;
}
