import { isLiteralMap, Literal } from '@strata/contracts';

import { DeclarationStore } from './declarations/DeclarationStore';
import { TypeMismatchError } from './errors';
import { asLiteral, VariableType } from './values/types';

export const ENV_PREFIX = 'STRATA_VAR_';

/**
 * Coerces raw text (command line, environment) into a literal of the declared type.
 * Objects are given as JSON.
 * @throws TypeMismatchError when the text cannot be read as `type`
 */
export function parseOverride(id: string, type: VariableType, raw: string): Literal {
  switch (type) {
    case 'string': {
      return raw;
    }
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) throw new TypeMismatchError(id, 'number', 'string');
      return value;
    }
    case 'bool': {
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      throw new TypeMismatchError(id, 'bool', 'string');
    }
    case 'object': {
      const value = asLiteral(parseJson(raw));
      if (value === undefined || !isLiteralMap(value)) throw new TypeMismatchError(id, 'object', 'string');
      return value;
    }
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Reads STRATA_VAR_<id> entries for every declared variable */
export function overridesFromEnv(env: NodeJS.ProcessEnv, store: DeclarationStore, prefix: string = ENV_PREFIX): Record<string, Literal> {
  const overrides: Record<string, Literal> = {};

  for (const variable of store.variables()) {
    const raw = env[`${prefix}${variable.id}`];
    if (raw !== undefined) overrides[variable.id] = parseOverride(variable.id, variable.variableType, raw);
  }

  return overrides;
}
