import { Literal } from '@strata/contracts';

import { ConfigurationError, DuplicateIdentifierError } from '../errors';
import { checkType, VariableType } from '../values/types';
import { Expression, literalKeys, objectKeys } from './Expression';

// Provider inputs, results and outputs are plain records, which would drop this key
const RESERVED_NAMES = new Set(['__proto__']);

function assertAllowedNames(names: readonly string[], what: string): void {
  const reserved = names.find((name) => RESERVED_NAMES.has(name));
  if (reserved !== undefined) throw new ConfigurationError(`"${reserved}" cannot be used as ${what}`, { name: reserved });
}

export interface VariableDeclaration {
  readonly type: 'Variable';
  readonly id: string;
  readonly variableType: VariableType;
  readonly default?: Literal;
  readonly sensitive: boolean;
  readonly description?: string;
}

export interface ResourceDeclaration {
  readonly type: 'Resource';
  readonly id: string; // e.g. "database_instance.postgres"
  readonly kind: string; // e.g. "database_instance"
  readonly attributes: ReadonlyArray<readonly [string, Expression]>;
}

export interface OutputDeclaration {
  readonly type: 'Output';
  readonly id: string;
  readonly expression: Expression;
  readonly sensitive: boolean;
  readonly description?: string;
}

export type Declaration = VariableDeclaration | ResourceDeclaration | OutputDeclaration;

/** Expressions a declaration evaluates; variables have none since defaults are literal */
export function expressionsOf(declaration: Declaration): Expression[] {
  if (declaration.type === 'Resource') return declaration.attributes.map(([, expression]) => expression);
  if (declaration.type === 'Output') return [declaration.expression];
  return [];
}

/**
 * Holds every declaration of one configuration.
 * All kinds share a single identifier namespace; declaration order is kept.
 */
export class DeclarationStore {
  private declarations: Map<string, Declaration> = new Map();

  /**
   * @throws DuplicateIdentifierError if `id` is taken
   * @throws TypeMismatchError if the default does not match `type`
   * @throws ConfigurationError for a reserved identifier or object key
   */
  declareVariable(id: string, type: VariableType, defaultValue?: Literal, sensitive: boolean = false, description?: string): VariableDeclaration {
    this.assertFree(id);
    if (defaultValue !== undefined) assertAllowedNames(literalKeys(defaultValue), 'an object key');

    const declaration: VariableDeclaration = {
      type: 'Variable',
      id,
      variableType: type,
      default: defaultValue === undefined ? undefined : checkType(id, type, defaultValue),
      sensitive,
      description,
    };

    this.declarations.set(id, declaration);
    return declaration;
  }

  declareResource(id: string, kind: string, attributes: Record<string, Expression>): ResourceDeclaration {
    this.assertFree(id);
    assertAllowedNames(Object.keys(attributes), 'an attribute name');
    assertAllowedNames(Object.values(attributes).flatMap((expression) => objectKeys(expression)), 'an object key');

    const declaration: ResourceDeclaration = { type: 'Resource', id, kind, attributes: Object.entries(attributes) };
    this.declarations.set(id, declaration);
    return declaration;
  }

  declareOutput(id: string, expression: Expression, sensitive: boolean = false, description?: string): OutputDeclaration {
    this.assertFree(id);
    assertAllowedNames(objectKeys(expression), 'an object key');

    const declaration: OutputDeclaration = { type: 'Output', id, expression, sensitive, description };
    this.declarations.set(id, declaration);
    return declaration;
  }

  get(id: string): Declaration | undefined {
    return this.declarations.get(id);
  }

  has(id: string): boolean {
    return this.declarations.has(id);
  }

  /** Position in declaration order, or -1 */
  indexOf(id: string): number {
    return [...this.declarations.keys()].indexOf(id);
  }

  get size(): number {
    return this.declarations.size;
  }

  all(): Declaration[] {
    return [...this.declarations.values()];
  }

  variables(): VariableDeclaration[] {
    return this.all().filter((d): d is VariableDeclaration => d.type === 'Variable');
  }

  resources(): ResourceDeclaration[] {
    return this.all().filter((d): d is ResourceDeclaration => d.type === 'Resource');
  }

  outputs(): OutputDeclaration[] {
    return this.all().filter((d): d is OutputDeclaration => d.type === 'Output');
  }

  private assertFree(id: string): void {
    assertAllowedNames([id], 'an identifier');
    if (this.declarations.has(id)) throw new DuplicateIdentifierError(id);
  }
}
