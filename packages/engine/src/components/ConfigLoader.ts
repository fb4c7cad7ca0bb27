import { Literal } from '@strata/contracts';
import { AttributeValue, OutputBlock, parseConfig, Program, ResourceBlock, Statement, VariableBlock } from '@strata/parser';

import { DeclarationStore } from '../declarations/DeclarationStore';
import { Expression, literal, ReferenceExpression, template } from '../declarations/Expression';
import { ConfigurationError } from '../errors';
import { isVariableType, typeOfLiteral, VariableType } from '../values/types';

type DeclarationType = 'Variable' | 'Resource' | 'Output';

interface PrefixedReference {
  owner: string;
  expected: DeclarationType;
  target: string;
  line: number;
}

const VARIABLE_ATTRIBUTES = new Set(['type', 'default', 'sensitive', 'description']);
const OUTPUT_ATTRIBUTES = new Set(['sensitive', 'description']);

/**
 * Turns configuration text into a DeclarationStore.
 *
 * References are written `var.<id>`, `output.<id>` or `<kind>.<name>`, optionally followed by
 * an attribute path. Resources are declared under the id `<kind>.<name>`.
 */
export class ConfigLoader {
  /**
   * @throws ConfigurationError on syntax errors and on blocks that cannot be declared
   * @throws DuplicateIdentifierError, TypeMismatchError from the store
   */
  load(source: string): DeclarationStore {
    let program: Program;
    try {
      program = parseConfig(source);
    } catch (error) {
      throw new ConfigurationError(`Syntax error: ${error instanceof Error ? error.message : String(error)}`, { phase: 'syntax' });
    }
    return this.loadProgram(program);
  }

  loadProgram(program: Program): DeclarationStore {
    const store = new DeclarationStore();
    const references: PrefixedReference[] = [];

    for (const stmt of program) this.declare(store, stmt, references);

    // Targets that exist must be of the kind the prefix promises; missing ones are left to the graph builder
    for (const reference of references) {
      const found = store.get(reference.target);
      if (found && found.type !== reference.expected)
        throw new ConfigurationError(`Line ${reference.line}: "${reference.owner}" refers to ${reference.target} as ${reference.expected.toLowerCase()}, but it is declared as ${found.type.toLowerCase()}`, {
          owner: reference.owner,
          target: reference.target,
        });
    }

    return store;
  }

  private declare(store: DeclarationStore, stmt: Statement, references: PrefixedReference[]): void {
    switch (stmt.type) {
      case 'Variable': {
        this.declareVariable(store, stmt);
        break;
      }
      case 'Resource': {
        this.declareResource(store, stmt, references);
        break;
      }
      case 'Output': {
        this.declareOutput(store, stmt, references);
        break;
      }
    }
  }

  private declareVariable(store: DeclarationStore, block: VariableBlock): void {
    const { name, attributes, line } = block;
    this.assertKnownAttributes(attributes, VARIABLE_ATTRIBUTES, `variable "${name}"`, line);

    const defaultValue = attributes.default ? this.toLiteral(attributes.default, `default of variable "${name}"`, line) : undefined;
    const type = attributes.type ? this.toVariableType(attributes.type, name, line) : this.inferType(defaultValue);

    store.declareVariable(name, type, defaultValue, this.toFlag(attributes.sensitive, `variable "${name}"`, line), this.toText(attributes.description, `variable "${name}"`, line));
  }

  private declareResource(store: DeclarationStore, block: ResourceBlock, references: PrefixedReference[]): void {
    const id = `${block.resourceType}.${block.name}`;
    const expressions: Record<string, Expression> = {};

    for (const [key, value] of Object.entries(block.attributes)) expressions[key] = this.toExpression(value, id, block.line, references);

    store.declareResource(id, block.resourceType, expressions);
  }

  private declareOutput(store: DeclarationStore, block: OutputBlock, references: PrefixedReference[]): void {
    const { name, value, attributes, line } = block;
    this.assertKnownAttributes(attributes, OUTPUT_ATTRIBUTES, `output "${name}"`, line);

    store.declareOutput(name, this.toExpression(value, name, line, references), this.toFlag(attributes.sensitive, `output "${name}"`, line), this.toText(attributes.description, `output "${name}"`, line));
  }

  private toExpression(value: AttributeValue, owner: string, line: number, references: PrefixedReference[]): Expression {
    switch (value.type) {
      case 'String':
      case 'Number':
      case 'Boolean': {
        return literal(value.value);
      }
      case 'Reference': {
        return this.toReference(value.value, owner, line, references);
      }
      case 'Template': {
        return template(...value.parts.map((part) => (part.type === 'Text' ? part.value : this.toReference(part.value, owner, line, references))));
      }
      case 'Object': {
        return { type: 'Object', entries: value.entries.map(([key, entry]): [string, Expression] => [key, this.toExpression(entry, owner, line, references)]) };
      }
    }
  }

  private toReference(parts: string[], owner: string, line: number, references: PrefixedReference[]): ReferenceExpression {
    if (parts.length < 2) throw new ConfigurationError(`Line ${line}: invalid reference "${parts.join('.')}" in "${owner}", expected var.<name>, output.<name> or <kind>.<name>`, { owner });

    const [head, second, ...rest] = parts;

    if (head === 'var' || head === 'output') {
      references.push({ owner, expected: head === 'var' ? 'Variable' : 'Output', target: second, line });
      return { type: 'Reference', target: second, path: rest };
    }

    const target = `${head}.${second}`;
    references.push({ owner, expected: 'Resource', target, line });
    return { type: 'Reference', target, path: rest };
  }

  private toLiteral(value: AttributeValue, what: string, line: number): Literal {
    switch (value.type) {
      case 'String':
      case 'Number':
      case 'Boolean': {
        return value.value;
      }
      case 'Object': {
        const result: Record<string, Literal> = {};
        for (const [key, entry] of value.entries) result[key] = this.toLiteral(entry, what, line);
        return result;
      }
      default: {
        throw new ConfigurationError(`Line ${line}: ${what} must be a literal value`);
      }
    }
  }

  private toVariableType(value: AttributeValue, name: string, line: number): VariableType {
    // Accepts both `type = string` and `type = "string"`
    const text = value.type === 'String' ? value.value : value.type === 'Reference' && value.value.length === 1 ? value.value[0] : undefined;
    if (text === undefined || !isVariableType(text)) throw new ConfigurationError(`Line ${line}: variable "${name}" has an unsupported type, expected string, number, bool or object`, { variable: name });
    return text;
  }

  private inferType(defaultValue: Literal | undefined): VariableType {
    return defaultValue === undefined ? 'string' : typeOfLiteral(defaultValue);
  }

  private toFlag(value: AttributeValue | undefined, what: string, line: number): boolean {
    if (!value) return false;
    if (value.type !== 'Boolean') throw new ConfigurationError(`Line ${line}: "sensitive" of ${what} must be true or false`);
    return value.value;
  }

  private toText(value: AttributeValue | undefined, what: string, line: number): string | undefined {
    if (!value) return undefined;
    if (value.type !== 'String') throw new ConfigurationError(`Line ${line}: "description" of ${what} must be a plain string`);
    return value.value;
  }

  private assertKnownAttributes(attributes: Record<string, AttributeValue>, allowed: Set<string>, what: string, line: number): void {
    for (const key of Object.keys(attributes)) if (!allowed.has(key)) throw new ConfigurationError(`Line ${line}: unsupported attribute "${key}" in ${what}`);
  }
}
