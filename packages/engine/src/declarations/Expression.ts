import { isLiteralMap, Literal } from '@strata/contracts';

export interface LiteralExpression {
  readonly type: 'Literal';
  readonly value: Literal;
}

export interface ReferenceExpression {
  readonly type: 'Reference';
  readonly target: string; // declaration id
  readonly path: readonly string[]; // attribute path below the declaration
}

/** String interpolation; literal text parts are string literals */
export interface TemplateExpression {
  readonly type: 'Template';
  readonly parts: readonly Expression[];
}

export interface ObjectExpression {
  readonly type: 'Object';
  readonly entries: ReadonlyArray<readonly [string, Expression]>;
}

export type Expression = LiteralExpression | ReferenceExpression | TemplateExpression | ObjectExpression;

export const literal = (value: Literal): LiteralExpression => ({ type: 'Literal', value });

export const ref = (target: string, ...path: string[]): ReferenceExpression => ({ type: 'Reference', target, path });

/** Builds a template from text fragments and expressions, e.g. template('http://', ref('lb', 'dns')) */
export const template = (...parts: Array<string | Expression>): TemplateExpression => ({
  type: 'Template',
  parts: parts.map((part) => (typeof part === 'string' ? literal(part) : part)),
});

export const object = (entries: Record<string, Expression>): ObjectExpression => ({ type: 'Object', entries: Object.entries(entries) });

/** Every reference in the expression tree, in source order (duplicates kept) */
export function collectReferences(expression: Expression): ReferenceExpression[] {
  switch (expression.type) {
    case 'Literal': {
      return [];
    }
    case 'Reference': {
      return [expression];
    }
    case 'Template': {
      return expression.parts.flatMap((part) => collectReferences(part));
    }
    case 'Object': {
      return expression.entries.flatMap(([, entry]) => collectReferences(entry));
    }
  }
}

/** Every object key in a literal, nested keys included */
export function literalKeys(value: Literal): string[] {
  return isLiteralMap(value) ? Object.entries(value).flatMap(([key, entry]) => [key, ...literalKeys(entry)]) : [];
}

/** Every object key written in the expression tree, literal or not */
export function objectKeys(expression: Expression): string[] {
  switch (expression.type) {
    case 'Literal': {
      return literalKeys(expression.value);
    }
    case 'Reference': {
      return [];
    }
    case 'Template': {
      return expression.parts.flatMap((part) => objectKeys(part));
    }
    case 'Object': {
      return expression.entries.flatMap(([key, entry]) => [key, ...objectKeys(entry)]);
    }
  }
}
