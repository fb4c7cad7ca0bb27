import { AttributeValue, OutputBlock, Program, ResourceBlock, Statement, TemplatePart, VariableBlock } from './ast';
import { Lexer } from './Lexer';
import { Token, TokenType } from './tokens';

const REFERENCE_EXPR = /^[A-Z_a-z][\w-]*(\.[A-Z_a-z][\w-]*)+$/;

// Keywords are still valid reference segments and attribute names (e.g. output.url)
const NAME_TOKENS = [TokenType.Identifier, TokenType.Resource, TokenType.Variable, TokenType.Output];

// Would be swallowed by plain-object records downstream
const RESERVED_NAMES = new Set(['__proto__']);

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  public parse(): Program {
    const program: Program = [];
    while (!this.isAtEnd()) program.push(this.parseStatement());
    return program;
  }

  private statementParsers: Partial<Record<TokenType, (keyword: Token) => Statement>> = {
    [TokenType.Resource]: this.parseResource.bind(this),
    [TokenType.Variable]: this.parseVariable.bind(this),
    [TokenType.Output]: this.parseOutput.bind(this),
  };

  private parseStatement(): Statement {
    const handler = this.statementParsers[this.peek().type];
    if (handler) return handler(this.advance());
    return this.error(`Unexpected token: ${this.peek().value}`);
  }

  private parseResource(keyword: Token): ResourceBlock {
    // resource "kind" "name" { ... }
    const typeToken = this.label("Expect resource kind string after 'resource'.");
    const nameToken = this.label('Expect resource name string after resource kind.');

    return {
      type: 'Resource',
      resourceType: typeToken.value,
      name: nameToken.value,
      attributes: this.parseBody('resource name'),
      line: keyword.line,
    };
  }

  private parseVariable(keyword: Token): VariableBlock {
    // variable "name" { ... }
    const nameToken = this.label("Expect variable name string after 'variable'.");

    return {
      type: 'Variable',
      name: nameToken.value,
      attributes: this.parseBody('variable name'),
      line: keyword.line,
    };
  }

  private parseOutput(keyword: Token): OutputBlock {
    // output "name" { value = ... }
    const nameToken = this.label("Expect output name string after 'output'.");
    const { value, ...attributes } = this.parseBody('output name');

    if (!value) return this.error(`Output "${nameToken.value}" requires a 'value' attribute.`, keyword);

    return {
      type: 'Output',
      name: nameToken.value,
      value,
      attributes,
      line: keyword.line,
    };
  }

  private parseBody(after: string): Record<string, AttributeValue> {
    this.consume(TokenType.LBrace, `Expect '{' after ${after}.`);

    const attributes: Record<string, AttributeValue> = {};
    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      const keyToken = this.allowedName(this.consumeName('Expect attribute name.'));
      if (Object.hasOwn(attributes, keyToken.value)) this.error(`Duplicate attribute "${keyToken.value}".`, keyToken);
      this.consume(TokenType.Assign, "Expect '=' after attribute name.");
      attributes[keyToken.value] = this.parseValue();
    }

    this.consume(TokenType.RBrace, "Expect '}' after block body.");
    return attributes;
  }

  private parseValue(): AttributeValue {
    if (this.matchToken(TokenType.String)) return this.parseString(this.previous());
    if (this.matchToken(TokenType.Number)) return { type: 'Number', value: Number(this.previous().value) };
    if (this.matchToken(TokenType.Boolean)) return { type: 'Boolean', value: this.previous().value === 'true' };
    if (this.matchToken(TokenType.LBrace)) return this.parseObject();

    // Reference Parsing: identifier.key.subkey
    if (this.checkName()) {
      const parts: string[] = [this.advance().value];

      while (this.matchToken(TokenType.Dot)) parts.push(this.consumeName('Expect property name after dot.').value);

      return { type: 'Reference', value: parts };
    }

    return this.error(`Unexpected value: ${this.peek().value}`);
  }

  private parseObject(): AttributeValue {
    // { key = value, "other key" = value }
    const entries: Array<[string, AttributeValue]> = [];

    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      const keyToken = this.allowedName(this.check(TokenType.String) ? this.advance() : this.consumeName('Expect object key.'));
      if (entries.some(([key]) => key === keyToken.value)) this.error(`Duplicate object key "${keyToken.value}".`, keyToken);
      this.consume(TokenType.Assign, "Expect '=' after object key.");
      entries.push([keyToken.value, this.parseValue()]);
      this.matchToken(TokenType.Comma);
    }

    this.consume(TokenType.RBrace, "Expect '}' after object entries.");
    return { type: 'Object', entries };
  }

  /** Splits "${a.b}" interpolations out of a string literal; "$${" stays a literal "${" */
  private parseString(token: Token): AttributeValue {
    const raw = token.value;
    const parts: TemplatePart[] = [];
    let text = '';
    let i = 0;

    while (i < raw.length) {
      if (raw.startsWith('$${', i)) {
        text += '${';
        i += 3;
        continue;
      }

      if (raw.startsWith('${', i)) {
        const end = raw.indexOf('}', i + 2);
        if (end === -1) this.error('Unterminated interpolation in string.', token);

        const expr = raw.slice(i + 2, end).trim();
        if (!REFERENCE_EXPR.test(expr)) this.error(`Invalid interpolation "${expr}": expected a dotted reference.`, token);

        if (text) parts.push({ type: 'Text', value: text });
        text = '';
        parts.push({ type: 'Reference', value: expr.split('.') });
        i = end + 1;
        continue;
      }

      text += raw[i];
      i++;
    }

    if (!parts.some((part) => part.type === 'Reference')) return { type: 'String', value: text };

    if (text) parts.push({ type: 'Text', value: text });
    return { type: 'Template', parts };
  }

  private matchToken(...types: TokenType[]): boolean {
    for (const type of types)
      if (this.check(type)) {
        this.advance();
        return true;
      }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    return this.error(message);
  }

  private consumeName(message: string): Token {
    if (this.checkName()) return this.advance();
    return this.error(message);
  }

  private label(message: string): Token {
    return this.allowedName(this.consume(TokenType.String, message));
  }

  private allowedName(token: Token): Token {
    if (RESERVED_NAMES.has(token.value)) this.error(`"${token.value}" is a reserved name.`, token);
    return token;
  }

  private checkName(): boolean {
    return NAME_TOKENS.some((type) => this.check(type));
  }

  private error(message: string, token: Token = this.peek()): never {
    throw new Error(`[Line ${token.line}, Column ${token.column}] ${message}`);
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

export function parseConfig(source: string): Program {
  return new Parser(new Lexer(source).tokenize()).parse();
}
