import { Token, TokenType } from './tokens';

interface TokenSpec {
  type: TokenType;
  regex: RegExp;
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\' };

export class Lexer {
  private input: string = '';
  private cursor: number = 0;
  private line: number = 1;
  private column: number = 1;

  // Regex rules (Order matters!)
  private specs: TokenSpec[] = [
    { type: TokenType.Resource, regex: /^resource\b/ },
    { type: TokenType.Variable, regex: /^variable\b/ },
    { type: TokenType.Output, regex: /^output\b/ },
    { type: TokenType.Boolean, regex: /^(true|false)\b/ },
    { type: TokenType.Identifier, regex: /^[A-Z_a-z][\w-]*/ },
    { type: TokenType.String, regex: /^"(?:[^"\\\n]|\\.)*"/ },
    { type: TokenType.Number, regex: /^-?\d+(\.\d+)?/ },
    { type: TokenType.LBrace, regex: /^{/ },
    { type: TokenType.RBrace, regex: /^}/ },
    { type: TokenType.Dot, regex: /^\./ },
    { type: TokenType.Assign, regex: /^=/ },
    { type: TokenType.Comma, regex: /^,/ },
  ];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.cursor = 0;
    this.line = 1;
    this.column = 1;

    while (this.cursor < this.input.length) {
      const remaining = this.input.slice(this.cursor);

      // 1. Skip Whitespace
      const whitespaceMatch = remaining.match(/^\s+/);
      if (whitespaceMatch) {
        this.advance(whitespaceMatch[0]);
        continue;
      }

      // 2. Skip Comments (# or //)
      if (remaining.startsWith('#') || remaining.startsWith('//')) {
        const lineEndIndex = remaining.indexOf('\n');
        if (lineEndIndex === -1) {
          // Comment goes to end of file
          this.advance(remaining);
          break;
        }
        this.advance(remaining.slice(0, lineEndIndex + 1));
        continue;
      }

      // 3. Match Token
      const spec = this.specs.find((candidate) => candidate.regex.test(remaining));
      if (!spec) {
        if (remaining.startsWith('"')) throw new Error(`Unterminated string at line ${this.line}, column ${this.column}`);
        throw new Error(`Unexpected token at line ${this.line}, column ${this.column}: "${remaining[0]}"`);
      }

      const match = remaining.match(spec.regex);
      const value = match ? match[0] : '';

      tokens.push({
        type: spec.type,
        value: spec.type === TokenType.String ? this.decodeString(value) : value,
        line: this.line,
        column: this.column,
      });

      this.advance(value);
    }

    tokens.push({ type: TokenType.EOF, value: '', line: this.line, column: this.column });
    return tokens;
  }

  // Strip quotes and decode escapes; "${" interpolation is left for the parser
  private decodeString(raw: string): string {
    return raw.slice(1, -1).replace(/\\(.)/g, (_: string, char: string) => ESCAPES[char] ?? char);
  }

  private advance(text: string) {
    for (const char of text)
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else this.column++;
    this.cursor += text.length;
  }
}
