export enum TokenType {
  Resource = 'RESOURCE', // 'resource' keyword
  Variable = 'VARIABLE', // 'variable' keyword
  Output = 'OUTPUT', // 'output' keyword
  Identifier = 'IDENTIFIER', // Attribute names, reference segments
  String = 'STRING', // "value" (escapes already decoded, interpolation kept raw)
  Number = 'NUMBER', // 123, -4.5
  Boolean = 'BOOLEAN', // true, false
  LBrace = 'LBRACE', // {
  RBrace = 'RBRACE', // }
  Assign = 'ASSIGN', // =
  Dot = 'DOT', // . (for references)
  Comma = 'COMMA', // ,
  EOF = 'EOF', // End of File
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}
