export type { AttributeValue, OutputBlock, Program, ResourceBlock, Statement, TemplatePart, VariableBlock } from './ast';
export { Lexer } from './Lexer';
export { Parser, parseConfig } from './Parser';
export { TokenType } from './tokens';
export type { Token } from './tokens';
