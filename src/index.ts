// M68K assembler: parser, operand validator and machine code encoder

// Syntax tree
export * from './types/ast.js';

// Parsing
export * from './parser/errors.js';
export * from './parser/lexer.js';
export { LineCursor } from './parser/line-cursor.js';
export { parseOperand, parseSize } from './parser/operand-parser.js';
export * from './parser/operations.js';
export * from './parser/parser.js';
export * from './parser/validator.js';

// Encoding
export { Bits, fitsSigned, fitsUnsigned } from './compiler/bits.js';
export * from './compiler/fields.js';
export * from './compiler/encoder.js';

// Assembler
export * from './assembler/assembler.js';
export { main as runCli, formatHexDump } from './assembler/cli.js';
