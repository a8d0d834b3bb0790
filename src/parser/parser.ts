// Line-oriented parser for M68K assembly

import { tokenize, type Token, TokenType } from './lexer.js';
import { type Diagnostic, ErrorCollector, LexerError, ParserError, ValidationError } from './errors.js';
import { LineCursor } from './line-cursor.js';
import { parseOperand, parseSize } from './operand-parser.js';
import { type OperationTable, defaultOperationTable } from './operations.js';
import { ensureMatchingConfigurationExists } from './validator.js';
import type {
  LabelStatement,
  Operand,
  OperationStatement,
  Program,
  Size,
  Statement,
} from '../types/ast.js';

export interface ParseOptions {
  // Defaults to the bundled operations.json
  operations?: OperationTable;
}

export interface ParseResult {
  program: Program;
  diagnostics: readonly Diagnostic[];
}

export class Parser {
  private readonly operations: OperationTable;
  private readonly statements: Statement[] = [];
  private readonly labels = new Map<LabelStatement, number>();
  private pendingLabels: LabelStatement[] = [];

  constructor(
    private readonly tokens: readonly Token[],
    private readonly errors: ErrorCollector,
    options: ParseOptions = {},
  ) {
    this.operations = options.operations ?? defaultOperationTable();
  }

  parse(): Program {
    for (const line of groupByLine(this.tokens)) {
      this.parseLine(line);
    }

    for (const label of this.pendingLabels) {
      this.errors.add({
        location: label.loc,
        message: `Label '${label.name}' isn't followed by any statements.`,
      });
    }
    this.pendingLabels = [];

    return { statements: this.statements, labels: this.labels };
  }

  private parseLine(tokens: Token[]): void {
    const rest = this.parseLabel(tokens);

    let comment: Token | undefined;
    if (rest.length > 0 && rest[rest.length - 1].type === TokenType.COMMENT) {
      comment = rest[rest.length - 1];
      rest.pop();
    }

    if (rest.length === 0) {
      if (comment !== undefined) {
        this.statements.push({ type: 'Comment', text: comment.lexeme, loc: comment.location });
      }
      return;
    }

    const cursor = new LineCursor(rest, this.errors);
    const statement = cursor.tryOrReport(() => this.parseOperation(cursor));
    if (statement !== undefined) {
      this.append(statement);
    }
  }

  // Registers a leading `name:` or `.name:` and returns the tokens after it
  private parseLabel(tokens: Token[]): Token[] {
    let dots = 0;
    while (tokens[dots]?.type === TokenType.DOT) dots++;

    const name = tokens[dots];
    if (name?.type !== TokenType.IDENTIFIER || tokens[dots + 1]?.type !== TokenType.COLON) {
      return tokens;
    }

    if (dots > 1) {
      this.errors.add({
        location: tokens[0].location,
        message: `A line started with ${dots} dots. If you tried to create a local label, consider using only one dot.`,
      });
    } else {
      this.pendingLabels.push({
        type: 'Label',
        name: dots === 1 ? `.${name.lexeme}` : name.lexeme,
        loc: tokens[0].location,
      });
    }
    return tokens.slice(dots + 2);
  }

  private append(statement: OperationStatement): void {
    for (const label of this.pendingLabels) {
      this.labels.set(label, this.statements.length);
    }
    this.pendingLabels = [];
    this.statements.push(statement);
  }

  /**
   * Parses `MNEMONIC[.s] [operand{,operand}]`. Size and operand errors are
   * collected one by one, whatever the mnemonic. Returns undefined when
   * anything failed or the mnemonic isn't in the operation table.
   */
  private parseOperation(cursor: LineCursor): OperationStatement | undefined {
    const mnemonic = cursor.expect(TokenType.IDENTIFIER, 'an operation');

    let failed = false;

    let size: Size | undefined;
    if (cursor.match(TokenType.DOT)) {
      size = cursor.tryOrReport(() => parseSize(cursor));
      failed = size === undefined;
    }

    const operands: Operand[] = [];
    while (!cursor.isAtEnd()) {
      const operand = cursor.tryOrReport(() => parseOperand(cursor));
      if (operand === undefined) {
        failed = true;
        cursor.skipToOperandEnd();
      } else {
        operands.push(operand);
      }

      if (cursor.isAtEnd()) break;
      if (!cursor.match(TokenType.COMMA)) {
        cursor.report(`Expected a comma between operands, but found ${cursor.describeCurrent()} instead.`);
        failed = true;
        break;
      }
      if (cursor.isAtEnd()) {
        cursor.report('Expected an operand after the comma, but found the end of the line instead.');
        failed = true;
      }
    }

    // Directives aren't supported yet
    const operation = this.operations.get(mnemonic.lexeme);
    if (operation === undefined || failed) {
      return undefined;
    }

    try {
      ensureMatchingConfigurationExists(operation, size, operands);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ParserError(error.message, mnemonic.location);
      }
      throw error;
    }

    const statement: OperationStatement = { type: 'Operation', operation, operands, loc: mnemonic.location };
    if (size !== undefined) {
      statement.size = size;
    }
    return statement;
  }
}

// Tokens of each source line, in order of appearance
function groupByLine(tokens: readonly Token[]): Token[][] {
  const lines = new Map<number, Token[]>();
  for (const token of tokens) {
    const line = lines.get(token.location.line);
    if (line === undefined) {
      lines.set(token.location.line, [token]);
    } else {
      line.push(token);
    }
  }
  return [...lines.values()];
}

export function parse(tokens: readonly Token[], errors: ErrorCollector, options: ParseOptions = {}): Program {
  return new Parser(tokens, errors, options).parse();
}

export function parseSource(source: string, options: ParseOptions = {}): ParseResult {
  const errors = new ErrorCollector();
  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (error) {
    if (error instanceof LexerError) {
      errors.add({
        location: { line: error.line, column: error.column },
        message: error.message,
      });
      return { program: { statements: [], labels: new Map() }, diagnostics: errors.diagnostics() };
    }
    throw error;
  }

  const program = parse(tokens, errors, options);
  return { program, diagnostics: errors.diagnostics() };
}
