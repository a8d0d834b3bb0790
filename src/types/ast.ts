// AST node types for M68K assembly statements

import type { Operation } from '../parser/operations.js';

export interface SourceLocation {
  line: number;
  column: number;
}

// Used for nodes that were synthesized rather than read from source
export const INVALID_LOCATION: SourceLocation = { line: -1, column: -1 };

export function isInvalidLocation(location: SourceLocation): boolean {
  return location.line < 0 || location.column < 0;
}

export function locationsEqual(a: SourceLocation, b: SourceLocation): boolean {
  return a.line === b.line && a.column === b.column;
}

export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}

// ============================================================
// Sizes
// ============================================================

export enum Size {
  Byte = 'B',
  Word = 'W',
  LongWord = 'L',
}

const SIZE_NAMES: Record<Size, string> = {
  [Size.Byte]: 'byte',
  [Size.Word]: 'word',
  [Size.LongWord]: 'long word',
};

export function sizeToString(size: Size): string {
  return `${SIZE_NAMES[size]} (${size})`;
}

export function parseSizeName(name: string): Size | undefined {
  switch (name.toUpperCase()) {
    case 'B': return Size.Byte;
    case 'W': return Size.Word;
    case 'L': return Size.LongWord;
    default: return undefined;
  }
}

// ============================================================
// Registers
// ============================================================

export interface ProgramCounter {
  type: 'ProgramCounter';
  loc: SourceLocation;
}

// A0-A7
export interface AddressRegister {
  type: 'AddressRegister';
  index: number;
  loc: SourceLocation;
}

// D0-D7
export interface DataRegister {
  type: 'DataRegister';
  index: number;
  loc: SourceLocation;
}

export type IndexRegister = AddressRegister | DataRegister;

export type Register = ProgramCounter | IndexRegister;

export function formatRegister(register: Register): string {
  switch (register.type) {
    case 'ProgramCounter': return 'PC';
    case 'AddressRegister': return `A${register.index}`;
    case 'DataRegister': return `D${register.index}`;
  }
}

// ============================================================
// Operands
// ============================================================

// The tag of every operand; also what operation configurations accept.
export enum OperandType {
  DataRegisterDirect = 'Dn',
  AddressRegisterDirect = 'An',
  AddressIndirect = '(An)',
  AddressIndirectPostIncrement = '(An)+',
  AddressIndirectPreDecrement = '-(An)',
  AddressIndirectDisplacement = '(d16,An)',
  AddressIndirectIndex = '(d8,An,Xn)',
  AbsoluteWord = '(xxx).W',
  AbsoluteLongWord = '(xxx).L',
  PcIndirectDisplacement = '(d16,PC)',
  PcIndirectIndex = '(d8,PC,Xn)',
  Immediate = '#imm',
  ConditionCodeRegister = 'CCR',
  StatusRegister = 'SR',
  UserStackPointer = 'USP',
  Address = 'address',
}

export const OPERAND_TYPES: readonly OperandType[] = Object.values(OperandType);

export function isOperandType(value: string): value is OperandType {
  return OPERAND_TYPES.some((type) => type === value);
}

const OPERAND_TYPE_NAMES: Record<OperandType, string> = {
  [OperandType.DataRegisterDirect]: 'data register direct',
  [OperandType.AddressRegisterDirect]: 'address register direct',
  [OperandType.AddressIndirect]: 'address register indirect',
  [OperandType.AddressIndirectPostIncrement]: 'address register indirect with postincrement',
  [OperandType.AddressIndirectPreDecrement]: 'address register indirect with predecrement',
  [OperandType.AddressIndirectDisplacement]: 'address register indirect with displacement',
  [OperandType.AddressIndirectIndex]: 'address register indirect with index',
  [OperandType.AbsoluteWord]: 'absolute short',
  [OperandType.AbsoluteLongWord]: 'absolute long',
  [OperandType.PcIndirectDisplacement]: 'program counter indirect with displacement',
  [OperandType.PcIndirectIndex]: 'program counter indirect with index',
  [OperandType.Immediate]: 'immediate',
  [OperandType.ConditionCodeRegister]: 'condition code register',
  [OperandType.StatusRegister]: 'status register',
  [OperandType.UserStackPointer]: 'user stack pointer',
  [OperandType.Address]: 'address',
};

// e.g. "address register indirect (An)"
export function operandTypeToString(type: OperandType): string {
  return `${OPERAND_TYPE_NAMES[type]} ${type}`;
}

interface OperandBase {
  loc: SourceLocation;
}

export interface DataRegisterDirectOperand extends OperandBase {
  type: OperandType.DataRegisterDirect;
  register: DataRegister;
}

export interface AddressRegisterDirectOperand extends OperandBase {
  type: OperandType.AddressRegisterDirect;
  register: AddressRegister;
}

export interface AddressIndirectOperand extends OperandBase {
  type: OperandType.AddressIndirect;
  register: AddressRegister;
}

export interface AddressIndirectPostIncrementOperand extends OperandBase {
  type: OperandType.AddressIndirectPostIncrement;
  register: AddressRegister;
}

export interface AddressIndirectPreDecrementOperand extends OperandBase {
  type: OperandType.AddressIndirectPreDecrement;
  register: AddressRegister;
}

export interface AddressIndirectDisplacementOperand extends OperandBase {
  type: OperandType.AddressIndirectDisplacement;
  register: AddressRegister;
  displacement: number;
}

export interface AddressIndirectIndexOperand extends OperandBase {
  type: OperandType.AddressIndirectIndex;
  register: AddressRegister;
  displacement: number;
  index: IndexRegister;
  indexSize: Size;
}

export interface AbsoluteWordOperand extends OperandBase {
  type: OperandType.AbsoluteWord;
  value: number;
}

export interface AbsoluteLongWordOperand extends OperandBase {
  type: OperandType.AbsoluteLongWord;
  value: number;
}

export interface PcIndirectDisplacementOperand extends OperandBase {
  type: OperandType.PcIndirectDisplacement;
  displacement: number;
}

export interface PcIndirectIndexOperand extends OperandBase {
  type: OperandType.PcIndirectIndex;
  displacement: number;
  index: IndexRegister;
  indexSize: Size;
}

export interface ImmediateOperand extends OperandBase {
  type: OperandType.Immediate;
  value: number;
}

export interface ConditionCodeRegisterOperand extends OperandBase {
  type: OperandType.ConditionCodeRegister;
}

export interface StatusRegisterOperand extends OperandBase {
  type: OperandType.StatusRegister;
}

export interface UserStackPointerOperand extends OperandBase {
  type: OperandType.UserStackPointer;
}

// Placeholder; the parser never produces it
export interface AddressOperand extends OperandBase {
  type: OperandType.Address;
}

export type Operand =
  | DataRegisterDirectOperand
  | AddressRegisterDirectOperand
  | AddressIndirectOperand
  | AddressIndirectPostIncrementOperand
  | AddressIndirectPreDecrementOperand
  | AddressIndirectDisplacementOperand
  | AddressIndirectIndexOperand
  | AbsoluteWordOperand
  | AbsoluteLongWordOperand
  | PcIndirectDisplacementOperand
  | PcIndirectIndexOperand
  | ImmediateOperand
  | ConditionCodeRegisterOperand
  | StatusRegisterOperand
  | UserStackPointerOperand
  | AddressOperand;

/**
 * Renders an operand in the form the operand parser reads back to the same variant.
 */
export function formatOperand(operand: Operand): string {
  switch (operand.type) {
    case OperandType.DataRegisterDirect:
    case OperandType.AddressRegisterDirect:
      return formatRegister(operand.register);
    case OperandType.AddressIndirect:
      return `(${formatRegister(operand.register)})`;
    case OperandType.AddressIndirectPostIncrement:
      return `(${formatRegister(operand.register)})+`;
    case OperandType.AddressIndirectPreDecrement:
      return `-(${formatRegister(operand.register)})`;
    case OperandType.AddressIndirectDisplacement:
      return `(${operand.displacement},${formatRegister(operand.register)})`;
    case OperandType.AddressIndirectIndex:
      return `(${operand.displacement},${formatRegister(operand.register)},` +
        `${formatRegister(operand.index)}.${operand.indexSize})`;
    case OperandType.AbsoluteWord:
      return `(${operand.value}).W`;
    case OperandType.AbsoluteLongWord:
      return `(${operand.value}).L`;
    case OperandType.PcIndirectDisplacement:
      return `(${operand.displacement},PC)`;
    case OperandType.PcIndirectIndex:
      return `(${operand.displacement},PC,${formatRegister(operand.index)}.${operand.indexSize})`;
    case OperandType.Immediate:
      return `#${operand.value}`;
    case OperandType.ConditionCodeRegister:
      return 'CCR';
    case OperandType.StatusRegister:
      return 'SR';
    case OperandType.UserStackPointer:
      return 'USP';
    case OperandType.Address:
      return '[address operand]';
  }
}

// Canonical text carries every field of the variant
export function operandsEqual(a: Operand, b: Operand): boolean {
  return a.type === b.type &&
    locationsEqual(a.loc, b.loc) &&
    formatOperand(a) === formatOperand(b);
}

// ============================================================
// Statements
// ============================================================

export interface LabelStatement {
  type: 'Label';
  name: string;
  loc: SourceLocation;
}

export interface CommentStatement {
  type: 'Comment';
  text: string;
  loc: SourceLocation;
}

// size is only set when it was written in the source
export interface OperationStatement {
  type: 'Operation';
  operation: Operation;
  size?: Size;
  operands: Operand[];
  loc: SourceLocation;
}

export type Statement = LabelStatement | CommentStatement | OperationStatement;

// Local labels start with a dot and are scoped to the preceding global label
export function isLocalLabel(label: LabelStatement): boolean {
  return label.name.startsWith('.');
}

export function formatStatement(statement: Statement): string {
  switch (statement.type) {
    case 'Label':
      return `${statement.name}:`;
    case 'Comment':
      return `; ${statement.text}`;
    case 'Operation': {
      const mnemonic = formatMnemonic(statement);
      if (statement.operands.length === 0) return mnemonic;
      return `${mnemonic} ${statement.operands.map(formatOperand).join(',')}`;
    }
  }
}

// Mnemonic padded to a fixed column, for listings
export function formatAlignedStatement(statement: Statement): string {
  if (statement.type !== 'Operation') return formatStatement(statement);
  const operands = statement.operands.map(formatOperand).join(',');
  return `${formatMnemonic(statement).padEnd(8)} ${operands}`.trimEnd();
}

function formatMnemonic(statement: OperationStatement): string {
  const code = statement.operation.code;
  return statement.size === undefined ? code : `${code}.${statement.size}`;
}

export function statementsEqual(a: Statement, b: Statement): boolean {
  if (!locationsEqual(a.loc, b.loc)) return false;
  switch (a.type) {
    case 'Label':
      return b.type === 'Label' && a.name === b.name;
    case 'Comment':
      return b.type === 'Comment' && a.text === b.text;
    case 'Operation':
      return b.type === 'Operation' &&
        a.operation.code === b.operation.code &&
        a.size === b.size &&
        a.operands.length === b.operands.length &&
        a.operands.every((operand, i) => operandsEqual(operand, b.operands[i]));
  }
}

// Program is the parsed statement list plus the statement index each label targets
export interface Program {
  statements: Statement[];
  labels: Map<LabelStatement, number>;
}
