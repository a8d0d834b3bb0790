/**
 * Operation table
 *
 * Every opcode the assembler knows, with the sizes and operand types each of
 * its configurations accepts. The data lives in operations.json; operand
 * positions there are either a named group of types or an explicit list.
 */

import { readFileSync } from 'fs';
import { type OperandType, type Size, isOperandType, parseSizeName } from '../types/ast.js';

export interface Configuration {
  // Empty for operations that take no size suffix
  sizes: Size[];
  operands: OperandType[][];
}

export interface Operation {
  code: string;
  configurations: Configuration[];
}

export type OperationTable = ReadonlyMap<string, Operation>;

export class OperationTableError extends Error {
  constructor(message: string, public source: string) {
    super(`${message} in ${source}`);
    this.name = 'OperationTableError';
  }
}

const DEFAULT_TABLE_URL = new URL('./operations.json', import.meta.url);

let defaultTable: OperationTable | undefined;

export function defaultOperationTable(): OperationTable {
  if (defaultTable === undefined) {
    defaultTable = loadOperationTable(DEFAULT_TABLE_URL);
  }
  return defaultTable;
}

export function loadOperationTable(path: string | URL): OperationTable {
  const source = path.toString();
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return createOperationTable(data, source);
}

/**
 * Builds a table from already parsed JSON data, checking its shape as it goes.
 */
export function createOperationTable(data: unknown, source: string = '<inline>'): OperationTable {
  if (!isRecord(data)) {
    throw new OperationTableError('Expected an object with groups and operations', source);
  }

  const groups = new Map<string, OperandType[]>();
  const rawGroups = data.groups ?? {};
  if (!isRecord(rawGroups)) {
    throw new OperationTableError('Expected groups to be an object', source);
  }
  for (const [name, types] of Object.entries(rawGroups)) {
    groups.set(name, parseOperandTypes(types, `group '${name}'`, source));
  }

  if (!Array.isArray(data.operations)) {
    throw new OperationTableError('Expected operations to be an array', source);
  }

  const table = new Map<string, Operation>();
  for (const raw of data.operations) {
    const operation = parseOperation(raw, groups, source);
    if (table.has(operation.code)) {
      throw new OperationTableError(`Duplicate operation '${operation.code}'`, source);
    }
    table.set(operation.code, operation);
  }
  return table;
}

function parseOperation(raw: unknown, groups: Map<string, OperandType[]>, source: string): Operation {
  if (!isRecord(raw) || typeof raw.code !== 'string') {
    throw new OperationTableError('Expected every operation to have a code', source);
  }
  const code = raw.code;
  if (!Array.isArray(raw.configurations) || raw.configurations.length === 0) {
    throw new OperationTableError(`Operation '${code}' has no configurations`, source);
  }

  const configurations = raw.configurations.map((config: unknown): Configuration => {
    if (!isRecord(config) || !Array.isArray(config.sizes) || !Array.isArray(config.operands)) {
      throw new OperationTableError(`Operation '${code}' has a configuration without sizes or operands`, source);
    }
    const sizes = config.sizes.map((name: unknown) => {
      const size = typeof name === 'string' ? parseSizeName(name) : undefined;
      if (size === undefined) {
        throw new OperationTableError(`Operation '${code}' has unknown size '${String(name)}'`, source);
      }
      return size;
    });
    const operands = config.operands.map((position: unknown) => {
      if (typeof position === 'string') {
        const group = groups.get(position);
        if (group === undefined) {
          throw new OperationTableError(`Operation '${code}' refers to unknown group '${position}'`, source);
        }
        return group;
      }
      return parseOperandTypes(position, `operation '${code}'`, source);
    });
    return { sizes, operands };
  });

  return { code, configurations };
}

function parseOperandTypes(raw: unknown, context: string, source: string): OperandType[] {
  if (!Array.isArray(raw)) {
    throw new OperationTableError(`Expected a list of operand types for ${context}`, source);
  }
  return raw.map((type: unknown) => {
    if (typeof type !== 'string' || !isOperandType(type)) {
      throw new OperationTableError(`Unknown operand type '${String(type)}' in ${context}`, source);
    }
    return type;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
