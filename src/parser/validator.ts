// Matches an operation's size and operand types against its configurations

import {
  type Operand,
  type OperandType,
  Size,
  operandTypeToString,
  sizeToString,
} from '../types/ast.js';
import { InternalError, ValidationError } from './errors.js';
import type { Configuration, Operation } from './operations.js';

export interface ResolvedConfiguration {
  configuration: Configuration;
  // The written size, or the one implied by the configuration; undefined when unsized
  size: Size | undefined;
}

/**
 * Makes sure exactly one configuration of `operation` accepts the size and the
 * types of the operands. Throws a ValidationError naming the legal
 * alternatives otherwise, or an InternalError if the table is ambiguous.
 */
export function ensureMatchingConfigurationExists(
  operation: Operation,
  size: Size | undefined,
  operands: readonly Operand[],
): ResolvedConfiguration {
  const sizeMatching = size === undefined
    ? operation.configurations
    : operation.configurations.filter((config) => config.sizes.includes(size));

  if (size !== undefined && sizeMatching.length === 0) {
    throw new ValidationError(unsupportedSizeMessage(operation, size));
  }

  const matching = sizeMatching.filter((config) => acceptsOperands(config, operands));

  if (matching.length === 0) {
    throw new ValidationError(unsupportedOperandsMessage(operation, size, sizeMatching, operands));
  }
  if (matching.length > 1) {
    throw new InternalError(
      `Operation ${operation.code} has ${matching.length} configurations accepting ` +
      `${describeTypes(operands.map((operand) => operand.type))}`
    );
  }

  const configuration = matching[0];
  return { configuration, size: size ?? impliedSize(configuration) };
}

export function acceptsOperands(config: Configuration, operands: readonly Operand[]): boolean {
  return config.operands.length === operands.length &&
    config.operands.every((accepted, i) => accepted.includes(operands[i].type));
}

// Word unless the configuration doesn't allow it
function impliedSize(config: Configuration): Size | undefined {
  if (config.sizes.length === 0) return undefined;
  return config.sizes.includes(Size.Word) ? Size.Word : config.sizes[0];
}

function unsupportedSizeMessage(operation: Operation, size: Size): string {
  const supported = new Set<Size>();
  for (const config of operation.configurations) {
    config.sizes.forEach((s) => supported.add(s));
  }
  if (supported.size === 0) {
    return `The operation ${operation.code} doesn't take a size, but it was given the size ${sizeToString(size)}.`;
  }
  return `The operation ${operation.code} only supports the sizes ` +
    `${[...supported].map(sizeToString).join(', ')}, but it was given the size ${sizeToString(size)}.`;
}

function unsupportedOperandsMessage(
  operation: Operation,
  size: Size | undefined,
  candidates: readonly Configuration[],
  operands: readonly Operand[],
): string {
  const supplied = operands.length === 0
    ? 'no operands'
    : `operands of the types ${describeTypes(operands.map((operand) => operand.type))}`;
  const onSize = size === undefined ? '' : ` on size ${sizeToString(size)}`;
  const lines = [
    `You provided ${supplied}. But the ${operation.code} operation${onSize} doesn't accept ` +
    'operands of these types. Here are all the combinations that are accepted:',
  ];
  for (const config of candidates) {
    lines.push(`- ${describeConfiguration(config)}`);
  }
  return lines.join('\n');
}

function describeConfiguration(config: Configuration): string {
  if (config.operands.length === 0) return 'no operands';
  return config.operands.map((accepted) => accepted.join(' | ')).join(', ');
}

function describeTypes(types: readonly OperandType[]): string {
  return types.map(operandTypeToString).join(', ');
}
