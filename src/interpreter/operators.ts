import type { BinaryOperator, ConversionTarget, UnaryOperator } from '../ast/brewin-nodes';
import { failWithFaultError, failWithTypeError } from '../errors';

import { Value, ValueContent, boolValue, intValue, stringValue } from './value';

/** Quotient rounded toward negative infinity. */
export const floorDivide = (dividend: bigint, divisor: bigint): bigint => {
  if (divisor === 0n) return failWithFaultError('division by zero');
  const quotient = dividend / divisor;
  const remainder = dividend % divisor;
  return remainder !== 0n && remainder < 0n !== divisor < 0n ? quotient - 1n : quotient;
};

const valuesEqual = (left: ValueContent, right: ValueContent): boolean => {
  if (left.value === null && right.value === null) return true;
  if (left.type === 'object' && right.type === 'object') return left.value === right.value;
  if (left.type === 'function' && right.type === 'function') return left.value === right.value;
  return left.type === right.type && left.value === right.value;
};

const invalidOperands = (operator: string, left: Value, right: Value): never =>
  failWithTypeError(`invalid operands for ${operator}: ${left.type} and ${right.type}`);

const evaluateIntegerOperator = (
  operator: '-' | '*' | '/' | '<' | '<=' | '>' | '>=',
  l: bigint,
  r: bigint
): Value => {
  switch (operator) {
    case '-':
      return intValue(l - r);
    case '*':
      return intValue(l * r);
    case '/':
      return intValue(floorDivide(l, r));
    case '<':
      return boolValue(l < r);
    case '<=':
      return boolValue(l <= r);
    case '>':
      return boolValue(l > r);
    case '>=':
      return boolValue(l >= r);
  }
};

export const evaluateBinaryOperator = (
  operator: BinaryOperator,
  left: Value,
  right: Value
): Value => {
  const l = left.content;
  const r = right.content;
  switch (operator) {
    case '==':
      return boolValue(valuesEqual(l, r));
    case '!=':
      return boolValue(!valuesEqual(l, r));
    case '+':
      if (l.type === 'string' && r.type === 'string') return stringValue(l.value + r.value);
      if (l.type === 'int' && r.type === 'int') return intValue(l.value + r.value);
      return invalidOperands(operator, left, right);
    case '-':
    case '*':
    case '/':
    case '<':
    case '<=':
    case '>':
    case '>=':
      if (l.type !== 'int' || r.type !== 'int') return invalidOperands(operator, left, right);
      return evaluateIntegerOperator(operator, l.value, r.value);
    case '&&':
    case '||':
      if (l.type !== 'bool' || r.type !== 'bool') return invalidOperands(operator, left, right);
      return boolValue(operator === '&&' ? l.value && r.value : l.value || r.value);
  }
};

export const evaluateUnaryOperator = (operator: UnaryOperator, operand: Value): Value => {
  const content = operand.content;
  switch (operator) {
    case '-':
      if (content.type !== 'int') return failWithTypeError(`cannot negate ${content.type}`);
      return intValue(-content.value);
    case '!':
      if (content.type !== 'bool') return failWithTypeError(`cannot apply ! to ${content.type}`);
      return boolValue(!content.value);
  }
};

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;

export const evaluateConversion = (toType: ConversionTarget, operand: Value): Value => {
  const content = operand.content;
  switch (toType) {
    case 'int':
      switch (content.type) {
        case 'int':
          return operand;
        case 'bool':
          return intValue(content.value ? 1 : 0);
        case 'string':
          if (!INTEGER_TEXT.test(content.value)) {
            return failWithTypeError(`cannot convert "${content.value}" to int`);
          }
          return intValue(BigInt(content.value.trim()));
        default:
          return failWithTypeError(`cannot convert ${content.type} to int`);
      }
    case 'str':
      switch (content.type) {
        case 'string':
          return operand;
        case 'int':
          return stringValue(content.value.toString());
        case 'bool':
          return stringValue(content.value ? 'true' : 'false');
        default:
          return failWithTypeError(`cannot convert ${content.type} to str`);
      }
    case 'bool':
      switch (content.type) {
        case 'bool':
          return operand;
        case 'int':
          return boolValue(content.value !== 0n);
        case 'string':
          return boolValue(content.value !== '');
        default:
          return failWithTypeError(`cannot convert ${content.type} to bool`);
      }
  }
};
