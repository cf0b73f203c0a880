import { BrewinFaultError, BrewinTypeError } from '../../errors';
import {
  evaluateBinaryOperator,
  evaluateConversion,
  evaluateUnaryOperator,
  floorDivide,
} from '../operators';
import {
  Value,
  boolValue,
  functionValue,
  intValue,
  nilValue,
  objectValue,
  stringValue,
  voidValue,
} from '../value';
import type { FunctionDescriptor } from '../value';

const FUNCTION: FunctionDescriptor = {
  __type__: 'FunctionDescriptor',
  name: 'fi',
  parameters: [],
  statements: [],
  returnType: { __type__: 'PrimitiveType', type: 'int' },
};

const text = (value: Value): string => {
  const content = value.content;
  return `${content.type}:${String(content.value)}`;
};

describe('operators', () => {
  it('floorDivide rounds toward negative infinity', () => {
    expect(floorDivide(BigInt(7), BigInt(2)).toString()).toBe('3');
    expect(floorDivide(BigInt(-7), BigInt(2)).toString()).toBe('-4');
    expect(floorDivide(BigInt(7), BigInt(-2)).toString()).toBe('-4');
    expect(floorDivide(BigInt(-7), BigInt(-2)).toString()).toBe('3');
    expect(floorDivide(BigInt(-8), BigInt(2)).toString()).toBe('-4');
    expect(floorDivide(BigInt(0), BigInt(-5)).toString()).toBe('0');
    expect(() => floorDivide(BigInt(1), BigInt(0))).toThrow(BrewinFaultError);
  });

  it('Integer arithmetic and comparison', () => {
    expect(text(evaluateBinaryOperator('+', intValue(2), intValue(3)))).toBe('int:5');
    expect(text(evaluateBinaryOperator('-', intValue(2), intValue(3)))).toBe('int:-1');
    expect(text(evaluateBinaryOperator('*', intValue(-4), intValue(3)))).toBe('int:-12');
    expect(text(evaluateBinaryOperator('/', intValue(-7), intValue(2)))).toBe('int:-4');
    expect(text(evaluateBinaryOperator('<', intValue(2), intValue(3)))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('<=', intValue(3), intValue(3)))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('>', intValue(2), intValue(3)))).toBe('bool:false');
    expect(text(evaluateBinaryOperator('>=', intValue(2), intValue(3)))).toBe('bool:false');
  });

  it('Integers do not overflow', () => {
    const big = intValue(BigInt('9007199254740993'));
    expect(text(evaluateBinaryOperator('*', big, big))).toBe(
      'int:81129638414606699710187514626049'
    );
  });

  it('String concatenation', () => {
    expect(text(evaluateBinaryOperator('+', stringValue('ab'), stringValue('cd')))).toBe(
      'string:abcd'
    );
    expect(() => evaluateBinaryOperator('+', stringValue('ab'), intValue(1))).toThrow(
      BrewinTypeError
    );
    expect(() => evaluateBinaryOperator('-', stringValue('ab'), stringValue('a'))).toThrow(
      BrewinTypeError
    );
    expect(() => evaluateBinaryOperator('<', stringValue('a'), stringValue('b'))).toThrow(
      BrewinTypeError
    );
  });

  it('Logical operators need bools', () => {
    expect(text(evaluateBinaryOperator('&&', boolValue(true), boolValue(false)))).toBe(
      'bool:false'
    );
    expect(text(evaluateBinaryOperator('||', boolValue(true), boolValue(false)))).toBe('bool:true');
    expect(() => evaluateBinaryOperator('&&', boolValue(true), intValue(1))).toThrow(
      BrewinTypeError
    );
  });

  it('Equality of primitives compares tag and value', () => {
    expect(text(evaluateBinaryOperator('==', intValue(1), intValue(1)))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('!=', intValue(1), intValue(2)))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('==', stringValue('1'), intValue(1)))).toBe('bool:false');
    expect(text(evaluateBinaryOperator('==', boolValue(true), intValue(1)))).toBe('bool:false');
    expect(text(evaluateBinaryOperator('!=', boolValue(true), intValue(1)))).toBe('bool:true');
  });

  it('Equality of objects and functions compares identity', () => {
    const object = objectValue();
    expect(text(evaluateBinaryOperator('==', object, object.copy()))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('==', objectValue(), objectValue()))).toBe('bool:false');
    expect(text(evaluateBinaryOperator('==', nilValue(), nilValue()))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('!=', nilValue(), nilValue()))).toBe('bool:false');
    expect(text(evaluateBinaryOperator('==', object, nilValue()))).toBe('bool:false');
    const sameFunction = evaluateBinaryOperator(
      '==',
      functionValue(FUNCTION),
      functionValue(FUNCTION)
    );
    expect(text(sameFunction)).toBe('bool:true');
    expect(text(evaluateBinaryOperator('==', functionValue(FUNCTION), nilValue()))).toBe(
      'bool:false'
    );
    expect(text(evaluateBinaryOperator('!=', functionValue(FUNCTION), nilValue()))).toBe(
      'bool:true'
    );
    expect(text(evaluateBinaryOperator('==', functionValue(null), nilValue()))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('==', voidValue(), nilValue()))).toBe('bool:true');
    expect(text(evaluateBinaryOperator('==', intValue(0), nilValue()))).toBe('bool:false');
  });

  it('Unary operators', () => {
    expect(text(evaluateUnaryOperator('-', intValue(5)))).toBe('int:-5');
    expect(text(evaluateUnaryOperator('!', boolValue(false)))).toBe('bool:true');
    expect(() => evaluateUnaryOperator('-', boolValue(true))).toThrow(BrewinTypeError);
    expect(() => evaluateUnaryOperator('!', intValue(0))).toThrow(BrewinTypeError);
  });

  it('Conversions to int', () => {
    const five = intValue(5);
    expect(evaluateConversion('int', five)).toBe(five);
    expect(text(evaluateConversion('int', boolValue(true)))).toBe('int:1');
    expect(text(evaluateConversion('int', boolValue(false)))).toBe('int:0');
    expect(text(evaluateConversion('int', stringValue(' -42 ')))).toBe('int:-42');
    expect(text(evaluateConversion('int', stringValue('+7')))).toBe('int:7');
    expect(() => evaluateConversion('int', stringValue('4.2'))).toThrow(BrewinTypeError);
    expect(() => evaluateConversion('int', stringValue(''))).toThrow(BrewinTypeError);
    expect(() => evaluateConversion('int', stringValue('0x10'))).toThrow(BrewinTypeError);
    expect(() => evaluateConversion('int', objectValue())).toThrow(BrewinTypeError);
  });

  it('Conversions to str and bool', () => {
    expect(text(evaluateConversion('str', intValue(-3)))).toBe('string:-3');
    expect(text(evaluateConversion('str', boolValue(false)))).toBe('string:false');
    expect(text(evaluateConversion('bool', intValue(0)))).toBe('bool:false');
    expect(text(evaluateConversion('bool', intValue(-1)))).toBe('bool:true');
    expect(text(evaluateConversion('bool', stringValue('')))).toBe('bool:false');
    expect(text(evaluateConversion('bool', stringValue('false')))).toBe('bool:true');
    expect(() => evaluateConversion('str', nilValue())).toThrow(BrewinTypeError);
    expect(() => evaluateConversion('bool', functionValue(FUNCTION))).toThrow(BrewinTypeError);
    expect(() => evaluateConversion('bool', voidValue())).toThrow(BrewinTypeError);
  });
});
