import type { BrewinParameter } from '../../ast/brewin-nodes';
import {
  BrewinInterface,
  BrewinInterfaceField,
  BrewinInterfaceMethod,
  BrewinParameterByReference,
  BrewinParameterByValue,
} from '../../ast/brewin-nodes';
import { BrewinNameError, BrewinTypeError } from '../../errors';
import { checkNotNull } from '../../utils';
import { createInterfaceTable, lookupInterface, satisfiesInterface } from '../interface-table';
import {
  Value,
  functionValue,
  intValue,
  nilValue,
  objectValue,
  stringValue,
} from '../value';

const method = (...parameters: BrewinParameter[]): Value =>
  functionValue({
    __type__: 'FunctionDescriptor',
    name: 'speakv',
    parameters,
    statements: [],
    returnType: { __type__: 'PrimitiveType', type: 'void' },
  });

const objectWith = (fields: Record<string, Value>): Value =>
  objectValue(new Map(Object.entries(fields)));

const table = createInterfaceTable([
  BrewinInterface('A', [
    BrewinInterfaceField('namei'),
    BrewinInterfaceMethod('speakf', [
      BrewinParameterByValue('wordss'),
      BrewinParameterByReference('countb'),
    ]),
  ]),
  BrewinInterface('B', [BrewinInterfaceField('friendA')]),
]);
const A = lookupInterface(table, 'A');
const B = lookupInterface(table, 'B');

describe('interface-table', () => {
  it('Builds field and method requirements', () => {
    expect(Array.from(A.fields.entries())).toEqual([['namei', 'int']]);
    expect(A.methods.get('speakf')).toEqual([
      { type: 'string', isReference: false },
      { type: 'bool', isReference: true },
    ]);
    expect(Array.from(B.fields.entries())).toEqual([['friendA', 'object']]);
    expect(() => lookupInterface(table, 'C')).toThrow(BrewinNameError);
  });

  it('Rejects malformed interfaces', () => {
    expect(() => createInterfaceTable([BrewinInterface('AB', [])])).toThrow(BrewinNameError);
    expect(() => createInterfaceTable([BrewinInterface('a', [])])).toThrow(BrewinNameError);
    expect(() =>
      createInterfaceTable([BrewinInterface('A', []), BrewinInterface('A', [])])
    ).toThrow(BrewinNameError);
    expect(() =>
      createInterfaceTable([
        BrewinInterface('A', [BrewinInterfaceField('xi'), BrewinInterfaceMethod('xi', [])]),
      ])
    ).toThrow(BrewinNameError);
    expect(() =>
      createInterfaceTable([BrewinInterface('A', [BrewinInterfaceField('xv')])])
    ).toThrow(BrewinTypeError);
    expect(() =>
      createInterfaceTable([BrewinInterface('A', [BrewinInterfaceField('x')])])
    ).toThrow(BrewinTypeError);
    expect(() =>
      createInterfaceTable([
        BrewinInterface('A', [BrewinInterfaceMethod('ff', [BrewinParameterByValue('pq')])]),
      ])
    ).toThrow(BrewinTypeError);
    expect(() =>
      createInterfaceTable([BrewinInterface('A', [BrewinInterfaceField('otherC')])])
    ).toThrow(BrewinNameError);
  });

  it('Interfaces may refer to ones defined later and to themselves', () => {
    const mutual = createInterfaceTable([
      BrewinInterface('A', [BrewinInterfaceField('nextB')]),
      BrewinInterface('B', [BrewinInterfaceField('nextA')]),
    ]);
    expect(mutual.size).toBe(2);
    expect(createInterfaceTable([BrewinInterface('L', [BrewinInterfaceField('nextL')])]).size).toBe(
      1
    );
  });

  it('Nil satisfies every interface, other non-objects none', () => {
    expect(satisfiesInterface(nilValue(), A)).toBe(true);
    expect(satisfiesInterface(functionValue(null), A)).toBe(true);
    expect(satisfiesInterface(intValue(1), A)).toBe(false);
    expect(satisfiesInterface(method(), A)).toBe(false);
  });

  it('Checks required fields by runtime tag', () => {
    expect(satisfiesInterface(objectWith({ friendA: nilValue() }), B)).toBe(true);
    expect(satisfiesInterface(objectWith({ friendA: objectValue() }), B)).toBe(true);
    expect(satisfiesInterface(objectWith({}), B)).toBe(false);
    expect(satisfiesInterface(objectWith({ friendA: intValue(3) }), B)).toBe(false);
  });

  it('Checks method parameter shapes but not return types', () => {
    const good = objectWith({
      namei: intValue(1),
      speakf: method(BrewinParameterByValue('texts'), BrewinParameterByReference('flagb')),
      extras: stringValue('ignored'),
    });
    expect(satisfiesInterface(good, A)).toBe(true);

    const missingMethod = objectWith({ namei: intValue(1) });
    expect(satisfiesInterface(missingMethod, A)).toBe(false);

    const nilMethod = objectWith({ namei: intValue(1), speakf: functionValue(null) });
    expect(satisfiesInterface(nilMethod, A)).toBe(false);

    const notAMethod = objectWith({ namei: intValue(1), speakf: stringValue('no') });
    expect(satisfiesInterface(notAMethod, A)).toBe(false);

    const wrongArity = objectWith({
      namei: intValue(1),
      speakf: method(BrewinParameterByValue('texts')),
    });
    expect(satisfiesInterface(wrongArity, A)).toBe(false);

    const wrongReference = objectWith({
      namei: intValue(1),
      speakf: method(BrewinParameterByValue('texts'), BrewinParameterByValue('flagb')),
    });
    expect(satisfiesInterface(wrongReference, A)).toBe(false);

    const wrongType = objectWith({
      namei: intValue(1),
      speakf: method(BrewinParameterByValue('texti'), BrewinParameterByReference('flagb')),
    });
    expect(satisfiesInterface(wrongType, A)).toBe(false);
  });

  it('Interface-typed method parameters match object parameters', () => {
    const withInterfaceParameter = createInterfaceTable([
      BrewinInterface('P', [BrewinInterfaceMethod('visitv', [BrewinParameterByValue('otherP')])]),
    ]);
    const P = checkNotNull(withInterfaceParameter.get('P'));
    const visitor = objectWith({ visitv: method(BrewinParameterByValue('xo')) });
    expect(satisfiesInterface(visitor, P)).toBe(true);
  });
});
