import type { BrewinInterfaceDefinition, BrewinParameter } from '../ast/brewin-nodes';
import { failWithNameError, failWithTypeError } from '../errors';

import {
  DeclaredType,
  Value,
  ValueType,
  interfaceNameOf,
  runtimeTypeOf,
  typeFromName,
} from './value';

export type InterfaceMethodParameter = {
  readonly type: ValueType;
  readonly isReference: boolean;
};

export type InterfaceDescriptor = {
  readonly name: string;
  /** Required field name to the runtime tag the field must carry. */
  readonly fields: ReadonlyMap<string, ValueType>;
  /** Required method name to its parameter shape. Return types are not part of it. */
  readonly methods: ReadonlyMap<string, readonly InterfaceMethodParameter[]>;
};

export type InterfaceTable = ReadonlyMap<string, InterfaceDescriptor>;

const memberType = (interfaceName: string, memberName: string): DeclaredType => {
  const type = typeFromName(memberName);
  if (type == null || runtimeTypeOf(type) === 'void') {
    return failWithTypeError(`malformed interface ${interfaceName}: invalid type of ${memberName}`);
  }
  return type;
};

export const createInterfaceTable = (
  definitions: readonly BrewinInterfaceDefinition[]
): InterfaceTable => {
  const table = new Map<string, InterfaceDescriptor>();
  const referencedInterfaces: string[] = [];
  const recordType = (type: DeclaredType): ValueType => {
    const referenced = interfaceNameOf(type);
    if (referenced != null) referencedInterfaces.push(referenced);
    return runtimeTypeOf(type);
  };

  definitions.forEach((definition) => {
    const { name } = definition;
    if (!/^[A-Z]$/.test(name)) {
      failWithNameError(`interface name must be a single uppercase letter: ${name}`);
    }
    if (table.has(name)) failWithNameError(`interface already defined: ${name}`);

    const fields = new Map<string, ValueType>();
    const methods = new Map<string, readonly InterfaceMethodParameter[]>();
    definition.members.forEach((member) => {
      if (fields.has(member.name) || methods.has(member.name)) {
        failWithNameError(`duplicate member ${member.name} in interface ${name}`);
      }
      switch (member.__type__) {
        case 'InterfaceFieldDeclaration':
          fields.set(member.name, recordType(memberType(name, member.name)));
          return;
        case 'InterfaceMethodDeclaration':
          methods.set(
            member.name,
            member.parameters.map((parameter) => ({
              type: recordType(memberType(name, parameter.name)),
              isReference: parameter.isReference,
            }))
          );
          return;
      }
    });
    table.set(name, { name, fields, methods });
  });

  referencedInterfaces.forEach((referenced) => {
    if (!table.has(referenced)) failWithNameError(`interface not defined: ${referenced}`);
  });
  return table;
};

const parametersMatch = (
  parameters: readonly BrewinParameter[],
  required: readonly InterfaceMethodParameter[]
): boolean =>
  parameters.length === required.length &&
  parameters.every((parameter, index) => {
    const requiredParameter = required[index];
    const type = typeFromName(parameter.name);
    return (
      requiredParameter != null &&
      type != null &&
      runtimeTypeOf(type) === requiredParameter.type &&
      parameter.isReference === requiredParameter.isReference
    );
  });

/** Structural check of `value` against `descriptor`. Nil satisfies every interface. */
export const satisfiesInterface = (value: Value, descriptor: InterfaceDescriptor): boolean => {
  const content = value.content;
  if (content.value === null) return true;
  if (content.type !== 'object') return false;
  const fields = content.value;

  for (const [fieldName, requiredType] of descriptor.fields) {
    if (fields.get(fieldName)?.type !== requiredType) return false;
  }
  for (const [methodName, requiredParameters] of descriptor.methods) {
    const method = fields.get(methodName)?.content;
    if (method == null || method.type !== 'function' || method.value === null) return false;
    if (!parametersMatch(method.value.parameters, requiredParameters)) return false;
  }
  return true;
};

/** Looks up `interfaceName`, failing with a NameError when no such interface exists. */
export const lookupInterface = (
  table: InterfaceTable,
  interfaceName: string
): InterfaceDescriptor =>
  table.get(interfaceName) ?? failWithNameError(`interface not defined: ${interfaceName}`);
