import type { BrewinFunctionDefinition, BrewinParameter } from '../ast/brewin-nodes';
import { failWithNameError, failWithTypeError } from '../errors';

import type { InterfaceTable } from './interface-table';
import {
  FunctionDescriptor,
  Value,
  interfaceNameOf,
  returnTypeFromName,
  runtimeTypeOf,
  signatureLetterOf,
  typeFromName,
} from './value';

const LEGAL_PARAMETER_LETTERS = new Set(['i', 's', 'b', 'o', 'f']);

/** Signature letters of the formals. Interface-typed formals contribute `o`. */
export const signatureOfParameters = (
  functionName: string,
  parameters: readonly BrewinParameter[]
): string =>
  parameters
    .map((parameter) => {
      const type = typeFromName(parameter.name);
      const letter = type == null ? null : signatureLetterOf(runtimeTypeOf(type));
      if (letter == null || !LEGAL_PARAMETER_LETTERS.has(letter)) {
        return failWithTypeError(
          `invalid type of parameter ${parameter.name} in function ${functionName}`
        );
      }
      return letter;
    })
    .join('');

/** Signature letters of already evaluated arguments. A void argument is a type error. */
export const signatureOfArguments = (values: readonly Value[]): string =>
  values
    .map(
      (value) =>
        signatureLetterOf(value.type) ?? failWithTypeError('void value passed as an argument')
    )
    .join('');

/** Every declared function, keyed by name and then by parameter signature. */
export default class FunctionTable {
  private readonly overloads = new Map<string, Map<string, FunctionDescriptor>>();

  constructor(definitions: readonly BrewinFunctionDefinition[], interfaces: InterfaceTable) {
    definitions.forEach((definition) => this.add(definition, interfaces));
  }

  private add(definition: BrewinFunctionDefinition, interfaces: InterfaceTable): void {
    const { name, parameters, statements } = definition;
    const signature = signatureOfParameters(name, parameters);
    const parameterNames = new Set<string>();
    parameters.forEach((parameter) => {
      const interfaceName = interfaceNameOf(
        typeFromName(parameter.name) ?? failWithTypeError(`invalid parameter ${parameter.name}`)
      );
      if (interfaceName != null && !interfaces.has(interfaceName)) {
        failWithNameError(`interface not defined: ${interfaceName}`);
      }
      if (parameterNames.has(parameter.name)) {
        failWithNameError(`duplicate parameter ${parameter.name} in function ${name}`);
      }
      parameterNames.add(parameter.name);
    });
    const returnType =
      returnTypeFromName(name) ?? failWithTypeError(`invalid return type of function ${name}`);

    const overloadsOfName = this.overloads.get(name) ?? new Map<string, FunctionDescriptor>();
    if (overloadsOfName.has(signature)) {
      failWithNameError(`function already defined: ${name}(${signature})`);
    }
    overloadsOfName.set(signature, {
      __type__: 'FunctionDescriptor',
      name,
      parameters,
      statements,
      returnType,
    });
    this.overloads.set(name, overloadsOfName);
  }

  /** All overloads sharing `name`, in declaration order. */
  overloadsOf(name: string): readonly FunctionDescriptor[] {
    return Array.from(this.overloads.get(name)?.values() ?? []);
  }

  find(name: string, signature: string): FunctionDescriptor | undefined {
    return this.overloads.get(name)?.get(signature);
  }

  /**
   * Exact-match lookup. A miss is a type error when `name` exists under another signature and a
   * name error otherwise.
   */
  resolve(name: string, signature: string): FunctionDescriptor {
    const overloadsOfName = this.overloads.get(name);
    if (overloadsOfName == null) return failWithNameError(`function not defined: ${name}`);
    return (
      overloadsOfName.get(signature) ??
      failWithTypeError(`no overload of ${name} takes arguments (${signature})`)
    );
  }
}
