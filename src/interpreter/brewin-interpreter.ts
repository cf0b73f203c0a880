import type {
  AssignmentStatement,
  BrewinExpression,
  BrewinProgram,
  BrewinStatement,
  FunctionCallExpression,
  IfStatement,
  LambdaExpression,
  ReturnStatement,
  WhileStatement,
} from '../ast/brewin-nodes';
import {
  BrewinInterpreterConfiguration,
  DEFAULT_INTERPRETER_CONFIGURATION,
} from '../configuration';
import { failWithFaultError, failWithNameError, failWithTypeError } from '../errors';
import { zip } from '../utils';

import Environment from './environment';
import FunctionTable, { signatureOfArguments } from './function-table';
import type { BrewinHost } from './host';
import {
  InterfaceTable,
  createInterfaceTable,
  lookupInterface,
  satisfiesInterface,
} from './interface-table';
import { evaluateBinaryOperator, evaluateConversion, evaluateUnaryOperator } from './operators';
import {
  BrewinObject,
  CallableDescriptor,
  DeclaredType,
  Value,
  ValueContent,
  boolValue,
  functionValue,
  intValue,
  interfaceNameOf,
  nilValue,
  objectValue,
  prettyPrintDeclaredType,
  returnTypeFromName,
  runtimeTypeOf,
  stringValue,
  stringifyValue,
  typeFromName,
  voidValue,
  zeroValueOf,
} from './value';

/** Outcome of a statement sequence. `returned` is set once a `return` statement ran. */
type ExecutionResult = { readonly result: Value; readonly returned: boolean };

/** Object reached by walking a dotted path, together with the cell that holds it. */
type ResolvedObject = { readonly cell: Value; readonly fields: BrewinObject };

/** The interpreter of one Brewin program. */
export default class BrewinInterpreter {
  private readonly environment: Environment = new Environment();

  private readonly interfaces: InterfaceTable;

  private readonly functions: FunctionTable;

  /**
   * Builds the interface table, then the function table.
   * Definition errors of either are thrown from here.
   */
  constructor(
    program: BrewinProgram,
    private readonly host: BrewinHost,
    private readonly configuration: BrewinInterpreterConfiguration = DEFAULT_INTERPRETER_CONFIGURATION
  ) {
    this.interfaces = createInterfaceTable(program.interfaces);
    this.functions = new FunctionTable(program.functions, this.interfaces);
  }

  /** Runs `main()` to completion. */
  readonly run = (): void => {
    const main =
      this.functions.find('main', '') ?? failWithNameError('main function not defined');
    this.callFunction(main, []);
  };

  private readonly callFunction = (
    descriptor: CallableDescriptor,
    actuals: readonly Value[],
    receiver: Value | null = null
  ): Value => {
    this.environment.enterFrame();
    try {
      if (receiver != null) this.environment.defineAtFunctionScope('selfo', receiver);
      if (descriptor.__type__ === 'LambdaDescriptor') {
        // A captured `selfo` stays hidden behind the receiver.
        descriptor.captured.forEach((cell, name) =>
          this.environment.defineAtFunctionScope(name, cell)
        );
      }
      zip(descriptor.parameters, actuals).forEach(([parameter, actual]) => {
        const bound = parameter.isReference ? actual : actual.copy();
        if (!this.environment.setInPlace(parameter.name, bound)) {
          this.environment.defineAtFunctionScope(parameter.name, bound);
        }
      });
      return this.executeStatements(descriptor.returnType, descriptor.statements).result;
    } finally {
      this.environment.exitFrame();
    }
  };

  private readonly executeStatements = (
    returnType: DeclaredType,
    statements: readonly BrewinStatement[]
  ): ExecutionResult => {
    for (const statement of statements) {
      switch (statement.__type__) {
        case 'VariableDefinitionStatement':
          this.defineVariable(statement.name, false);
          break;
        case 'BlockVariableDefinitionStatement':
          this.defineVariable(statement.name, true);
          break;
        case 'AssignmentStatement':
          this.assign(statement);
          break;
        case 'FunctionCallStatement':
          this.evaluateCall(statement.call);
          break;
        case 'IfStatement': {
          const executionResult = this.executeIf(returnType, statement);
          if (executionResult.returned) return executionResult;
          break;
        }
        case 'WhileStatement': {
          const executionResult = this.executeWhile(returnType, statement);
          if (executionResult.returned) return executionResult;
          break;
        }
        case 'ReturnStatement':
          return this.executeReturn(returnType, statement);
      }
    }
    return { result: zeroValueOf(returnType), returned: false };
  };

  private readonly defineVariable = (name: string, blockScoped: boolean): void => {
    const type = typeFromName(name);
    if (type == null || runtimeTypeOf(type) === 'void') {
      return failWithTypeError(`invalid type of variable ${name}`);
    }
    const interfaceName = interfaceNameOf(type);
    if (interfaceName != null) lookupInterface(this.interfaces, interfaceName);
    const defined = blockScoped
      ? this.environment.defineAtBlockScope(name, zeroValueOf(type))
      : this.environment.defineAtFunctionScope(name, zeroValueOf(type));
    if (!defined) failWithNameError(`variable already defined: ${name}`);
  };

  /** Content stored into a target of `type`, or a type error when `value` does not fit it. */
  private readonly checkAssignable = (
    target: string,
    type: DeclaredType | null,
    value: Value
  ): ValueContent => {
    if (type == null) return failWithTypeError(`invalid type of ${target}`);
    const interfaceName = interfaceNameOf(type);
    if (interfaceName != null) {
      if (value.type !== 'object') {
        return failWithTypeError(`${target} can only hold an object, got ${value.type}`);
      }
      if (!satisfiesInterface(value, lookupInterface(this.interfaces, interfaceName))) {
        return failWithTypeError(`object does not satisfy interface ${interfaceName}`);
      }
      return value.content;
    }
    const expectedType = runtimeTypeOf(type);
    if (value.isNil && (expectedType === 'object' || expectedType === 'function')) {
      return zeroValueOf(type).content;
    }
    if (value.type !== expectedType) {
      return failWithTypeError(`cannot assign ${value.type} to ${target} of type ${expectedType}`);
    }
    return value.content;
  };

  private readonly assign = ({ target, expression }: AssignmentStatement): void => {
    const rvalue = this.evaluateExpression(expression);
    const segments = target.split('.');
    const root = segments[0] ?? target;
    if (!this.environment.exists(root)) failWithNameError(`variable not defined: ${root}`);

    const fieldName = segments[segments.length - 1] ?? target;
    const content = this.checkAssignable(target, typeFromName(fieldName), rvalue);
    if (segments.length === 1) {
      this.environment.setInPlace(root, new Value(content));
      return;
    }
    const { fields } = this.resolveObject(segments.slice(0, -1));
    const existing = fields.get(fieldName);
    if (existing != null) {
      existing.set(content);
    } else {
      fields.set(fieldName, new Value(content));
    }
  };

  private readonly executeIf = (
    returnType: DeclaredType,
    { condition, statements, elseStatements }: IfStatement
  ): ExecutionResult => {
    const branch = this.evaluateCondition(condition) ? statements : elseStatements;
    if (branch == null) return { result: zeroValueOf(returnType), returned: false };
    return this.environment.withNestedBlock(() => this.executeStatements(returnType, branch));
  };

  private readonly executeWhile = (
    returnType: DeclaredType,
    { condition, statements }: WhileStatement
  ): ExecutionResult => {
    while (this.evaluateCondition(condition)) {
      const executionResult = this.environment.withNestedBlock(() =>
        this.executeStatements(returnType, statements)
      );
      if (executionResult.returned) return executionResult;
    }
    return { result: zeroValueOf(returnType), returned: false };
  };

  private readonly evaluateCondition = (condition: BrewinExpression): boolean => {
    const content = this.evaluateExpression(condition).content;
    if (content.type !== 'bool') {
      return failWithTypeError(`condition must be a bool, got ${content.type}`);
    }
    return content.value;
  };

  private readonly executeReturn = (
    returnType: DeclaredType,
    { expression }: ReturnStatement
  ): ExecutionResult => {
    if (expression == null) return { result: zeroValueOf(returnType), returned: true };
    const result = this.evaluateExpression(expression);
    if (result.type !== runtimeTypeOf(returnType)) {
      failWithTypeError(
        `cannot return ${result.type} from a function returning ${prettyPrintDeclaredType(
          returnType
        )}`
      );
    }
    return { result, returned: true };
  };

  readonly evaluateExpression = (expression: BrewinExpression): Value => {
    switch (expression.__type__) {
      case 'IntLiteralExpression':
        return intValue(expression.value);
      case 'StringLiteralExpression':
        return stringValue(expression.value);
      case 'BoolLiteralExpression':
        return boolValue(expression.value);
      case 'NilLiteralExpression':
        return nilValue();
      case 'NewObjectExpression':
        return objectValue(new Map());
      case 'QualifiedNameExpression':
        return this.evaluateName(expression.name);
      case 'FunctionCallExpression':
        return this.evaluateCall(expression);
      case 'BinaryExpression': {
        const left = this.evaluateExpression(expression.e1);
        const right = this.evaluateExpression(expression.e2);
        return evaluateBinaryOperator(expression.operator, left, right);
      }
      case 'UnaryExpression':
        return evaluateUnaryOperator(
          expression.operator,
          this.evaluateExpression(expression.expression)
        );
      case 'ConversionExpression':
        return evaluateConversion(
          expression.toType,
          this.evaluateExpression(expression.expression)
        );
      case 'LambdaExpression':
        return this.createLambda(expression);
    }
  };

  /** Variable, field or function reference. Variables and fields yield their stored cell. */
  private readonly evaluateName = (name: string): Value => {
    const segments = name.split('.');
    if (segments.length === 1) {
      const overloads = this.functions.overloadsOf(name);
      if (overloads.length > 1) {
        return failWithNameError(`ambiguous reference to overloaded function ${name}`);
      }
      const [onlyOverload] = overloads;
      if (onlyOverload != null) return functionValue(onlyOverload);
      return this.environment.get(name) ?? failWithNameError(`variable not defined: ${name}`);
    }
    const fieldName = segments[segments.length - 1] ?? name;
    const { fields } = this.resolveObject(segments.slice(0, -1));
    return fields.get(fieldName) ?? failWithNameError(`field not found: ${name}`);
  };

  /** Walks `path` from its root variable. Every step must be a non-nil object. */
  private readonly resolveObject = (path: readonly string[]): ResolvedObject => {
    const [root, ...rest] = path;
    if (root == null) return failWithNameError('empty name');
    let name = root;
    let cell = this.environment.get(root) ?? failWithNameError(`variable not defined: ${root}`);
    for (let index = 0; ; index += 1) {
      const content = cell.content;
      if (content.type !== 'object') {
        return failWithTypeError(`${name} is not an object, but ${content.type}`);
      }
      if (content.value === null) return failWithFaultError(`${name} is nil`);
      const next = rest[index];
      if (next == null) return { cell, fields: content.value };
      cell = content.value.get(next) ?? failWithNameError(`field not found: ${name}.${next}`);
      name = `${name}.${next}`;
    }
  };

  private readonly createLambda = ({ name, parameters, statements }: LambdaExpression): Value =>
    functionValue({
      __type__: 'LambdaDescriptor',
      name,
      parameters,
      statements,
      returnType:
        returnTypeFromName(name) ?? failWithTypeError(`invalid return type of lambda ${name}`),
      captured: this.environment.captureSnapshot(),
    });

  private readonly evaluateCall = (call: FunctionCallExpression): Value => {
    const { name, args } = call;
    switch (name) {
      case 'print':
        return this.print(args);
      case 'inputi':
      case 'inputs':
        return this.readInput(name, args);
    }
    if (name.includes('.')) return this.callMethod(call);

    const functionVariable = this.environment.get(name)?.content;
    if (functionVariable?.type === 'function') {
      if (functionVariable.value === null) return failWithFaultError(`cannot call nil ${name}`);
      return this.callFunctionValue(functionVariable.value, args, null);
    }

    const actuals = args.map(this.evaluateExpression);
    const descriptor = this.functions.resolve(name, signatureOfArguments(actuals));
    this.checkReferenceArguments(descriptor, args);
    zip(descriptor.parameters, actuals).forEach(([parameter, actual]) => {
      const parameterType = typeFromName(parameter.name);
      const interfaceName = parameterType == null ? null : interfaceNameOf(parameterType);
      if (
        interfaceName != null &&
        !satisfiesInterface(actual, lookupInterface(this.interfaces, interfaceName))
      ) {
        failWithTypeError(`argument ${parameter.name} does not satisfy interface ${interfaceName}`);
      }
    });
    return this.callFunction(descriptor, actuals);
  };

  private readonly callMethod = ({ name, args }: FunctionCallExpression): Value => {
    const segments = name.split('.');
    const methodName = segments[segments.length - 1] ?? name;
    const receiver = this.resolveObject(segments.slice(0, -1));
    const method =
      receiver.fields.get(methodName)?.content ?? failWithNameError(`method not found: ${name}`);
    if (method.type !== 'function') {
      return failWithTypeError(`${name} is not a function, but ${method.type}`);
    }
    if (method.value === null) return failWithFaultError(`cannot call nil method ${name}`);
    return this.callFunctionValue(method.value, args, receiver.cell);
  };

  /** Calls through a function value, checking arity and argument types against the formals. */
  private readonly callFunctionValue = (
    descriptor: CallableDescriptor,
    args: readonly BrewinExpression[],
    receiver: Value | null
  ): Value => {
    const actuals = args.map(this.evaluateExpression);
    // Rejects void arguments.
    signatureOfArguments(actuals);
    if (actuals.length !== descriptor.parameters.length) {
      failWithTypeError(
        `${descriptor.name} takes ${descriptor.parameters.length} arguments, got ${actuals.length}`
      );
    }
    this.checkReferenceArguments(descriptor, args);
    zip(descriptor.parameters, actuals).forEach(([parameter, actual]) => {
      const parameterType =
        typeFromName(parameter.name) ?? failWithTypeError(`invalid parameter ${parameter.name}`);
      if (runtimeTypeOf(parameterType) !== actual.type) {
        failWithTypeError(
          `argument ${parameter.name} expects ${runtimeTypeOf(parameterType)}, got ${actual.type}`
        );
      }
      const interfaceName = interfaceNameOf(parameterType);
      if (
        interfaceName != null &&
        !satisfiesInterface(actual, lookupInterface(this.interfaces, interfaceName))
      ) {
        failWithTypeError(`argument ${parameter.name} does not satisfy interface ${interfaceName}`);
      }
    });
    return this.callFunction(descriptor, actuals, receiver);
  };

  private readonly checkReferenceArguments = (
    descriptor: CallableDescriptor,
    args: readonly BrewinExpression[]
  ): void => {
    if (this.configuration.referenceArgumentPolicy !== 'variables-only') return;
    zip(descriptor.parameters, args).forEach(([parameter, argument]) => {
      if (parameter.isReference && argument.__type__ !== 'QualifiedNameExpression') {
        failWithTypeError(`reference parameter ${parameter.name} needs a variable argument`);
      }
    });
  };

  private readonly print = (args: readonly BrewinExpression[]): Value => {
    const text = args
      .map((argument) => {
        const value = this.evaluateExpression(argument);
        if (value.type === 'void') return failWithTypeError('cannot print a void value');
        return stringifyValue(value);
      })
      .join('');
    this.host.output(text);
    return voidValue();
  };

  private readonly readInput = (
    name: 'inputi' | 'inputs',
    args: readonly BrewinExpression[]
  ): Value => {
    if (args.length > 1) return failWithNameError(`${name} takes at most one argument`);
    if (args.length === 1) this.print(args);
    const line = this.host.readInput();
    return name === 'inputi' ? evaluateConversion('int', stringValue(line)) : stringValue(line);
  };
}
