export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '&&'
  | '||';

export type UnaryOperator = '-' | '!';

export type ConversionTarget = 'int' | 'str' | 'bool';

interface BrewinBaseNode {
  /** Identity of the object used for pattern matching. */
  readonly __type__: string;
}

/** A formal parameter. A leading `&` in source marks it as passed by reference. */
export interface BrewinParameter {
  readonly name: string;
  readonly isReference: boolean;
}

export interface IntLiteralExpression extends BrewinBaseNode {
  readonly __type__: 'IntLiteralExpression';
  readonly value: bigint;
}

export interface StringLiteralExpression extends BrewinBaseNode {
  readonly __type__: 'StringLiteralExpression';
  readonly value: string;
}

export interface BoolLiteralExpression extends BrewinBaseNode {
  readonly __type__: 'BoolLiteralExpression';
  readonly value: boolean;
}

export interface NilLiteralExpression extends BrewinBaseNode {
  readonly __type__: 'NilLiteralExpression';
}

export interface NewObjectExpression extends BrewinBaseNode {
  readonly __type__: 'NewObjectExpression';
}

/** A plain (`xi`) or dotted (`ao.bo.ci`) name. */
export interface QualifiedNameExpression extends BrewinBaseNode {
  readonly __type__: 'QualifiedNameExpression';
  readonly name: string;
}

export interface FunctionCallExpression extends BrewinBaseNode {
  readonly __type__: 'FunctionCallExpression';
  /** Function name, function-valued variable name, or dotted method path. */
  readonly name: string;
  readonly args: readonly BrewinExpression[];
}

export interface BinaryExpression extends BrewinBaseNode {
  readonly __type__: 'BinaryExpression';
  readonly operator: BinaryOperator;
  readonly e1: BrewinExpression;
  readonly e2: BrewinExpression;
}

export interface UnaryExpression extends BrewinBaseNode {
  readonly __type__: 'UnaryExpression';
  readonly operator: UnaryOperator;
  readonly expression: BrewinExpression;
}

export interface ConversionExpression extends BrewinBaseNode {
  readonly __type__: 'ConversionExpression';
  readonly toType: ConversionTarget;
  readonly expression: BrewinExpression;
}

/** The trailing letter of `name` fixes the lambda's return type, as for named functions. */
export interface LambdaExpression extends BrewinBaseNode {
  readonly __type__: 'LambdaExpression';
  readonly name: string;
  readonly parameters: readonly BrewinParameter[];
  readonly statements: readonly BrewinStatement[];
}

export type BrewinExpression =
  | IntLiteralExpression
  | StringLiteralExpression
  | BoolLiteralExpression
  | NilLiteralExpression
  | NewObjectExpression
  | QualifiedNameExpression
  | FunctionCallExpression
  | BinaryExpression
  | UnaryExpression
  | ConversionExpression
  | LambdaExpression;

/** `var name;` */
export interface VariableDefinitionStatement extends BrewinBaseNode {
  readonly __type__: 'VariableDefinitionStatement';
  readonly name: string;
}

/** `bvar name;` */
export interface BlockVariableDefinitionStatement extends BrewinBaseNode {
  readonly __type__: 'BlockVariableDefinitionStatement';
  readonly name: string;
}

export interface AssignmentStatement extends BrewinBaseNode {
  readonly __type__: 'AssignmentStatement';
  readonly target: string;
  readonly expression: BrewinExpression;
}

export interface FunctionCallStatement extends BrewinBaseNode {
  readonly __type__: 'FunctionCallStatement';
  readonly call: FunctionCallExpression;
}

export interface IfStatement extends BrewinBaseNode {
  readonly __type__: 'IfStatement';
  readonly condition: BrewinExpression;
  readonly statements: readonly BrewinStatement[];
  readonly elseStatements: readonly BrewinStatement[] | null;
}

export interface WhileStatement extends BrewinBaseNode {
  readonly __type__: 'WhileStatement';
  readonly condition: BrewinExpression;
  readonly statements: readonly BrewinStatement[];
}

export interface ReturnStatement extends BrewinBaseNode {
  readonly __type__: 'ReturnStatement';
  readonly expression: BrewinExpression | null;
}

export type BrewinStatement =
  | VariableDefinitionStatement
  | BlockVariableDefinitionStatement
  | AssignmentStatement
  | FunctionCallStatement
  | IfStatement
  | WhileStatement
  | ReturnStatement;

export interface BrewinFunctionDefinition extends BrewinBaseNode {
  readonly __type__: 'FunctionDefinition';
  readonly name: string;
  readonly parameters: readonly BrewinParameter[];
  readonly statements: readonly BrewinStatement[];
}

export interface InterfaceFieldDeclaration extends BrewinBaseNode {
  readonly __type__: 'InterfaceFieldDeclaration';
  readonly name: string;
}

export interface InterfaceMethodDeclaration extends BrewinBaseNode {
  readonly __type__: 'InterfaceMethodDeclaration';
  readonly name: string;
  readonly parameters: readonly BrewinParameter[];
}

export type InterfaceMemberDeclaration = InterfaceFieldDeclaration | InterfaceMethodDeclaration;

export interface BrewinInterfaceDefinition extends BrewinBaseNode {
  readonly __type__: 'InterfaceDefinition';
  readonly name: string;
  readonly members: readonly InterfaceMemberDeclaration[];
}

export interface BrewinProgram {
  readonly interfaces: readonly BrewinInterfaceDefinition[];
  readonly functions: readonly BrewinFunctionDefinition[];
}

export const BrewinExpressionInt = (value: bigint | number): IntLiteralExpression => ({
  __type__: 'IntLiteralExpression',
  value: BigInt(value),
});

export const BrewinExpressionString = (value: string): StringLiteralExpression => ({
  __type__: 'StringLiteralExpression',
  value,
});

export const BrewinExpressionTrue: BoolLiteralExpression = {
  __type__: 'BoolLiteralExpression',
  value: true,
};

export const BrewinExpressionFalse: BoolLiteralExpression = {
  __type__: 'BoolLiteralExpression',
  value: false,
};

export const BrewinExpressionNil: NilLiteralExpression = { __type__: 'NilLiteralExpression' };

export const BrewinExpressionNewObject: NewObjectExpression = { __type__: 'NewObjectExpression' };

export const BrewinExpressionName = (name: string): QualifiedNameExpression => ({
  __type__: 'QualifiedNameExpression',
  name,
});

export const BrewinExpressionCall = (
  name: string,
  args: readonly BrewinExpression[] = []
): FunctionCallExpression => ({ __type__: 'FunctionCallExpression', name, args });

export const BrewinExpressionBinary = (
  operator: BinaryOperator,
  e1: BrewinExpression,
  e2: BrewinExpression
): BinaryExpression => ({ __type__: 'BinaryExpression', operator, e1, e2 });

export const BrewinExpressionUnary = (
  operator: UnaryOperator,
  expression: BrewinExpression
): UnaryExpression => ({ __type__: 'UnaryExpression', operator, expression });

export const BrewinExpressionConvert = (
  toType: ConversionTarget,
  expression: BrewinExpression
): ConversionExpression => ({ __type__: 'ConversionExpression', toType, expression });

export const BrewinExpressionLambda = (
  name: string,
  parameters: readonly BrewinParameter[],
  statements: readonly BrewinStatement[]
): LambdaExpression => ({ __type__: 'LambdaExpression', name, parameters, statements });

export const BrewinStatementVar = (name: string): VariableDefinitionStatement => ({
  __type__: 'VariableDefinitionStatement',
  name,
});

export const BrewinStatementBlockVar = (name: string): BlockVariableDefinitionStatement => ({
  __type__: 'BlockVariableDefinitionStatement',
  name,
});

export const BrewinStatementAssign = (
  target: string,
  expression: BrewinExpression
): AssignmentStatement => ({ __type__: 'AssignmentStatement', target, expression });

export const BrewinStatementCall = (
  name: string,
  args: readonly BrewinExpression[] = []
): FunctionCallStatement => ({
  __type__: 'FunctionCallStatement',
  call: BrewinExpressionCall(name, args),
});

export const BrewinStatementIf = (
  condition: BrewinExpression,
  statements: readonly BrewinStatement[],
  elseStatements: readonly BrewinStatement[] | null = null
): IfStatement => ({ __type__: 'IfStatement', condition, statements, elseStatements });

export const BrewinStatementWhile = (
  condition: BrewinExpression,
  statements: readonly BrewinStatement[]
): WhileStatement => ({ __type__: 'WhileStatement', condition, statements });

export const BrewinStatementReturn = (
  expression: BrewinExpression | null = null
): ReturnStatement => ({ __type__: 'ReturnStatement', expression });

export const BrewinParameterByValue = (name: string): BrewinParameter => ({
  name,
  isReference: false,
});

export const BrewinParameterByReference = (name: string): BrewinParameter => ({
  name,
  isReference: true,
});

export const BrewinFunction = (
  name: string,
  parameters: readonly BrewinParameter[],
  statements: readonly BrewinStatement[]
): BrewinFunctionDefinition => ({ __type__: 'FunctionDefinition', name, parameters, statements });

export const BrewinInterfaceField = (name: string): InterfaceFieldDeclaration => ({
  __type__: 'InterfaceFieldDeclaration',
  name,
});

export const BrewinInterfaceMethod = (
  name: string,
  parameters: readonly BrewinParameter[]
): InterfaceMethodDeclaration => ({ __type__: 'InterfaceMethodDeclaration', name, parameters });

export const BrewinInterface = (
  name: string,
  members: readonly InterfaceMemberDeclaration[]
): BrewinInterfaceDefinition => ({ __type__: 'InterfaceDefinition', name, members });

export const BrewinProgramOf = (
  functions: readonly BrewinFunctionDefinition[],
  interfaces: readonly BrewinInterfaceDefinition[] = []
): BrewinProgram => ({ interfaces, functions });
