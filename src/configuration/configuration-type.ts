/**
 * How an actual argument may be bound to a by-reference formal.
 * - `any-expression`: any expression; a temporary is passed when the actual is not a name.
 * - `variables-only`: the actual must be a plain or dotted variable name.
 */
export type ReferenceArgumentPolicy = 'any-expression' | 'variables-only';

export type BrewinInterpreterConfiguration = {
  readonly referenceArgumentPolicy: ReferenceArgumentPolicy;
};

export const DEFAULT_INTERPRETER_CONFIGURATION: BrewinInterpreterConfiguration = {
  referenceArgumentPolicy: 'any-expression',
};
