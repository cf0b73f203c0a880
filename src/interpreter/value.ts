import type { BrewinParameter, BrewinStatement } from '../ast/brewin-nodes';

/** Runtime tag of a value. */
export type ValueType = 'int' | 'string' | 'bool' | 'object' | 'function' | 'void';

/**
 * Type fixed by the trailing letter of an identifier.
 * Interface types behave as `object` at runtime but constrain what may be bound to them.
 */
export type DeclaredType =
  | { readonly __type__: 'PrimitiveType'; readonly type: ValueType }
  | { readonly __type__: 'InterfaceType'; readonly interfaceName: string };

/** Field map of an object. Shared by identity between every value that refers to the object. */
export type BrewinObject = Map<string, Value>;

export type FunctionDescriptor = {
  readonly __type__: 'FunctionDescriptor';
  readonly name: string;
  readonly parameters: readonly BrewinParameter[];
  readonly statements: readonly BrewinStatement[];
  readonly returnType: DeclaredType;
};

export type LambdaDescriptor = {
  readonly __type__: 'LambdaDescriptor';
  readonly name: string;
  readonly parameters: readonly BrewinParameter[];
  readonly statements: readonly BrewinStatement[];
  readonly returnType: DeclaredType;
  /** Snapshot taken at creation. Writes inside the lambda body land here. */
  readonly captured: ReadonlyMap<string, Value>;
};

export type CallableDescriptor = FunctionDescriptor | LambdaDescriptor;

export type ValueContent =
  | { readonly type: 'int'; readonly value: bigint }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'object'; readonly value: BrewinObject | null }
  | { readonly type: 'function'; readonly value: CallableDescriptor | null }
  | { readonly type: 'void'; readonly value: null };

/**
 * A storage cell. Environments, object fields and lambda snapshots hold these, and a by-reference
 * parameter binds the caller's cell itself, so `set` is observed through every alias of the cell.
 */
export class Value {
  constructor(private _content: ValueContent) {}

  get content(): ValueContent {
    return this._content;
  }

  get type(): ValueType {
    return this._content.type;
  }

  /** Whether the payload is absent: nil objects, nil functions and void. */
  get isNil(): boolean {
    return this._content.value === null;
  }

  set(other: Value | ValueContent): void {
    this._content = other instanceof Value ? other._content : other;
  }

  /** A new cell with the same content. Objects and functions stay shared. */
  copy(): Value {
    return new Value(this._content);
  }
}

export const intValue = (value: bigint | number): Value =>
  new Value({ type: 'int', value: BigInt(value) });

export const stringValue = (value: string): Value => new Value({ type: 'string', value });

export const boolValue = (value: boolean): Value => new Value({ type: 'bool', value });

export const objectValue = (value: BrewinObject | null = new Map()): Value =>
  new Value({ type: 'object', value });

export const functionValue = (value: CallableDescriptor | null): Value =>
  new Value({ type: 'function', value });

export const nilValue = (): Value => objectValue(null);

export const voidValue = (): Value => new Value({ type: 'void', value: null });

const TYPE_LETTERS: Readonly<Record<string, ValueType | undefined>> = {
  i: 'int',
  s: 'string',
  b: 'bool',
  o: 'object',
  v: 'void',
  f: 'function',
};

const isUpperCaseLetter = (character: string): boolean => /^[A-Z]$/.test(character);

/** Declared type of `name` from its trailing letter, or null when the letter names no type. */
export const typeFromName = (name: string): DeclaredType | null => {
  const lastLetter = name.charAt(name.length - 1);
  if (lastLetter === '') return null;
  if (isUpperCaseLetter(lastLetter)) {
    return { __type__: 'InterfaceType', interfaceName: lastLetter };
  }
  const type = TYPE_LETTERS[lastLetter];
  return type == null ? null : { __type__: 'PrimitiveType', type };
};

/** Return type of a function or lambda called `name`. `main` never returns a value. */
export const returnTypeFromName = (name: string): DeclaredType | null =>
  name === 'main' ? { __type__: 'PrimitiveType', type: 'void' } : typeFromName(name);

export const runtimeTypeOf = (type: DeclaredType): ValueType =>
  type.__type__ === 'InterfaceType' ? 'object' : type.type;

export const interfaceNameOf = (type: DeclaredType): string | null =>
  type.__type__ === 'InterfaceType' ? type.interfaceName : null;

export const prettyPrintDeclaredType = (type: DeclaredType): string =>
  type.__type__ === 'InterfaceType' ? `interface ${type.interfaceName}` : type.type;

/** Letter a value contributes to an argument signature. Void has none. */
export const signatureLetterOf = (type: ValueType): string | null => {
  switch (type) {
    case 'int':
      return 'i';
    case 'string':
      return 's';
    case 'bool':
      return 'b';
    case 'object':
      return 'o';
    case 'function':
      return 'f';
    case 'void':
      return null;
  }
};

export const zeroValueOf = (type: DeclaredType): Value => {
  switch (runtimeTypeOf(type)) {
    case 'int':
      return intValue(0);
    case 'string':
      return stringValue('');
    case 'bool':
      return boolValue(false);
    case 'object':
      return nilValue();
    case 'function':
      return functionValue(null);
    case 'void':
      return voidValue();
  }
};

/** Text form used by `print`. */
export const stringifyValue = (value: Value): string => {
  const content = value.content;
  switch (content.type) {
    case 'int':
      return content.value.toString();
    case 'string':
      return content.value;
    case 'bool':
      return content.value ? 'true' : 'false';
    case 'object':
      return content.value === null ? 'nil' : '[object]';
    case 'function':
      return content.value === null ? 'nil' : '[function]';
    case 'void':
      return 'void';
  }
};
