import { checkNotNull } from '../utils';

import type { Value } from './value';

/** One function call. Block 0 is the function scope; later ones come from `if`/`while` bodies. */
class CallFrame {
  private readonly blocks: Map<string, Value>[] = [new Map()];

  get functionScope(): Map<string, Value> {
    return checkNotNull(this.blocks[0]);
  }

  get innermostBlock(): Map<string, Value> {
    return checkNotNull(this.blocks[this.blocks.length - 1]);
  }

  enterBlock(): void {
    this.blocks.push(new Map());
  }

  exitBlock(): void {
    if (this.blocks.length === 1) throw new Error('Cannot exit the function scope of a frame.');
    this.blocks.pop();
  }

  lookup(name: string): Value | undefined {
    for (let level = this.blocks.length - 1; level >= 0; level -= 1) {
      const value = checkNotNull(this.blocks[level]).get(name);
      if (value != null) return value;
    }
    return undefined;
  }

  /** Every visible name. Names in inner blocks hide the same names in outer ones. */
  visibleEntries(): ReadonlyMap<string, Value> {
    const entries = new Map<string, Value>();
    this.blocks.forEach((block) => block.forEach((value, name) => entries.set(name, value)));
    return entries;
  }
}

/**
 * Variable storage of a running program: a stack of call frames, each a stack of block scopes.
 * Only the current frame is ever visible.
 */
export default class Environment {
  private readonly frames: CallFrame[] = [];

  private get currentFrame(): CallFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private get activeFrame(): CallFrame {
    const frame = this.currentFrame;
    if (frame == null) throw new Error('No active call frame.');
    return frame;
  }

  enterFrame(): void {
    this.frames.push(new CallFrame());
  }

  exitFrame(): void {
    if (this.frames.pop() == null) throw new Error('No call frame to exit.');
  }

  enterBlock(): void {
    this.activeFrame.enterBlock();
  }

  exitBlock(): void {
    this.activeFrame.exitBlock();
  }

  /** Runs `block` inside a fresh block scope, which is removed on every exit path. */
  withNestedBlock<T>(block: () => T): T {
    this.enterBlock();
    try {
      return block();
    } finally {
      this.exitBlock();
    }
  }

  /** Returns false when `name` is already defined at function scope. */
  defineAtFunctionScope(name: string, value: Value): boolean {
    const scope = this.activeFrame.functionScope;
    if (scope.has(name)) return false;
    scope.set(name, value);
    return true;
  }

  /** Returns false when `name` is already defined in the innermost block. */
  defineAtBlockScope(name: string, value: Value): boolean {
    const block = this.activeFrame.innermostBlock;
    if (block.has(name)) return false;
    block.set(name, value);
    return true;
  }

  exists(name: string): boolean {
    return this.get(name) != null;
  }

  get(name: string): Value | undefined {
    return this.currentFrame?.lookup(name);
  }

  /** Overwrites the content of the existing cell, so aliases of the cell observe the write. */
  setInPlace(name: string, value: Value): boolean {
    const cell = this.get(name);
    if (cell == null) return false;
    cell.set(value);
    return true;
  }

  captureSnapshot(): Map<string, Value> {
    const snapshot = new Map<string, Value>();
    this.currentFrame?.visibleEntries().forEach((value, name) => snapshot.set(name, value.copy()));
    return snapshot;
  }
}
