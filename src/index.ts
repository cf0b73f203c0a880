import type { BrewinProgram } from './ast/brewin-nodes';
import { BrewinInterpreterConfiguration, DEFAULT_INTERPRETER_CONFIGURATION } from './configuration';
import { BrewinError } from './errors';
import BrewinInterpreter from './interpreter/brewin-interpreter';
import { createCollectingHost, createConsoleOutputHost } from './interpreter/host';

export * from './ast/brewin-nodes';
export * from './configuration';
export * from './errors';
export type { BrewinHost, CollectingBrewinHost } from './interpreter/host';
export { createCollectingHost, createConsoleOutputHost, BrewinInterpreter };

export type BrewinInterpretationResult =
  | { readonly __type__: 'OK'; readonly printed: readonly string[] }
  | {
      readonly __type__: 'ERROR';
      readonly error: BrewinError;
      readonly printed: readonly string[];
    };

export type BrewinRunOptions = {
  /** Lines served to `inputi` and `inputs`, in order. */
  readonly inputs?: readonly string[];
  readonly configuration?: BrewinInterpreterConfiguration;
};

/**
 * Runs `program` to completion with its output collected in memory.
 * Other exceptions than a `BrewinError` are bugs and propagate.
 */
export function interpretBrewinProgram(
  program: BrewinProgram,
  { inputs = [], configuration = DEFAULT_INTERPRETER_CONFIGURATION }: BrewinRunOptions = {}
): BrewinInterpretationResult {
  const host = createCollectingHost(inputs);
  try {
    new BrewinInterpreter(program, host, configuration).run();
    return { __type__: 'OK', printed: host.printed() };
  } catch (error) {
    if (error instanceof BrewinError) return { __type__: 'ERROR', error, printed: host.printed() };
    throw error;
  }
}

/** Runs `program` with output on the console and `inputs` as its input lines. Returns the exit code. */
export function runBrewinProgramInConsole(
  program: BrewinProgram,
  { inputs = [], configuration = DEFAULT_INTERPRETER_CONFIGURATION }: BrewinRunOptions = {}
): number {
  try {
    new BrewinInterpreter(program, createConsoleOutputHost(inputs), configuration).run();
    return 0;
  } catch (error) {
    if (!(error instanceof BrewinError)) throw error;
    console.error(error.toString());
    return 1;
  }
}
