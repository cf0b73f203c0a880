/** Where a running program sends its output lines and gets its input lines. */
export interface BrewinHost {
  readonly output: (text: string) => void;
  readonly readInput: () => string;
}

export interface CollectingBrewinHost extends BrewinHost {
  /** Every line written so far, in order. */
  readonly printed: () => readonly string[];
}

const inputQueue = (inputs: readonly string[]): (() => string) => {
  let next = 0;
  return () => {
    const line = inputs[next];
    if (line == null) throw new Error(`No input line left after reading ${next} lines.`);
    next += 1;
    return line;
  };
};

/** Records output in memory and serves `inputs` in order. */
export const createCollectingHost = (inputs: readonly string[] = []): CollectingBrewinHost => {
  const printedCollector: string[] = [];
  return {
    output: (text) => {
      printedCollector.push(text);
    },
    readInput: inputQueue(inputs),
    printed: () => printedCollector,
  };
};

/** Writes output through `console.log`. Input lines come from `inputs`, not from the terminal. */
export const createConsoleOutputHost = (inputs: readonly string[] = []): BrewinHost => ({
  output: (text) => console.log(text),
  readInput: inputQueue(inputs),
});
