import parseBrewinInterpreterConfiguration from './configuration-parser';

export type { BrewinInterpreterConfiguration, ReferenceArgumentPolicy } from './configuration-type';
export { DEFAULT_INTERPRETER_CONFIGURATION } from './configuration-type';
export { parseBrewinInterpreterConfiguration };
