export type { BrewinErrorType } from './error-definitions';
export {
  BrewinError,
  BrewinNameError,
  BrewinTypeError,
  BrewinFaultError,
  failWithNameError,
  failWithTypeError,
  failWithFaultError,
} from './error-definitions';
