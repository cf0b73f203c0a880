import {
  BrewinInterpreterConfiguration,
  DEFAULT_INTERPRETER_CONFIGURATION,
  ReferenceArgumentPolicy,
} from './configuration-type';

const isReferenceArgumentPolicy = (value: unknown): value is ReferenceArgumentPolicy =>
  value === 'any-expression' || value === 'variables-only';

export default function parseBrewinInterpreterConfiguration(
  configurationString: string
): BrewinInterpreterConfiguration | null {
  try {
    const json: unknown = JSON.parse(configurationString);
    if (typeof json !== 'object' || json === null || Array.isArray(json)) return null;
    const referenceArgumentPolicy =
      'referenceArgumentPolicy' in json
        ? json.referenceArgumentPolicy
        : DEFAULT_INTERPRETER_CONFIGURATION.referenceArgumentPolicy;
    if (!isReferenceArgumentPolicy(referenceArgumentPolicy)) return null;
    return { referenceArgumentPolicy };
  } catch {
    return null;
  }
}
