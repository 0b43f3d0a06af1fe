export { validateConfig, formatIssues } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateHttpUrl,
  validateIntegerRange,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';
export type { FieldError, FieldWarning, ValidationResult } from './types';
