/**
 * Invariant validator.
 */

export {
  validate,
  validateOrThrow,
  validatePuzzle,
  checkIdentity,
  checkStatus,
  checkAddress,
  checkKey,
  checkPubkey,
  checkScript,
  checkChronology,
  checkHistory,
  checkPeople,
  checkAssets,
  collector,
  formatValidationIssue,
  ValidationError,
  type ValidationIssue,
  type ValidationReport,
  type ValidationRule,
  type ValidationSeverity,
  type ValidateOptions,
  type Report,
} from "./validators.js";
