/**
 * Validation result types
 */

export interface FieldError {
  field: string;
  message: string;
  level?: string;
}

export interface FieldWarning {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: FieldError[];
  warnings: FieldWarning[];
}
