/**
 * Component data validation
 * Checks a component's merged data against its editable field declarations.
 * Field types other than checkbox, select and email are descriptive only.
 */

import type { ComponentDefinition, EditableField, ValidationError, ValidationResult } from './schema.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** Form posts send checkboxes as "true"/"false" */
const CHECKBOX_STRINGS = ['true', 'false'];

/**
 * True when a value counts as "not provided" for a required field
 */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Allowed values of a select field
 */
export function optionValues(field: EditableField): string[] {
  return (field.options ?? []).map((option) =>
    typeof option === 'string' ? option : option.value
  );
}

function validateField(field: EditableField, value: unknown, errors: ValidationError[]): void {
  const path = `data.${field.name}`;

  if (isBlank(value)) {
    if (field.required) {
      errors.push({ path, message: `${field.label} is required` });
    }
    return;
  }

  switch (field.type) {
    case 'checkbox':
      if (typeof value !== 'boolean' && !(typeof value === 'string' && CHECKBOX_STRINGS.includes(value))) {
        errors.push({ path, message: `${field.label} must be true or false`, value });
      }
      break;
    case 'select': {
      const allowed = optionValues(field);
      if (allowed.length > 0 && !allowed.includes(String(value))) {
        errors.push({
          path,
          message: `${field.label} must be one of: ${allowed.join(', ')}`,
          value,
        });
      }
      break;
    }
    case 'email':
      if (typeof value !== 'string' || !EMAIL_PATTERN.test(value.trim())) {
        errors.push({ path, message: `${field.label} must be an email address`, value });
      }
      break;
  }
}

/**
 * Validate component data (defaults already merged) against its definition
 */
export function validateComponentData(
  definition: ComponentDefinition,
  data: Record<string, unknown>
): ValidationResult {
  const errors: ValidationError[] = [];

  for (const field of definition.editable_fields) {
    validateField(field, data[field.name], errors);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
