import { ErrorCodes, type BlueprintField, type BlueprintSchemaMap, type JsonValue, type RawInputs } from '@dockyard/shared';
import { ValidationError, type ValidationIssue } from '../lib/errors.js';
import { isTreeMap } from '../lib/tree.js';

export interface InputValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

function isMissing(value: JsonValue | undefined): boolean {
  return value === undefined || value === null || value === '';
}

function hasDefault(field: BlueprintField): boolean {
  return field.default !== undefined && field.default !== null;
}

function validateField(
  path: string,
  field: BlueprintField,
  value: JsonValue,
  errors: ValidationIssue[]
): void {
  const label = field.label ?? path;

  switch (field.type) {
    case 'string': {
      if (typeof value !== 'string') {
        errors.push({ path, message: `"${label}" must be a string` });
        break;
      }
      if (field.pattern && !new RegExp(field.pattern).test(value)) {
        errors.push({ path, message: `"${label}" does not match pattern ${field.pattern}` });
      }
      if (
        field.options &&
        field.options.length > 0 &&
        (field.ui_component === 'dropdown' || field.ui_component === 'radio_group') &&
        !field.options.some(option => option.value === value)
      ) {
        const allowed = field.options.map(option => option.value).join(', ');
        errors.push({ path, message: `"${label}" must be one of: ${allowed}` });
      }
      break;
    }

    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        errors.push({ path, message: `"${label}" must be an integer` });
        break;
      }
      if (field.min_value !== undefined && value < field.min_value) {
        errors.push({ path, message: `"${label}" must be at least ${field.min_value}` });
      }
      if (field.max_value !== undefined && value > field.max_value) {
        errors.push({ path, message: `"${label}" must be at most ${field.max_value}` });
      }
      break;

    case 'boolean':
      if (typeof value !== 'boolean') {
        errors.push({ path, message: `"${label}" must be a boolean` });
      }
      break;

    case 'object':
      if (!isTreeMap(value)) {
        errors.push({ path, message: `"${label}" must be an object` });
        break;
      }
      if (field.fields) {
        collectIssues(value, field.fields, `${path}.`, errors);
      }
      break;

    case 'array':
      if (!Array.isArray(value)) {
        errors.push({ path, message: `"${label}" must be a list` });
        break;
      }
      if (field.item_schema) {
        const itemSchema = field.item_schema;
        value.forEach((item, index) => {
          if (!isMissing(item)) {
            validateField(`${path}.${index}`, itemSchema, item, errors);
          }
        });
      }
      break;
  }
}

function collectIssues(
  inputs: RawInputs,
  schema: BlueprintSchemaMap,
  prefix: string,
  errors: ValidationIssue[]
): void {
  for (const [name, field] of Object.entries(schema)) {
    const path = `${prefix}${name}`;
    const value = inputs[name];

    if (isMissing(value)) {
      // use_global and default-backed fields are filled in during generation
      if (field.required && !field.use_global && !hasDefault(field)) {
        errors.push({ path, message: `Required field "${field.label ?? name}" is missing` });
      }
      continue;
    }

    validateField(path, field, value, errors);
  }
}

/**
 * Validates raw inputs against a blueprint's field schema before generation.
 */
export function validateInputs(inputs: RawInputs, schema: BlueprintSchemaMap): InputValidationResult {
  const errors: ValidationIssue[] = [];
  collectIssues(inputs, schema, '', errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function assertValidInputs(inputs: RawInputs, schema: BlueprintSchemaMap): void {
  const result = validateInputs(inputs, schema);
  if (!result.valid) {
    throw new ValidationError('Invalid configuration', result.errors, ErrorCodes.INPUT_VALIDATION_ERROR);
  }
}
