/**
 * Schema validation using TypeBox.
 */

import type { Static, TSchema } from 'typebox';
import { Compile } from 'typebox/compile';

/**
 * Compiled validator for a message schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Describe why a value is invalid ('' when it is valid) */
  explain: (value: unknown) => string;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator.
 */
export function compileSchema<S extends TSchema>(schema: S): CompiledValidator<Static<S>> {
  const compiled = Compile(schema);

  return {
    check: (value: unknown): value is Static<S> => compiled.Check(value),
    explain: (value: unknown): string => {
      if (compiled.Check(value)) return '';
      return formatErrors([...compiled.Errors(value)]);
    },
  };
}
