import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

// One Ajv instance per process; compiled validators are cached by Ajv itself.
const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

/** Compile a JSON Schema into a type guard for T. */
export function compileGuard<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if(!errors) return [];
  return errors.map(e => `${e.instancePath || '/'} ${e.message ?? e.keyword}`.trim());
}
