import { Ajv } from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { InvalidOperationError } from "../errors/index.js";

export type { SchemaObject } from "ajv";

/**
 * Shared AJV instances and compiled-validator cache. Adapters validate
 * every inbound payload here before calling into the engine.
 */
export class SchemaValidationCache {
  private static readonly validators = new WeakMap<SchemaObject, ValidateFunction>();
  private static readonly coercingValidators = new WeakMap<SchemaObject, ValidateFunction>();
  private static ajv: Ajv | null = null;
  private static coercingAjv: Ajv | null = null;

  /**
   * Gets or compiles the validator for a schema object.
   * @param coerceTypes Coerce strings to the declared types (environment input)
   */
  static getValidator(schema: SchemaObject, coerceTypes = false): ValidateFunction {
    const cache = coerceTypes ? this.coercingValidators : this.validators;
    const cached = cache.get(schema);
    if (cached) return cached;

    const validator = this.getAjv(coerceTypes).compile(schema);
    cache.set(schema, validator);
    return validator;
  }

  private static getAjv(coerceTypes: boolean): Ajv {
    if (coerceTypes) {
      this.coercingAjv ??= new Ajv({ allErrors: true, allowUnionTypes: true, coerceTypes: true, useDefaults: true });
      return this.coercingAjv;
    }
    this.ajv ??= new Ajv({ allErrors: true, allowUnionTypes: true, useDefaults: true });
    return this.ajv;
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "invalid input";
  return errors
    .map((error) => {
      const location = error.instancePath || "(root)";
      const extra: unknown = error.params["additionalProperty"];
      if (error.keyword === "additionalProperties" && typeof extra === "string") {
        return `${location} must not have property "${extra}"`;
      }
      return `${location} ${error.message ?? "is invalid"}`;
    })
    .join("; ");
}

function isValid<T>(validate: ValidateFunction, input: unknown): input is T {
  return validate(input);
}

/**
 * Validates `input` against `schema` and returns it typed as `T`, or throws
 * InvalidOperationError naming every violation.
 */
export function validateInput<T>(
  schema: SchemaObject,
  input: unknown,
  label = "input",
  options: { coerceTypes?: boolean } = {},
): T {
  const validate = SchemaValidationCache.getValidator(schema, options.coerceTypes ?? false);
  if (!isValid<T>(validate, input)) {
    throw new InvalidOperationError(`Invalid ${label}: ${formatSchemaErrors(validate.errors)}`);
  }
  return input;
}
