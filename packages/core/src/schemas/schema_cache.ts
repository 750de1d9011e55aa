import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed JSON)
   * @returns Compiled AJV validator function narrowing to T
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject): ValidateFunction<T> {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached as ValidateFunction<T>;
    }

    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
    }

    const validator = this.ajv.compile<T>(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.schemaValidators.size };
  }
}
