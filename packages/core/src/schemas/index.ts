export { SchemaValidationCache } from './schema_cache';
