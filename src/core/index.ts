export * from './errors.js';
export { buildObjectSchema, appendFields, schemaFingerprint, findField, qualifiedName, isFieldType } from './object-schema.js';
export { coerceValue, TypeCoercionEngine, type CoercionContext } from './type-coercion.js';
export {
  SchemaRegistry,
  type SchemaRegistryConfig,
  type SchemaChangeEvent,
  type SchemaChangeListener,
  type RegistrySummary,
} from './schema-registry.js';
export {
  CompiledTypeCache,
  type CompiledFactType,
  type CompiledTypeCacheConfig,
  type CompiledTypeCacheStats,
} from './compiled-type-cache.js';
export { ClassMaterializer, type ClassMaterializerOptions, type FieldValues } from './class-materializer.js';
export { ProxyMaterializer, FieldMapFact } from './proxy-materializer.js';
export {
  FactMaterializer,
  resolveMaterializerConfig,
  type FactMaterializerConfig,
  type ResolvedMaterializerConfig,
  type MaterializationStrategy,
  type MaterializationOutcome,
  type MaterializerStats,
} from './fact-materializer.js';
