export { loadSchemasFromYAML, loadSchemasFromFile, YamlLoadError } from './loader.js';
export { validateSchema, YamlValidationError } from './schema.js';
