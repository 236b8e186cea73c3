/**
 * Service registry module: barrel exports
 */

export type { ServiceRegistry } from './service-registry.js'
export {
  ServiceRegistryImpl,
  createRegistry,
  loadRegistry,
  resolveDefinition,
} from './service-registry-impl.js'
export {
  parseDeclarationFile,
  parseDeclarationString,
  findDeclarationFile,
  resolveDeclarationPath,
  detectFormat,
} from './declaration-parser.js'
export type { DeclarationFormat } from './declaration-parser.js'
export { validateDeclaration, checkReferences } from './declaration-validator.js'
export type { ValidationResult } from './declaration-validator.js'
export {
  DeclarationFileSchema,
  ServiceEntrySchema,
  SUPPORTED_DECLARATION_VERSIONS,
} from './schemas.js'
export type { DeclarationFile, RawServiceEntry } from './schemas.js'
