/**
 * Definition documents: parsing, schema validation, compilation, reference
 * linting and the catalog of loaded interviews.
 *
 * @packageDocumentation
 */

export { DefinitionError } from './errors.js';
export {
  compileExpressionSetting,
  compileGuardSetting,
  compileTemplateSetting,
} from './expressions.js';
export type { DocumentFormat } from './document.js';
export {
  formatForPath,
  isRecord,
  parseDefinitionDocument,
  validateDocument,
} from './document.js';
export type { LintIssue, LintOptions, LintSeverity } from './lint.js';
export { declaredPaths, lintDefinition } from './lint.js';
export type { CompileOptions, CompiledDocument } from './compiler.js';
export { compileDefinitions } from './compiler.js';
export type { LoadDefinitionOptions, LoadedDefinitions } from './loader.js';
export { loadDefinitionFiles } from './loader.js';
export type { CatalogSnapshot, DefinitionCatalogOptions } from './catalog.js';
export { DefinitionCatalog } from './catalog.js';
