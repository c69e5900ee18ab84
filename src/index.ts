/**
 * interview-engine
 *
 * A stateless engine for declarative, multi-step interviews: definitions
 * compiled from TOML or YAML, a guarded step interpreter, a resolver driven
 * by the answer history alone, and signed state tokens.
 *
 * @example
 * ```typescript
 * import { DefinitionCatalog, InterviewService, SessionCodec } from 'interview-engine';
 *
 * const catalog = new DefinitionCatalog({ paths: ['interviews'] });
 * await catalog.reload();
 * const service = new InterviewService({
 *   catalog,
 *   codec: new SessionCodec({ secret: process.env.SESSION_SECRET ?? '' }),
 * });
 * const first = service.start('new-registration');
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Expression language
export {
  ContextValueError,
  EvaluationError,
  ExpressionSyntaxError,
  FilterRegistry,
  compileTemplate,
  defaultFilterRegistry,
  evaluateExpression,
  evaluateGuard,
  parseExpression,
  renderTemplate,
  type CompiledExpression,
  type CompiledTemplate,
  type Context,
  type FilterDefinition,
  type Value,
  type ValueObject,
} from './expression/index.js';

// Field types
export {
  FieldTypeRegistry,
  FieldTypeRegistryBuilder,
  REQUIRED_MESSAGE,
  createDefaultFieldTypeRegistry,
  type FieldDescriptor,
  type FieldError,
  type FieldResult,
  type FieldType,
} from './fields/index.js';

// Steps
export {
  StepOperationRegistry,
  applySteps,
  type InterviewExit,
  type Step,
  type StepOperation,
  type UnmetRequirement,
} from './steps/index.js';

// Definitions
export {
  DefinitionCatalog,
  DefinitionError,
  compileDefinitions,
  lintDefinition,
  loadDefinitionFiles,
  parseDefinitionDocument,
  type CompileOptions,
  type LintIssue,
  type LoadedDefinitions,
} from './definition/index.js';

// Resolver
export {
  SubmissionError,
  UnmetRequirementError,
  resolveInterview,
  type Answer,
  type AnswerHistory,
  type InterviewDefinition,
  type QuestionDescriptor,
  type ResolveResult,
} from './interview/index.js';

// Session tokens
export {
  IntegrityError,
  SessionCodec,
  type IntegrityFailure,
  type SessionPayload,
} from './session/index.js';

// Service
export {
  InterviewNotFoundError,
  InterviewService,
  bootstrapService,
  type EngineResponse,
  type InterviewSummary,
  type SubmissionInput,
} from './service/index.js';

// Configuration
export { loadConfig, type Config } from './config/index.js';

// Logging
export { Logger, createSilentLogger, type LogEntry, type LogLevel } from './utils/logger.js';
