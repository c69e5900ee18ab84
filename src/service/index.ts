/**
 * Interview service facade.
 *
 * @packageDocumentation
 */

export { InterviewNotFoundError } from './errors.js';
export type { InterviewServiceOptions } from './service.js';
export { InterviewService } from './service.js';
export type { EngineResponse, InterviewSummary, StartOptions, SubmissionInput } from './types.js';
export type { BootstrapOptions, Bootstrapped } from './bootstrap.js';
export { bootstrapService } from './bootstrap.js';
