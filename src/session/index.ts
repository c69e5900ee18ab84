/**
 * Session state codec: stateless, signed progress tokens.
 *
 * @packageDocumentation
 */

export type { IntegrityFailure } from './errors.js';
export { IntegrityError } from './errors.js';
export type { SessionCodecOptions, SessionPayload, SessionState } from './codec.js';
export { SessionCodec, TOKEN_VERSION } from './codec.js';
