/**
 * Signed, versioned state tokens.
 *
 * A token carries everything needed to resume an interview: the interview
 * id, the caller's initial context and the answer history. The server keeps
 * no session; integrity comes from an HMAC over the encoded payload.
 *
 * Format: `v1.<base64url(JSON payload)>.<base64url(HMAC-SHA256("v1." + payload))>`
 *
 * @packageDocumentation
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import {
  ContextValueError,
  isValueObject,
  toContext,
  toValue,
  type Context,
} from '../expression/index.js';
import type { Answer, AnswerHistory } from '../interview/index.js';
import { IntegrityError } from './errors.js';

/** Current token version tag. */
export const TOKEN_VERSION = 'v1';

/**
 * What a token restores.
 */
export interface SessionState {
  readonly interview: string;
  readonly context: Context;
  readonly history: AnswerHistory;
}

/**
 * The signed payload: the state plus an optional expiry in epoch seconds.
 */
export interface SessionPayload extends SessionState {
  readonly exp?: number;
}

/**
 * Options for {@link SessionCodec}.
 */
export interface SessionCodecOptions {
  /** Secret new tokens are signed with. */
  readonly secret: string;
  /** Older secrets still accepted on decode, for key rotation. */
  readonly previousSecrets?: readonly string[];
  /**
   * Token lifetime. Zero or absent disables expiry.
   * @defaultValue 0
   */
  readonly ttlSeconds?: number;
  /** Clock, injectable for tests. */
  readonly now?: () => Date;
}

function sign(secret: string, text: string): Buffer {
  return createHmac('sha256', secret).update(text).digest();
}

function readPayload(json: unknown): SessionPayload {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new IntegrityError('bad_payload', 'Token payload is not an object');
  }
  const interview: unknown = Reflect.get(json, 'interview');
  const history: unknown = Reflect.get(json, 'history');
  const exp: unknown = Reflect.get(json, 'exp');
  if (typeof interview !== 'string' || interview.length === 0) {
    throw new IntegrityError('bad_payload', 'Token payload has no interview id');
  }
  if (!Array.isArray(history)) {
    throw new IntegrityError('bad_payload', 'Token payload has no history');
  }
  if (exp !== undefined && (typeof exp !== 'number' || !Number.isInteger(exp))) {
    throw new IntegrityError('bad_payload', 'Token expiry is not an integer');
  }

  try {
    const context = toContext(Reflect.get(json, 'context'));
    const answers = history.map((entry: unknown, index): Answer => {
      const location = `history[${String(index)}]`;
      const value = toValue(entry, location);
      if (!isValueObject(value)) {
        throw new ContextValueError('Answer must be an object', location);
      }
      const { question, values } = value;
      if (typeof question !== 'string' || !isValueObject(values)) {
        throw new ContextValueError('Answer needs a question and values', location);
      }
      return { question, values };
    });
    return {
      interview,
      context,
      history: answers,
      ...(typeof exp === 'number' ? { exp } : {}),
    };
  } catch (error) {
    if (error instanceof ContextValueError) {
      throw new IntegrityError('bad_payload', `Token payload is invalid: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Encodes and verifies state tokens.
 *
 * @example
 * ```typescript
 * const codec = new SessionCodec({ secret: 'test-secret-0123456789' });
 * const token = codec.encode({ interview: 'new-registration', context: {}, history: [] });
 * codec.decode(token).interview; // 'new-registration'
 * ```
 */
export class SessionCodec {
  private readonly secret: string;
  private readonly previousSecrets: readonly string[];
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  /**
   * Creates a new SessionCodec.
   *
   * @throws Error if the secret is empty or the TTL is negative.
   */
  constructor(options: SessionCodecOptions) {
    if (options.secret.length === 0) {
      throw new Error('Session secret cannot be empty');
    }
    const ttlSeconds = options.ttlSeconds ?? 0;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 0) {
      throw new Error(`Token TTL must be a non-negative integer, got ${String(ttlSeconds)}`);
    }
    this.secret = options.secret;
    this.previousSecrets = options.previousSecrets ?? [];
    this.ttlSeconds = ttlSeconds;
    this.now = options.now ?? ((): Date => new Date());
  }

  private epochSeconds(): number {
    return Math.floor(this.now().getTime() / 1000);
  }

  /**
   * Signs a state with the current secret.
   *
   * @returns The token string.
   */
  encode(state: SessionState): string {
    const payload: SessionPayload = {
      interview: state.interview,
      context: state.context,
      history: state.history,
      ...(this.ttlSeconds > 0 ? { exp: this.epochSeconds() + this.ttlSeconds } : {}),
    };
    const body = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
    const signed = `${TOKEN_VERSION}.${body}`;
    return `${signed}.${sign(this.secret, signed).toString('base64url')}`;
  }

  /**
   * Verifies a token and restores its payload.
   *
   * The signature is checked, in constant time, against the current secret
   * and then each previous one before the payload is parsed.
   *
   * @throws IntegrityError on a malformed, unsigned, tampered or expired token.
   */
  decode(token: string): SessionPayload {
    const parts = token.split('.');
    const [version, body, signature] = parts;
    if (
      parts.length !== 3 ||
      version === undefined ||
      body === undefined ||
      signature === undefined
    ) {
      throw new IntegrityError('malformed', 'Token must have three segments');
    }
    if (version !== TOKEN_VERSION) {
      throw new IntegrityError('unsupported_version', `Unsupported token version '${version}'`);
    }

    const presented = Buffer.from(signature, 'base64url');
    // Buffer.from silently drops characters outside the alphabet.
    if (presented.toString('base64url') !== signature) {
      throw new IntegrityError('bad_signature', 'Token signature does not verify');
    }
    const signed = `${version}.${body}`;
    const verified = [this.secret, ...this.previousSecrets].some((secret) => {
      const expected = sign(secret, signed);
      return expected.length === presented.length && timingSafeEqual(expected, presented);
    });
    if (!verified) {
      throw new IntegrityError('bad_signature', 'Token signature does not verify');
    }

    const text = Buffer.from(body, 'base64url').toString('utf8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new IntegrityError(
        'bad_payload',
        `Token payload is not JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const payload = readPayload(json);
    if (payload.exp !== undefined && payload.exp <= this.epochSeconds()) {
      throw new IntegrityError('expired', 'Token has expired');
    }
    return payload;
  }
}
