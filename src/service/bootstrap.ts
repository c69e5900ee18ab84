/**
 * Builds a ready-to-serve {@link InterviewService} from configuration.
 *
 * @packageDocumentation
 */

import { assertConfigValid, loadConfig, type Config, type EnvRecord } from '../config/index.js';
import { DefinitionCatalog } from '../definition/index.js';
import { SessionCodec } from '../session/index.js';
import { Logger } from '../utils/logger.js';
import { safeExistsSync } from '../utils/safe-fs.js';
import { InterviewService } from './service.js';

/**
 * Options for {@link bootstrapService}.
 */
export interface BootstrapOptions {
  /** Configuration file; defaults to `interview-engine.toml` when present. */
  readonly configFile?: string;
  /** Definition paths replacing `definitions.paths`. */
  readonly definitions?: readonly string[];
  readonly env?: EnvRecord;
  /**
   * Secret used when none is configured. Only for front ends whose state
   * tokens never leave the process.
   */
  readonly fallbackSecret?: string;
  /** Root logger; one is created from `logging.debug` when absent. */
  readonly logger?: Logger;
}

/**
 * Everything a front end needs to serve interviews.
 */
export interface Bootstrapped {
  readonly config: Config;
  readonly catalog: DefinitionCatalog;
  readonly service: InterviewService;
  readonly logger: Logger;
}

/**
 * Loads and validates configuration, loads definitions and wires the service.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError on bad configuration.
 * @throws DefinitionError if any definition fails to load.
 */
export async function bootstrapService(options: BootstrapOptions = {}): Promise<Bootstrapped> {
  const loaded = loadConfig({
    ...(options.configFile !== undefined ? { file: options.configFile } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
  });
  let config: Config =
    options.definitions === undefined
      ? loaded.config
      : { ...loaded.config, definitions: { ...loaded.config.definitions, paths: [...options.definitions] } };
  if (config.session.secret === '' && options.fallbackSecret !== undefined) {
    config = { ...config, session: { ...config.session, secret: options.fallbackSecret } };
  }

  assertConfigValid(config, {
    pathChecker: (path) => ({ exists: safeExistsSync(path) }),
  });

  const logger =
    options.logger ?? new Logger({ component: 'interview-engine', debugMode: config.logging.debug });
  logger.debug('config_loaded', { source: loaded.source ?? null });

  const catalog = new DefinitionCatalog({
    paths: config.definitions.paths,
    strictPaths: config.definitions.strict_paths,
    logger: logger.child('catalog'),
  });
  await catalog.reload();

  const codec = new SessionCodec({
    secret: config.session.secret,
    previousSecrets: config.session.previous_secrets,
    ttlSeconds: config.session.token_ttl_seconds,
  });
  const service = new InterviewService({
    catalog,
    codec,
    logger: logger.child('InterviewService'),
  });

  return { config, catalog, service, logger };
}
