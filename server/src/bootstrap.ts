import { createLogger, parseLogLevel, type Logger } from '@stalked/shared';
import { getArg, loadConfig, type ServerConfig } from './config';
import { StalkedServer } from './game/StalkedServer';
import { verifyPartnershipToken } from './partnership';

type Env = Readonly<Record<string, string | undefined>>;

export interface Bootstrapped {
  config: ServerConfig;
  log: Logger;
  server: StalkedServer;
}

/**
 * Resolves the configuration and builds the server without starting it.
 * Throws ConfigError or PartnershipError.
 */
export function bootstrap(argv: readonly string[], env: Env): Bootstrapped {
  // Config loading logs before the file's LogLevel is known.
  const bootLog = createLogger('server', parseLogLevel(getArg(argv, '--log') ?? env.LOG_LEVEL));
  const config = loadConfig(argv, env, bootLog);
  const log = createLogger('server', config.logLevel);

  if (config.maxPlayers === 0) {
    verifyPartnershipToken(config.tokenPath, env.STALKED_PARTNER_DIGEST);
    log.info('Partnership authenticated successfully!');
  }

  return { config, log, server: new StalkedServer({ ...config, log }) };
}
