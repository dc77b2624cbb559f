import { createLogger, parseLogLevel } from '@stalked/shared';
import { bootstrap, type Bootstrapped } from './bootstrap';
import { getArg } from './config';
import { PartnershipError, describeError } from './errors';

const argv = process.argv.slice(2);

let booted: Bootstrapped;
try {
  booted = bootstrap(argv, process.env);
} catch (err) {
  const log = createLogger('server', parseLogLevel(getArg(argv, '--log') ?? process.env.LOG_LEVEL));
  if (err instanceof PartnershipError) {
    log.error(`ERROR: MaxPlayers set to 0 requires a valid partnership TOKEN file. ${err.message}`);
  } else {
    log.error(describeError(err));
  }
  process.exit(1);
}

const { server, log } = booted;

server.start().catch((err: unknown) => {
  log.error(`Failed to start: ${describeError(err)}`);
  process.exit(1);
});

const shutdown = (): void => {
  log.info('Shutting down server...');
  server.stop();
  process.exit(0);
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
