import { CheckinStore } from './checkin-store.ts';
import { loadRuntimeConfig } from './config.ts';
import { ConsentStore } from './consent-store.ts';
import { createHandler } from './handler.ts';
import { createLogger } from './logger.ts';
import { Metrics } from './metrics.ts';
import { RateLimiter } from './rate-limit.ts';
import { startServer } from './server.ts';

const config = loadRuntimeConfig();
const logger = createLogger('checkin-service', { level: config.logLevel });

const rateLimiter = new RateLimiter(config);
const checkins = new CheckinStore();
const consents = new ConsentStore();
const metrics = new Metrics({ checkins, consents, rateLimiter }, config.appVersion);

const handler = createHandler({ config, rateLimiter, checkins, consents, metrics, logger });
const server = await startServer(handler, {
  port: config.port,
  host: config.host,
  maxBodyBytes: config.maxBodyBytes,
  docsBaseUrl: config.docsBaseUrl,
  logger,
});
logger.info('listening', { port: config.port, host: config.host, app_version: config.appVersion });

const sweepTimer = config.rateLimitSweepIntervalSeconds > 0
  ? setInterval(() => {
    rateLimiter.sweep()
      .then((evicted) => {
        if (evicted > 0) logger.info('rate_limit_sweep', { evicted, remaining: rateLimiter.size });
      })
      .catch((error: unknown) => {
        logger.error('rate_limit_sweep_failed', { error });
        process.exitCode = 1;
        shutdown();
      });
  }, config.rateLimitSweepIntervalSeconds * 1000)
  : undefined;

function shutdown(): void {
  if (sweepTimer) clearInterval(sweepTimer);
  server.close((error) => {
    if (error) {
      logger.error('shutdown_failed', { error });
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
