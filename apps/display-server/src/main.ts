import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { resolveLanAddress } from './net/lanAddress.js';
import { listenOnPortRange } from './net/portBinding.js';

const config = loadConfig(process.env);
const app = await buildApp({ config, logger: { level: config.logLevel } });

try {
  const port = await listenOnPortRange((p) => app.listen({ port: p, host: config.host }), config.portRange, (p) =>
    app.log.warn({ port: p }, 'port in use, trying next'),
  );
  app.log.info({ port, lanAddress: resolveLanAddress(), mode: config.initialMode }, 'display server listening');
} catch (e) {
  app.log.fatal({ err: e }, `startup failed: ${errorMessage(e)}`);
  await app.close();
  process.exit(1);
}

const shutdown = (signal: string) => {
  app.log.info({ signal }, 'shutting down');
  app.close().then(
    () => process.exit(0),
    (e: unknown) => {
      app.log.error({ err: e }, 'shutdown failed');
      process.exit(1);
    },
  );
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
