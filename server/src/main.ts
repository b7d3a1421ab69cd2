import fs from 'fs';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { installProcessHandlers, log, setLogLevel } from './logging.js';
import { buildApp } from './server.js';

async function bootstrap() {
  installProcessHandlers();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (config.destinationRoot) {
    try {
      fs.mkdirSync(config.destinationRoot, { recursive: true });
    } catch (e) {
      log('warn', `Could not create destination folder ${config.destinationRoot}: ${describeError(e)}`);
    }
  }

  const app = await buildApp(config);

  // Graceful shutdown on signals
  const shutdown = (signal: string) => {
    log('info', `${signal} received, closing server`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log('error', `close failed: ${describeError(err)}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  log('info', `Server listening on ${config.host}:${config.port}`);
}

bootstrap().catch((err: unknown) => {
  log('error', `startup failed: ${describeError(err)}`);
  process.exit(1);
});
