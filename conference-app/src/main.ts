import pg from 'pg';
import { pino } from 'pino';
import { buildServer } from './api/server.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { applySchema } from './db/schema.js';
import { createConferenceRepository } from './repositories/conference-repository.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const pool = new pg.Pool({ connectionString: config.databaseUrl, max: config.poolMax });
await applySchema(pool);

const repository = createConferenceRepository(pool, pino({ level: config.logLevel, name: 'repository' }));
const app = buildServer(repository, { logger: { level: config.logLevel } });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await pool.end();
  process.exit(1);
}

process.on('SIGTERM', () => {
  app
    .close()
    .then(() => pool.end())
    .catch((err: unknown) => {
      app.log.error(err);
      process.exitCode = 1;
    });
});
