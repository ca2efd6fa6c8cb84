import pg from 'pg';
import { pino } from 'pino';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { applySchema } from './db/schema.js';
import { runHarness } from './harness.js';
import { createConferenceRepository } from './repositories/conference-repository.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const logger = pino({ level: config.logLevel });
const pool = new pg.Pool({ connectionString: config.databaseUrl, max: config.poolMax });

try {
  await applySchema(pool);
  const summary = await runHarness(createConferenceRepository(pool, logger.child({ component: 'repository' })), logger);
  logger.info({ summary }, 'harness complete');
} catch (err) {
  logger.error(err, 'harness failed');
  process.exitCode = 1;
} finally {
  await pool.end();
}
