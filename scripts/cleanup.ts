/**
 * One-off retention sweep: `npm run cleanup -- [days]`.
 * Uses the same storage settings as the bot; days defaults to RETENTION_DAYS.
 */

import { ConfigError, loadConfigFromEnvironment } from '../src/utils/config.js';
import { createDbBackend } from '../src/utils/db.js';
import { runRetentionSweep } from '../src/utils/db-maintenance.js';
import { logger } from '../src/middleware/logger.js';

async function main(): Promise<number> {
  const config = loadConfigFromEnvironment();
  const rawDays = process.argv[2];
  const days = rawDays === undefined ? config.RETENTION_DAYS : Number(rawDays);

  const backend = await createDbBackend(config);
  try {
    const stats = await runRetentionSweep(backend, days);
    console.log(`Pruned ${stats.pruned} spam-tracking rows (${stats.beforeCount} -> ${stats.afterCount})`);
    return 0;
  } finally {
    await backend.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) console.error(`config: ${issue}`);
    } else {
      logger.error({ err }, 'Cleanup failed');
    }
    process.exit(1);
  });
