import { loadConfig } from "./config/config";
import { ensureDatabaseExists, resetTables } from "./services/dbService";
import { logger } from "./utils/logger";

export async function createTables(): Promise<void> {
  const config = loadConfig();
  await ensureDatabaseExists(config.postgres);
  await resetTables(config.postgres);
}

if (require.main === module) {
  createTables().catch((err) => {
    logger.error(`Error creating tables: ${err}`);
    process.exitCode = 1;
  });
}
