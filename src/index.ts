import { loadConfig } from "./config/config";
import { EtlPipeline, EtlSummary } from "./pipeline";
import { ensureDatabaseExists } from "./services/dbService";
import { logger } from "./utils/logger";

export async function runEtl(): Promise<EtlSummary> {
  const config = loadConfig();
  await ensureDatabaseExists(config.postgres);
  return new EtlPipeline(config).run();
}

if (require.main === module) {
  runEtl().catch((err) => {
    logger.error(`Error running ETL: ${err}`);
    process.exitCode = 1;
  });
}
