import { loadConfig, loadDotEnv } from '../config/environment';
import { IngestionService } from '../services/ingestion-service';
import { formatRunSummary } from '../services/run-summary';
import { RunStatus } from '../types/common/enums';
import { logger } from '../utils/logger';

/**
 * Entry point for a single ingestion run.
 * @param env Environment to configure from; `.env` is only read when none is given
 * @returns Process exit code, 0 on success
 */
export async function main(env?: NodeJS.ProcessEnv): Promise<number> {
  if (!env) {
    loadDotEnv();
  }

  let service: IngestionService;
  try {
    const config = loadConfig(env ?? process.env);
    logger.setLevel(config.logLevel);
    service = IngestionService.initialize(config);
  } catch (error) {
    logger.error('configuration_failed', { error });
    console.error(`\nFAILED: ${error instanceof Error ? error.message : String(error)}`);
    console.error('Check your .env file for the API keys and DB_PASSWORD.');
    return 1;
  }

  const result = await service.run();
  const summary = formatRunSummary(result);
  if (result.status === RunStatus.SUCCESS) {
    console.log(`\n${summary}`);
    return 0;
  }
  console.error(`\n${summary}`);
  return 1;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Unexpected error in ingestion run:', error);
      process.exitCode = 1;
    });
}
