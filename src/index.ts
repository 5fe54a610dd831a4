/**
 * Designate webhook - Entry Point
 *
 * external-dns webhook provider managing records in OpenStack Designate
 */
import { createApplication, logger } from './core/index.js';

async function main(): Promise<void> {
  const app = createApplication();

  try {
    await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start Designate webhook');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
