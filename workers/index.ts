import { checkRedisHealth } from '../src/lib/queue/connection';
import { createDocumentQaWorker } from './document-qa-worker';

async function main() {
  if (!(await checkRedisHealth())) {
    console.error('[Workers] Redis is not reachable, exiting');
    process.exit(1);
  }

  const documentQaWorker = createDocumentQaWorker();
  console.log('[Workers] Starting extraction QA workers...');
  console.log('[Workers] Document QA worker:', documentQaWorker.name);

  async function shutdown() {
    console.log('[Workers] Shutting down...');
    await Promise.all([documentQaWorker.close()]);
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error: unknown) => {
  console.error('[Workers] Failed to start:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
