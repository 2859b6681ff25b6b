import { Worker, type Job } from 'bullmq';
import { getConfig, type AppConfig } from '../src/lib/config';
import { redisConnection } from '../src/lib/queue/connection';
import { DOCUMENT_QA_QUEUE } from '../src/lib/queue/queues';
import type { DocumentQaJobData, DocumentQaResult } from '../src/lib/validation/job';

export function createDocumentQaWorker(
  config: AppConfig = getConfig()
): Worker<DocumentQaJobData, DocumentQaResult> {
  const worker = new Worker<DocumentQaJobData, DocumentQaResult>(
    DOCUMENT_QA_QUEUE,
    async (job: Job<DocumentQaJobData, DocumentQaResult>) => {
      console.log(`[DocumentQA] Job ${job.id}: ${job.data.documentPath}`);

      const { createSecondaryExtractor } = await import('../src/lib/ai/page-extractor');
      const { processDocumentQaJob } = await import('../src/lib/validation/job');

      const extractor = createSecondaryExtractor(config.providers);
      return processDocumentQaJob(job.data, {
        config,
        extractor,
        onProgress: (percent) => job.updateProgress(percent),
      });
    },
    {
      connection: redisConnection(config.redisUrl),
      concurrency: 2,
      removeOnComplete: { count: 200 },
      removeOnFail: { count: 100 },
    }
  );

  worker.on('completed', (job, result) => {
    console.log(`[DocumentQA] Job ${job.id} completed (${result.validation.status})`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[DocumentQA] Job ${job?.id} failed:`, err.message);
  });

  return worker;
}
