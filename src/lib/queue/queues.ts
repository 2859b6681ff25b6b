/**
 * BullMQ queue instances for submitting documents to the QA worker.
 */

import { Queue } from 'bullmq';
import type { DocumentQaJobData } from '@/lib/validation/job';
import { redisConnection } from './connection';

export const DOCUMENT_QA_QUEUE = 'document-qa';

let documentQaQueue: Queue<DocumentQaJobData> | null = null;

export function getDocumentQaQueue(): Queue<DocumentQaJobData> {
  if (!documentQaQueue) {
    documentQaQueue = new Queue<DocumentQaJobData>(DOCUMENT_QA_QUEUE, {
      connection: redisConnection(),
    });
  }
  return documentQaQueue;
}
