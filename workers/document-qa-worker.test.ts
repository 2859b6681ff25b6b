import { readFile } from 'node:fs/promises';
import { describe, expect, it, vi } from 'vitest';
import { createSecondaryExtractor } from '../src/lib/ai/page-extractor';
import { loadConfig } from '../src/lib/config';
import { createDocumentQaWorker } from './document-qa-worker';

interface FakeJob {
  id: string;
  data: unknown;
  updateProgress: (percent: number) => Promise<void>;
}

type Processor = (job: FakeJob) => Promise<unknown>;

const created = vi.hoisted(() => [] as Array<{ name: string; processor: Processor; options: unknown }>);

vi.mock('bullmq', () => ({
  Worker: class {
    constructor(
      readonly name: string,
      processor: Processor,
      options: unknown
    ) {
      created.push({ name, processor, options });
    }
    on() {
      return this;
    }
  },
  Queue: class {},
}));

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(async () => new Uint8Array([37, 80, 68, 70])),
}));

vi.mock('../src/lib/ai/page-extractor', () => ({
  createSecondaryExtractor: vi.fn(() => ({
    name: 'fake',
    extractPage: async () => 'second opinion',
  })),
}));

describe('createDocumentQaWorker', () => {
  const config = loadConfig({
    REDIS_URL: 'redis://queue.test:6379',
    GOOGLE_AI_API_KEY: 'test-key',
  });

  it('listens on the document-qa queue with the configured Redis', () => {
    createDocumentQaWorker(config);
    expect(created.at(-1)).toMatchObject({
      name: 'document-qa',
      options: { connection: { url: 'redis://queue.test:6379' }, concurrency: 2 },
    });
  });

  it('runs a job end to end and reports progress', async () => {
    createDocumentQaWorker(config);
    const processor = created.at(-1)?.processor;
    if (!processor) throw new Error('worker was not created');

    const progress: number[] = [];
    const result = await processor({
      id: '1',
      data: { documentPath: '/tmp/statement.pdf', pages: [{ index: 0, text: 'x' }] },
      updateProgress: async (percent) => {
        progress.push(percent);
      },
    });

    expect(createSecondaryExtractor).toHaveBeenCalledWith(config.providers);
    expect(readFile).toHaveBeenCalledWith('/tmp/statement.pdf');
    expect(result).toMatchObject({
      pages: [{ index: 0, text: 'second opinion' }],
      validation: { enabled: true, status: 'problems_fixed' },
    });
    expect(progress).toEqual([10, 70, 100]);
  });
});
