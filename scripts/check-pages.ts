/**
 * Run the problem detectors over a pages JSON file without re-extracting.
 * Usage: npm run check:pages -- <pages.json> [problem,problem|all]
 */

import { readFile } from 'node:fs/promises';
import { getConfig, parseProblemList } from '../src/lib/config';
import { documentQaJobSchema } from '../src/lib/validation/job';
import { ProblemDetector } from '../src/lib/validation/problem-detector';

async function checkPages() {
  const [pagesPath, problemList] = process.argv.slice(2);
  if (!pagesPath) {
    console.error('Usage: npm run check:pages -- <pages.json> [problem,problem|all]');
    process.exit(1);
  }

  const raw: unknown = JSON.parse(await readFile(pagesPath, 'utf8'));
  const pages = documentQaJobSchema.shape.pages.parse(raw);
  const enabled = problemList ? parseProblemList(problemList) : getConfig().validation.enabledProblems;

  console.log(`[CheckPages] ${pages.length} pages, detectors: ${enabled.join(', ')}`);
  const detector = new ProblemDetector();
  const results = detector.detectBatch(pages, enabled);

  for (const [index, problems] of results) {
    if (problems.length > 0) {
      console.log(`[CheckPages] Page ${index}: ${problems.join(', ')}`);
    }
  }

  // Per-detector totals
  const totals = new Map<string, number>(enabled.map((name) => [name, 0]));
  for (const page of pages) {
    for (const [name, fired] of Object.entries(detector.detectAll(page.text, enabled))) {
      if (fired) totals.set(name, (totals.get(name) ?? 0) + 1);
    }
  }
  for (const [name, count] of totals) {
    console.log(`[CheckPages] ${name}: ${count}/${pages.length}`);
  }
}

checkPages().catch((err: unknown) => {
  console.error('[CheckPages] Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
