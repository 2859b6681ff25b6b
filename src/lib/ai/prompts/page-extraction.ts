import type { PromptProfile } from '@/types/validation';

export interface PromptPair {
  system: string;
  /** May contain `{page_number}`, replaced with the one-based page number */
  user: string;
}

export const PAGE_EXTRACTION_SYSTEM_PROMPT = `You extract the content of a single PDF page into clean markdown.

## Rules

1. Transcribe every piece of visible text in reading order
2. Reproduce tables as markdown tables, one row per line, keeping every column
3. Copy numbers exactly as printed, including signs, separators and currency symbols
4. Cells that look empty must be checked against the page image before leaving them blank
5. Keep headings, lists and paragraph breaks
6. Never invent, summarize or translate content

Return only the markdown, with no commentary.`;

export const PAGE_EXTRACTION_USER_PROMPT = `Extract all content from this page (page {page_number} of the original document) as markdown. Include every table using markdown table syntax and do not skip anything.`;

export const IMAGE_PAGE_SYSTEM_PROMPT = `You extract the content of a single PDF page that contains charts, diagrams or pictures.

## Rules

1. Transcribe every piece of visible text in reading order
2. Reproduce tables as markdown tables, one row per line
3. For each chart or diagram, write a short description followed by every data value you can read from it
4. Copy numbers exactly as printed
5. Never invent values that are not visible on the page

Return only the markdown, with no commentary.`;

export const IMAGE_PAGE_USER_PROMPT = `Extract all content from this page (page {page_number} of the original document) as markdown. The page contains images or charts: describe each one and list the values it shows. Include every table using markdown table syntax.`;

export const FINANCE_IMAGE_PAGE_SYSTEM_PROMPT = `You extract TEXT and TABLES from a single page of a financial report.

## Rules

1. Skip images, charts, logos and diagrams entirely: do not describe them and do not read values from them
2. Transcribe all body text, headings and footnotes
3. Reproduce every financial table as a markdown table, one row per line, keeping every column
4. Copy amounts exactly as printed, including negative signs, parentheses and thousands separators
5. Keep row labels such as totals and subtotals on their own rows

Return only the markdown, with no commentary.`;

export const FINANCE_IMAGE_PAGE_USER_PROMPT = `Extract all text and tables from page {page_number}. Ignore every image and chart. Return the result as markdown.`;

export const DEFAULT_PROMPTS: PromptPair = {
  system: PAGE_EXTRACTION_SYSTEM_PROMPT,
  user: PAGE_EXTRACTION_USER_PROMPT,
};

/**
 * Prompt pair for a page whose primary extraction referenced images.
 */
export function imagePagePrompts(profile: PromptProfile): PromptPair {
  if (profile === 'finance') {
    return { system: FINANCE_IMAGE_PAGE_SYSTEM_PROMPT, user: FINANCE_IMAGE_PAGE_USER_PROMPT };
  }
  return { system: IMAGE_PAGE_SYSTEM_PROMPT, user: IMAGE_PAGE_USER_PROMPT };
}

export function renderUserPrompt(template: string, pageNumber: number): string {
  return template.replaceAll('{page_number}', String(pageNumber));
}
