/**
 * Document Text Extraction
 *
 * Turns raw document bytes into a single text blob using a PageTextSource.
 * Pages are kept in their original order and joined with a newline; pages
 * that yield no text contribute nothing.
 */

import { logger } from '../logger';
import type { PageText, PageTextSource } from '../types';

export function joinPageText(pages: PageText[]): string {
  return pages
    .filter((page) => page.text !== '')
    .map((page) => page.text)
    .join('\n');
}

/**
 * Extract the text of a document. Errors from the source (DocumentFormatError
 * for unreadable bytes) propagate to the caller.
 */
export async function extractText(bytes: Uint8Array, source: PageTextSource): Promise<string> {
  const pages = await source(bytes);

  for (const page of pages) {
    logger.debug('Page text extracted', {
      pageNumber: page.pageNumber,
      textLength: page.text.length,
    });
  }

  const text = joinPageText(pages);

  logger.info('Document text extraction complete', {
    totalPages: pages.length,
    pagesWithText: pages.filter((page) => page.text !== '').length,
    totalChars: text.length,
  });

  return text;
}
