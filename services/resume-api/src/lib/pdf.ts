/**
 * PDF Text Extraction
 *
 * PageTextSource backed by pdfjs-dist. pdfjs is loaded on first use.
 */

import {
  DocumentFormatError,
  logger,
  type PageText,
  type PageTextSource,
} from '@resume-parser/shared';

type Pdfjs = typeof import('pdfjs-dist/legacy/build/pdf');

let pdfjsPromise: Promise<Pdfjs> | null = null;

const PDFJS_WARNING_PREFIX = 'Warning: ';

/**
 * Import pdfjs, routing the warnings it prints through console.log while the
 * module evaluates (missing canvas polyfills) to the JSON logger.
 */
async function importPdfjs(): Promise<Pdfjs> {
  const consoleLog = console.log;
  console.log = (...args: unknown[]) => {
    const [first] = args;
    if (typeof first === 'string' && first.startsWith(PDFJS_WARNING_PREFIX)) {
      logger.debug('pdfjs warning', { warning: first.slice(PDFJS_WARNING_PREFIX.length) });
      return;
    }
    consoleLog(...args);
  };

  try {
    return await import('pdfjs-dist/legacy/build/pdf');
  } finally {
    console.log = consoleLog;
  }
}

function loadPdfjs(): Promise<Pdfjs> {
  if (!pdfjsPromise) {
    pdfjsPromise = importPdfjs().then((pdfjsLib) => {
      // Configure worker for Node.js environment
      pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve(
        'pdfjs-dist/legacy/build/pdf.worker.js'
      );
      return pdfjsLib;
    });
  }
  return pdfjsPromise;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function openPdf(bytes: Uint8Array) {
  const pdfjsLib = await loadPdfjs();
  try {
    // pdfjs may detach the buffer it is given, so hand it a copy
    return await pdfjsLib.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      verbosity: 0,
    }).promise;
  } catch (error) {
    throw new DocumentFormatError(`Unable to open PDF: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Read every page's text, preserving line structure.
 *
 * Groups text items by Y position to maintain document layout, so section
 * headings stay on their own lines for the generation service.
 */
export const readPdfPages: PageTextSource = async (bytes) => {
  if (bytes.byteLength === 0) {
    throw new DocumentFormatError('Unable to open PDF: document is empty');
  }

  const pdf = await openPdf(bytes);

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Sort Y positions descending (top to bottom on page)
      const lines = [...itemsByY.entries()]
        .sort(([a], [b]) => b - a)
        .map(([, items]) =>
          items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line !== '');

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
      page.cleanup();
    }

    logger.debug('PDF pages read', { totalPages: pdf.numPages });
    return pages;
  } catch (error) {
    throw new DocumentFormatError(`Unable to read PDF text: ${errorMessage(error)}`, { cause: error });
  } finally {
    await pdf.destroy();
  }
};
