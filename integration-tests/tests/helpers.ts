/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF library and the generation service.
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { PageText, PageTextSource, RawModelResponse } from '@resume-parser/shared';
import type { GenerationClient } from '../../services/resume-api/src/lib/llm';

/**
 * Page source that ignores the bytes and returns fixed page texts
 */
export function fakePageSource(...texts: string[]): PageTextSource {
  const pages: PageText[] = texts.map((text, index) => ({ pageNumber: index + 1, text }));
  return async () => pages;
}

/**
 * Page source that always rejects with the given error
 */
export function failingPageSource(error: Error): PageTextSource {
  return async () => {
    throw error;
  };
}

/**
 * Generation client whose answer is scripted by the test
 */
export class StubGenerationClient implements GenerationClient {
  readonly provider = 'ollama';
  readonly model = 'stub-model';
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => Promise<RawModelResponse>) {}

  generate(prompt: string): Promise<RawModelResponse> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export function answeringWith(raw: RawModelResponse): StubGenerationClient {
  return new StubGenerationClient(async () => raw);
}

export function failingWith(error: Error): StubGenerationClient {
  return new StubGenerationClient(async () => {
    throw error;
  });
}

export interface RecordedRequest {
  method: string | undefined;
  url: string | undefined;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface StubServer {
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/**
 * Start an HTTP server on an ephemeral port. The handler receives the
 * buffered request body; it may leave the response open to simulate a hang.
 */
export async function startStubServer(
  handler: (request: RecordedRequest, res: http.ServerResponse) => void
): Promise<StubServer> {
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf-8'),
      };
      requests.push(recorded);
      handler(recorded, res);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  return {
    url: `http://127.0.0.1:${portOf(server)}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * Reply with a JSON body
 */
export function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function portOf(server: http.Server): number {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

/**
 * URL of a port nothing listens on
 */
export async function unreachableUrl(path: string): Promise<string> {
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const port = portOf(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return `http://127.0.0.1:${port}${path}`;
}

/**
 * The error thrown by fn, or undefined when it returns
 */
export function thrownError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function escapePdfText(text: string): string {
  return text.replace(/[\\()]/g, (ch) => `\\${ch}`);
}

/**
 * Minimal single-font PDF. Each entry of `pages` is that page's lines, drawn
 * top to bottom 20pt apart; an empty entry is a blank page.
 */
export function buildPdf(pages: string[][]): Buffer {
  const fontRef = `${3 + pages.length * 2} 0 R`;
  const kids = pages.map((_, index) => `${3 + index * 2} 0 R`).join(' ');

  const objects: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${kids}] /Count ${pages.length} >>`,
  ];

  pages.forEach((lines, index) => {
    const contentRef = `${4 + index * 2} 0 R`;
    const operators = lines.flatMap((line, lineIndex) => [
      lineIndex === 0 ? '72 720 Td' : '0 -20 Td',
      `(${escapePdfText(line)}) Tj`,
    ]);
    const stream = lines.length === 0 ? '' : ['BT', '/F1 12 Tf', ...operators, 'ET'].join('\n');

    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 ${fontRef} >> >> /Contents ${contentRef} >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`
    );
  });

  objects.push('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>');

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
}

/**
 * Parsed JSON log lines written through a console spy
 */
export function loggedEntries(spy: { mock: { calls: unknown[][] } }): Array<Record<string, unknown>> {
  return spy.mock.calls.flatMap(([line]) => {
    if (typeof line !== 'string') return [];
    const entry: unknown = JSON.parse(line);
    return typeof entry === 'object' && entry !== null && !Array.isArray(entry)
      ? [Object.fromEntries(Object.entries(entry))]
      : [];
  });
}
