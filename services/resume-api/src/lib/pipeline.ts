/**
 * Resume Parsing Pipeline
 *
 * extracting_text -> extracting_basic_info -> building_prompt -> calling_model
 *   -> sanitizing_response -> merging -> done
 *
 * Any failure from building_prompt onwards falls back to BasicInfo unchanged.
 * Failures before BasicInfo exists propagate to the caller.
 */

import {
  logger,
  extractText,
  extractBasicInfo,
  buildResumePrompt,
  sanitizeResponse,
  reconcile,
  GenerationFailure,
  SanitizeFailure,
  pipelineStageDurationHistogram,
  pipelineRunsCounter,
  fallbacksCounter,
  type BasicInfo,
  type Config,
  type FallbackReason,
  type JsonScannerMode,
  type PageTextSource,
  type ParseOutcome,
  type PipelineStage,
  type StructuredMap,
} from '@resume-parser/shared';
import { createGenerationClient, type GenerationClient } from './llm';
import { readPdfPages } from './pdf';

export interface PipelineDependencies {
  pageSource: PageTextSource;
  generationClient: GenerationClient;
  scanner: JsonScannerMode;
}

/**
 * Run one stage, emitting a structured event with its duration and outcome
 */
async function runStage<T>(stage: PipelineStage, fn: () => T | Promise<T>): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;
    pipelineStageDurationHistogram.observe({ stage, outcome: 'success' }, durationMs / 1000);
    logger.info('Pipeline stage completed', { stage, duration_ms: durationMs, outcome: 'success' });
    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    pipelineStageDurationHistogram.observe({ stage, outcome: 'failure' }, durationMs / 1000);
    logger.warn('Pipeline stage failed', {
      stage,
      duration_ms: durationMs,
      outcome: 'failure',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

function fallbackReasonFor(error: unknown): FallbackReason {
  if (error instanceof GenerationFailure) return 'generation_failed';
  if (error instanceof SanitizeFailure) return 'sanitize_failed';
  return 'unexpected_error';
}

export class ResumePipeline {
  constructor(private readonly deps: PipelineDependencies) {}

  async parse(bytes: Uint8Array): Promise<ParseOutcome> {
    const basicInfo = await this.extractBasics(bytes);

    let structured: StructuredMap;
    try {
      structured = await this.generateStructured(basicInfo.raw_text);
    } catch (error) {
      return runStage('falling_back', () => this.fallBack(basicInfo, error));
    }

    const result = await runStage('merging', () => reconcile(structured, basicInfo));
    pipelineRunsCounter.inc({ outcome: 'merged' });

    logger.info('Resume parsed', {
      source: 'generation',
      keys: Object.keys(result),
    });

    return { source: 'generation', result };
  }

  /**
   * Text and BasicInfo. No fallback exists yet, so failures here are fatal.
   */
  private async extractBasics(bytes: Uint8Array): Promise<BasicInfo> {
    try {
      const text = await runStage('extracting_text', () =>
        extractText(bytes, this.deps.pageSource)
      );
      return await runStage('extracting_basic_info', () => extractBasicInfo(text));
    } catch (error) {
      pipelineRunsCounter.inc({ outcome: 'error' });
      throw error;
    }
  }

  private async generateStructured(text: string): Promise<StructuredMap> {
    const prompt = await runStage('building_prompt', () => buildResumePrompt(text));
    const raw = await runStage('calling_model', () => this.deps.generationClient.generate(prompt));
    return runStage('sanitizing_response', () =>
      sanitizeResponse(raw, { scanner: this.deps.scanner })
    );
  }

  /**
   * Discard any partial generation output and return BasicInfo as-is
   */
  private fallBack(basicInfo: BasicInfo, error: unknown): ParseOutcome {
    const fallbackReason = fallbackReasonFor(error);

    if (fallbackReason === 'unexpected_error') {
      logger.error('Unexpected error in generation branch', error);
    }

    logger.warn('Falling back to basic info', {
      fallback_reason: fallbackReason,
      error: error instanceof Error ? error.message : String(error),
    });

    fallbacksCounter.inc({ reason: fallbackReason });
    pipelineRunsCounter.inc({ outcome: 'fallback' });

    return { source: 'fallback', result: basicInfo, fallbackReason };
  }
}

/**
 * Build the production pipeline: pdfjs page source plus the configured
 * generation client
 */
export function createResumePipeline(config: Config): ResumePipeline {
  return new ResumePipeline({
    pageSource: readPdfPages,
    generationClient: createGenerationClient(config),
    scanner: config.responseJsonScanner,
  });
}
