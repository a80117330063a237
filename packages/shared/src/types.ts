/**
 * Shared TypeScript Types
 *
 * Types for the resume parsing pipeline and its upload API.
 */

// ============================================================================
// Document Text
// ============================================================================

export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * Produces per-page text from raw document bytes, in page order.
 * Rejects with DocumentFormatError when the bytes are not a readable document.
 */
export type PageTextSource = (bytes: Uint8Array) => Promise<PageText[]>;

// ============================================================================
// Extraction Results
// ============================================================================

/**
 * Deterministic, regex-derived fields. Also the pipeline's fallback result.
 */
export interface BasicInfo {
  name: string;
  email: string | null;
  phone: string | null;
  raw_text: string;
}

export interface ExperienceEntry {
  title: string;
  company_or_project: string;
  dates: string;
  description_bullets: string[];
}

export interface EducationEntry {
  degree: string;
  institution: string;
  dates: string;
  gpa_or_percent: string;
}

export type SkillsByCategory = Record<string, string[]>;

/**
 * Field map derived from the generation service's output. The shape is
 * requested by the prompt but never enforced, so every key is `unknown`.
 * Experience, Education and Skills conventionally follow the entry types above.
 */
export type StructuredMap = Record<string, unknown>;

export type FinalResult = StructuredMap | BasicInfo;

// ============================================================================
// Generation Service
// ============================================================================

export type GenerationProvider = 'ollama' | 'openai';

/**
 * Loosely-typed value returned by the generation service, tagged by shape.
 */
export type RawModelResponse =
  | { kind: 'map'; value: StructuredMap }
  | { kind: 'text'; value: string }
  | { kind: 'other'; value: unknown };

export type JsonScannerMode = 'first-close' | 'balanced';

// ============================================================================
// Pipeline
// ============================================================================

export type PipelineStage =
  | 'extracting_text'
  | 'extracting_basic_info'
  | 'building_prompt'
  | 'calling_model'
  | 'sanitizing_response'
  | 'merging'
  | 'falling_back';

export type FallbackReason = 'generation_failed' | 'sanitize_failed' | 'unexpected_error';

export type ParseOutcome =
  | { source: 'generation'; result: StructuredMap }
  | { source: 'fallback'; result: BasicInfo; fallbackReason: FallbackReason };

// ============================================================================
// API
// ============================================================================

export interface ResumeUploadResponse {
  filename: string;
  parsed_data: FinalResult;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
