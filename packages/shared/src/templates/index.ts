/**
 * Prompt Templates
 */

export { RESUME_TEMPLATE, buildResumePrompt, type PromptTemplate } from './resume.template';
