/**
 * Resume Parsing Prompt Template
 *
 * Document semantics:
 * - Section headings become top-level keys
 * - Experience and Education are arrays of fixed-key objects
 * - Skills maps category names to arrays of strings
 * - name, email and phone sit at the top level when the model can find them
 */

export interface PromptTemplate {
  /** Human-readable description of what this template extracts */
  description: string;

  /**
   * Prompt with placeholders:
   * - {{resume_text}}: The extracted document text
   */
  promptTemplate: string;
}

export const RESUME_TEMPLATE: PromptTemplate = {
  description: 'Resume - extracts sections keyed by heading plus name, email and phone',

  promptTemplate: `You are a smart resume parser. Convert the following resume text into a JSON object.
Use headings as keys (like "Education", "Skills", "Experience") and map the content under them as values.
Also include "name", "email", and "phone" if possible.

IMPORTANT: Only output one valid JSON object.
Do NOT include explanations, markdown, or multiple JSONs.

--- SCHEMA INSTRUCTIONS ---
1. "Experience": MUST be an array of objects. Each object must represent one Job or Project and contain the keys: "title", "company_or_project", "dates", and "description_bullets" (which is an array of strings).
2. "Education": MUST be an array of objects. Each object must contain the keys: "degree", "institution", "dates", and "gpa_or_percent".
3. "Skills": Should be an object where keys are skill categories (e.g., "Languages", "Frameworks") and values are arrays of strings.

Resume:
{{resume_text}}

JSON output:`,
};

/**
 * Render the resume prompt with the document text inserted verbatim.
 */
export function buildResumePrompt(text: string): string {
  // Function replacer: `$&` and friends in resume text stay literal.
  return RESUME_TEMPLATE.promptTemplate.replace('{{resume_text}}', () => text);
}
