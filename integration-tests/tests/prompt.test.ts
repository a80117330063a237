/**
 * Prompt Builder Tests
 */

import { buildResumePrompt, RESUME_TEMPLATE } from '@resume-parser/shared';

describe('buildResumePrompt', () => {
  it('should place the resume text between the Resume and JSON output markers', () => {
    const text = 'Jane Roe\njane@example.com';
    expect(buildResumePrompt(text)).toContain(`Resume:\n${text}\n\nJSON output:`);
  });

  it('should end with the JSON output marker', () => {
    expect(buildResumePrompt('Jane Roe').endsWith('JSON output:')).toBe(true);
  });

  it('should leave no placeholder behind', () => {
    expect(buildResumePrompt('Jane Roe')).not.toContain('{{resume_text}}');
    expect(RESUME_TEMPLATE.promptTemplate).toContain('{{resume_text}}');
  });

  it('should insert replacement patterns literally', () => {
    const text = "Costs $& and $1 and $' in budget";
    expect(buildResumePrompt(text)).toContain(`Resume:\n${text}\n\nJSON output:`);
  });

  it('should keep text that itself looks like the placeholder', () => {
    const prompt = buildResumePrompt('{{resume_text}}');
    expect(prompt).toContain('Resume:\n{{resume_text}}\n\nJSON output:');
  });

  it('should describe the requested schema', () => {
    const prompt = buildResumePrompt('');
    for (const key of [
      '"name"',
      '"email"',
      '"phone"',
      '"title"',
      '"company_or_project"',
      '"dates"',
      '"description_bullets"',
      '"degree"',
      '"institution"',
      '"gpa_or_percent"',
      '"Skills"',
    ]) {
      expect(prompt).toContain(key);
    }
    expect(prompt).toContain('Only output one valid JSON object.');
  });

  it('should be deterministic', () => {
    expect(buildResumePrompt('Jane Roe')).toBe(buildResumePrompt('Jane Roe'));
  });
});
