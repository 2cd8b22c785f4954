import { describe, expect, it } from 'vitest';
import config, { formatAdCopy } from './config.js';
import { AD_ANALYSIS_PROMPT } from './prompt.js';

const record = { title: 'Human IL-6 ELISA Kit', snippet: 'Save $$ today', displayed_link: 'example.com/il6' };

describe('analyze-ad-copy job', () => {
  it('renders the ad copy block', () => {
    expect(formatAdCopy({ ...record, extensions: 'Free shipping' })).toBe(
      'Title: Human IL-6 ELISA Kit\nSnippet: Save $$ today\nDisplay URL: example.com/il6\nExtensions: Free shipping'
    );
    expect(formatAdCopy(record).endsWith('Extensions: ')).toBe(true);
  });

  it('interpolates the context label when given', () => {
    const prompt = config.promptTemplate(record, 'ELISA kits');
    expect(prompt.startsWith('Analyze the following search ad copy for ELISA kits:\n\nTitle: Human IL-6 ELISA Kit\n')).toBe(true);
    expect(prompt).toContain('Snippet: Save $$ today');
  });

  it('omits the context clause when empty', () => {
    expect(config.promptTemplate(record, '').startsWith('Analyze the following search ad copy:\n\n')).toBe(true);
  });

  it('uses exactly the contextClause and adCopy placeholders, all filled in', () => {
    expect(AD_ANALYSIS_PROMPT.match(/\{\{\w+\}\}/g)).toEqual(['{{contextClause}}', '{{adCopy}}']);
    expect(config.promptTemplate(record, 'ELISA kits')).not.toMatch(/\{\{\w+\}\}/);
  });
});
