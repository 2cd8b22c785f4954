import type { JobConfig } from '../JobConfig.js';
import type { AdRecord } from '../../core/types.js';
import { AD_ANALYSIS_PROMPT, AD_ANALYSIS_SYSTEM_PROMPT } from './prompt.js';

/**
 * Renders one record the way ads are shown to the model
 */
export function formatAdCopy(record: AdRecord): string {
  return [
    `Title: ${record.title}`,
    `Snippet: ${record.snippet}`,
    `Display URL: ${record.displayed_link}`,
    `Extensions: ${record.extensions ?? ''}`,
  ].join('\n');
}

/**
 * Analyze Ad Copy Job Configuration
 *
 * One call per ad; the model returns a free-form JSON object whose keys
 * vary from call to call and are unified after the batch.
 */
const config: JobConfig = {
  id: 'analyze-ad-copy',

  description: 'Analyze search ad copy (title, snippet, display URL, extensions) and score its strength',

  systemPrompt: AD_ANALYSIS_SYSTEM_PROMPT,

  promptTemplate: (record, context) =>
    AD_ANALYSIS_PROMPT.replace('{{contextClause}}', () => (context ? ` for ${context}` : '')).replace(
      '{{adCopy}}',
      () => formatAdCopy(record)
    ),

  maxOutputTokens: 2000,

  temperature: 0.2,
};

export default config;
