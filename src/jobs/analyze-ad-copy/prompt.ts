/**
 * Ad Copy Analysis Prompt
 *
 * Template variables to replace:
 * - {{contextClause}} (" for <context>", or empty)
 * - {{adCopy}}
 */

export const AD_ANALYSIS_SYSTEM_PROMPT =
  'You are an expert in analyzing search advertising copy. ' +
  'Provide a detailed analysis based on the given criteria. ' +
  'Return ONLY a single JSON object. No markdown, no prose, no code blocks.';

export const AD_ANALYSIS_PROMPT = `Analyze the following search ad copy{{contextClause}}:

{{adCopy}}

Provide a comprehensive analysis including:
- title analysis
- snippet analysis
- display URL analysis
- ad extensions analysis
- keyword relevance and density
- call-to-action analysis
- overall ad strength evaluation (score from 1 to 10)

Format your response as a JSON object with keys for each analysis component.`;
