/**
 * Prompt for structured paper analysis
 */

import type { AnalyticalField } from '../../models/summary.js';

export const SECTION_GUIDANCE: Record<AnalyticalField, string> = {
  background: 'The problem addressed and why it matters',
  methods: 'Study design, data and analytical approach',
  results: 'Main quantitative and qualitative findings',
  discussion: 'How the authors interpret the findings',
  limitations: 'Weaknesses acknowledged by the authors or evident from the design',
  conclusions: 'The take-home message',
  strengths: 'What the study does particularly well',
};

export function buildAnalysisPrompt(text: string): string {
  const sections = Object.entries(SECTION_GUIDANCE)
    .map(([field, guidance]) => `  "${field}": "${guidance}"`)
    .join(',\n');

  return `You are an expert at analyzing academic papers. Analyze the paper text below.

Respond with valid JSON only, no explanation and no markdown fences, with exactly this structure:
{
  "title": "Full title of the paper",
  "authors": ["Author 1", "Author 2"],
  "journal": "Journal or conference name",
  "year": 2024,
${sections}
}

Each section is a short paragraph of plain prose. If a bibliographic value cannot be found,
use "Not found" for strings and 0 for the year.

Paper text:
${text}`;
}
