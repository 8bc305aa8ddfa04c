/**
 * Summary record produced by the summarizer and consumed by the record writer
 */

/**
 * Analytical sections requested from the model, in display order
 */
export const ANALYTICAL_FIELDS = [
  'background',
  'methods',
  'results',
  'discussion',
  'limitations',
  'conclusions',
  'strengths',
] as const;

export type AnalyticalField = (typeof ANALYTICAL_FIELDS)[number];

/**
 * Bibliographic fields, all mandatory in a model response
 */
export const BIBLIOGRAPHIC_FIELDS = ['title', 'authors', 'journal', 'year'] as const;

export type BibliographicField = (typeof BIBLIOGRAPHIC_FIELDS)[number];

export type SummaryField = BibliographicField | AnalyticalField;

/**
 * Immutable once created. Written exactly once per successful cycle.
 */
export type SummaryRecord = Readonly<
  {
    documentId: string;
    title: string;
    /** Comma-separated author list */
    authors: string;
    journal: string;
    /** Publication year, 0 when unknown */
    year: number;
  } & Record<AnalyticalField, string>
>;
