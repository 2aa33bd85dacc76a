import type { Citation, RetrievalResult } from './retrieval_client.js';

export const UNKNOWN_SOURCE = 'Unknown source';

export function formatCitation(citation: Citation, index: number): string {
  return `${index + 1}. ${citation.sourceUri ?? UNKNOWN_SOURCE}`;
}

/**
 * Render a query answer as markdown. The Sources section is left out entirely
 * when the result carries no citations.
 */
export function formatQueryResponse(query: string, result: RetrievalResult): string {
  let formatted = `**Query**: ${query}\n\n**Answer**: ${result.answerText}`;
  if (result.citations.length > 0) {
    formatted += '\n\n**Sources**:';
    result.citations.forEach((citation, index) => {
      formatted += `\n${formatCitation(citation, index)}`;
    });
  }
  return formatted;
}
