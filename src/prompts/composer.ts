import type { CategorySummary, SystemPrompt } from "../memory/types";

export const MEMORY_SECTION_HEADER = "Here's what you know about the user:";
export const SECTION_DELIMITER = "\n\n";

function hasSummary(summary: CategorySummary): summary is CategorySummary & { summaryText: string } {
  return typeof summary.summaryText === "string" && summary.summaryText.trim().length > 0;
}

/**
 * Fold category summaries into the base instructions.
 * Pure and deterministic: same inputs, same bytes. Categories without a summary are left out;
 * when none remain the base comes back unchanged.
 */
export function composeSystemPrompt(base: string, summaries: readonly CategorySummary[]): SystemPrompt {
  const integratedSummaries = summaries.filter(hasSummary);
  if (integratedSummaries.length === 0) {
    return { base, integratedSummaries: [], text: base };
  }
  const sections = integratedSummaries.map((s) => `**${s.categoryName.trim()}:** ${s.summaryText.trim()}`);
  return {
    base,
    integratedSummaries,
    text: [base, MEMORY_SECTION_HEADER, ...sections].join(SECTION_DELIMITER),
  };
}

export function buildPrompt(base: string, summaries: readonly CategorySummary[]): string {
  return composeSystemPrompt(base, summaries).text;
}
