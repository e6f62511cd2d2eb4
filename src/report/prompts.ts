import type { ChartDescriptor, DataSummary, ErrorPatternSummary, SectionRequest } from './types.js';

/**
 * Formatting rules shared by every markdown commentary prompt.
 */
export const MARKDOWN_FORMATTING_RULES = `Formatting:
- Use *italics* for method names (e.g. *azure_model*, *query-vat_number*), technical terms (e.g. *fallback*, *ensemble*, *routing*) and system names
- Use bullet lists to organise key points, anomalies and recommendations
- Keep paragraphs short and readable; avoid walls of text
- Use **bold** for important concepts when needed

IMPORTANT: answer in markdown.`;

export function formatDistribution(distribution: Record<string, number>): string {
  return Object.entries(distribution)
    .map(([name, count]) => `${name}: ${count}`)
    .join('\n');
}

export function formatPercent(part: number, total: number): string {
  return `${(total > 0 ? (part / total) * 100 : 0).toFixed(1)}%`;
}

function contextBlock(contextText: string): string {
  return contextText ? `\n\n=== DOMAIN CONTEXT AND DOCUMENTATION ===\n${contextText}\n` : '';
}

function fieldFocus(summary: DataSummary): string {
  if (summary.fieldName) {
    const records = summary.fieldRecordCount ?? 0;
    const validated = summary.fieldValidatedCount ?? 0;
    return (
      `\n\nAnalysis for field: **${summary.fieldName}**\n` +
      `Records for this field: ${records}\n` +
      `Validated records for this field: ${validated} (${formatPercent(validated, records)})\n`
    );
  }
  if (summary.fieldDistribution) {
    return `\n\nField distribution (field_name):\n${formatDistribution(summary.fieldDistribution)}\n`;
  }
  return '';
}

/**
 * Data overview prompt. Recognition datasets (with a method distribution)
 * get the invoice-specific framing; anything else gets a generic one.
 */
export function buildDataSummaryPrompt(summary: DataSummary, contextText = ''): string {
  const shape = `Rows: ${summary.rowCount}\nColumns: ${summary.columns.join(', ')}`;

  if (!summary.methodDistribution) {
    return `Analyze the following data and write a concise analytical summary in markdown.

${shape}

Descriptive statistics:
${summary.statistics}

Provide a structured analysis that highlights:
1. The main characteristics of the data
2. Evident patterns or trends
3. Relevant observations

${MARKDOWN_FORMATTING_RULES}
`;
  }

  const validated = summary.validatedCount ?? 0;
  const extracted = summary.fieldDistribution || summary.fieldName
    ? 'every field listed in field_name'
    : 'information from invoices';

  return `Analyze the following document recognition data (invoices) and write a concise analytical summary in markdown.

Context: data from a system that automatically extracts ${extracted}. The data contains predictions from several algorithms and human validations.${fieldFocus(summary)}${contextBlock(contextText)}

${shape}

Descriptive statistics:
${summary.statistics}

Validated records: ${validated} of ${summary.rowCount} (${formatPercent(validated, summary.rowCount)})

Method distribution:
${formatDistribution(summary.methodDistribution)}

Provide a structured analysis that highlights:
1. Data volume and coverage (validated vs total records)
2. Overall performance of the recognition methods
3. Relevant observations about the validation process

${MARKDOWN_FORMATTING_RULES}
`;
}

export function buildChartCommentaryPrompt(chart: ChartDescriptor, contextText = ''): string {
  const domain =
    chart.domain === 'document'
      ? 'Context: performance analysis of document recognition algorithms for invoices. '
      : '';
  const field = chart.fieldName
    ? `\n\nNote: this chart shows data for the field **${chart.fieldName}**. `
    : '';

  return `Write a professional analytical commentary for the following chart in markdown.

${domain}${field}${contextBlock(contextText)}Chart type: ${chart.description}

Data shown:
${chart.dataSummary}

The commentary must:
1. Open with 1-2 paragraphs describing the main patterns observed
2. Include a "Points of interest / anomalies" section with a bullet list when applicable
3. Include an "Operational recommendations" section with a bullet list when applicable

${MARKDOWN_FORMATTING_RULES}
`;
}

function formatConfidence(value: number | undefined): string {
  return value === undefined ? 'N/A' : value.toFixed(3);
}

export function buildErrorPatternsPrompt(errors: ErrorPatternSummary, contextText = ''): string {
  const fp = Object.keys(errors.falsePositivesByMethod).length > 0
    ? formatDistribution(errors.falsePositivesByMethod)
    : 'No FP';
  const fn = Object.keys(errors.falseNegativesByMethod).length > 0
    ? formatDistribution(errors.falseNegativesByMethod)
    : 'No FN';
  const field = errors.fieldName
    ? `\n\nAnalysis for field: **${errors.fieldName}**\nValidated records for this field: ${errors.validatedCount}\n`
    : '';

  return `Analyze the error patterns of a document recognition system and write a concise analysis in markdown.

Context: automatic extraction of information from invoices. False Positive (FP) = predicted positive but actually negative. False Negative (FN) = predicted negative but actually positive.${field}${contextBlock(contextText)}

False positives by method:
${fp}

False negatives by method:
${fn}

Average FP confidence: ${formatConfidence(errors.fpAverageConfidence)}
Average FN confidence: ${formatConfidence(errors.fnAverageConfidence)}

Provide a structured analysis that:
1. Identifies which methods have the most problems (FP or FN)
2. Analyzes whether confidence correlates with errors
3. Suggests possible improvements or areas of attention

${MARKDOWN_FORMATTING_RULES}
`;
}

/**
 * Free-form section. Plain prose: the output is embedded as-is.
 */
export function buildSectionPrompt(section: SectionRequest, contextText = ''): string {
  return `Write a professional report section (2-3 paragraphs) about:

Topic: ${section.topic}

Data context:
${section.dataContext}${contextBlock(contextText)}

The text should be:
- Professional and clear
- Grounded in the data provided
- Logically structured

IMPORTANT: write plain text only, without asterisks, hashes or other markdown symbols.
`;
}
