// Re-export types
export type {
  // LLM types
  Provider,
  Message,
  ResponseFragment,
  ProviderResponse,
  ChatClient,
  ClientOptions,
  ClientFactory,
  Candidate,
  Credentials,
  ModelConfig,
  CallRecord,
} from './library/llm/types.js';
export type {
  // Report types
  DataSummary,
  ChartDescriptor,
  ErrorPatternSummary,
  SectionRequest,
  AnalysisType,
  AnalysisContext,
  ReportPlan,
  ReportOptions,
  ReportResult,
  ContextSection,
} from './report/types.js';
export type { InvocationContext } from './library/llm/fallback.js';
export type { SelectModelOptions } from './library/llm/model-selector.js';
export type { FailureKind } from './library/llm/errors.js';
export type { ReportConfig } from './library/config.js';
export type { LoadContextOptions } from './report/context-loader.js';
export type { FormatTableOptions, TableCell, TableRow } from './report/table-formatter.js';

// Re-export the invocation layer
export { ModelTracker } from './library/llm/model-tracker.js';
export { toProviderResponse, normalizeResponse } from './library/llm/response-normalizer.js';
export { invokeWithTimeout } from './library/llm/bounded-invoker.js';
export { selectModel, buildCandidateList, inferProvider } from './library/llm/model-selector.js';
export { invokeLLMWithFallback, invokeWithFallback } from './library/llm/fallback.js';
export { createChatClient } from './library/llm/providers.js';
export { LLMTimeoutError, classifyFailure } from './library/llm/errors.js';
export { loadConfig } from './library/config.js';
export {
  DEFAULT_MODEL_ORDER,
  AI_NOT_CONFIGURED_MESSAGE,
  AI_UNAVAILABLE_MESSAGE,
} from './library/constants.js';

// Re-export report generation
export {
  analyzeDataSummary,
  generateChartCommentary,
  analyzeErrorPatterns,
  generateSectionText,
} from './report/analysis.js';
export { getContextForAnalysis, loadContextFiles } from './report/context-loader.js';
export { formatTable, formatSummaryRecord } from './report/table-formatter.js';
export { formatModelDisclosure } from './report/disclosure.js';
export { generateReport, writeReport } from './report/report.js';

// Main fieldreport namespace
import type { ReportOptions, ReportPlan, ReportResult } from './report/types.js';
import { generateReport as runReport, writeReport as saveReport } from './report/report.js';
import { ModelTracker as Tracker } from './library/llm/model-tracker.js';

/**
 * Main fieldreport namespace for fluent API.
 *
 * @example
 * ```ts
 * import { fieldreport } from 'fieldreport';
 *
 * const tracker = fieldreport.tracker();
 * const { markdown, primaryModel } = await fieldreport.generate(
 *   {
 *     title: 'Invoice field recognition: March',
 *     keyMetrics: { Records: 1200, 'Mean F1': 0.912 },
 *     charts: [
 *       {
 *         title: 'F1 by method',
 *         description: 'Bar chart of F1 score per recognition method',
 *         dataSummary: 'azure_model: 0.93\nquery-vat_number: 0.88',
 *         domain: 'document',
 *       },
 *     ],
 *   },
 *   { tracker }
 * );
 *
 * fieldreport.write('reports/march.md', markdown);
 * console.log(`Commentary written by ${primaryModel ?? 'no model'}`);
 * ```
 */
export const fieldreport = {
  /**
   * Generate every requested section and assemble the markdown report.
   */
  generate(plan: ReportPlan, options?: ReportOptions): Promise<ReportResult> {
    return runReport(plan, options);
  },

  /**
   * Write a generated report to disk. Returns false on failure.
   */
  write(filePath: string, markdown: string): boolean {
    return saveReport(filePath, markdown);
  },

  /**
   * Create a tracker to share across several reports.
   */
  tracker(): Tracker {
    return new Tracker();
  },
};

// Default export
export default fieldreport;
