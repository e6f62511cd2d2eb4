import type { InvocationContext } from '../library/llm/fallback.js';
import type { SelectModelOptions } from '../library/llm/model-selector.js';

// ═══════════════════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Pre-computed description of a recognition dataset.
 * The method/field fields switch the prompt to the recognition-data variant.
 */
export interface DataSummary {
  rowCount: number;
  columns: string[];
  statistics: string;  // rendered descriptive statistics
  validatedCount?: number;
  methodDistribution?: Record<string, number>;
  fieldName?: string;
  fieldRecordCount?: number;
  fieldValidatedCount?: number;
  fieldDistribution?: Record<string, number>;
}

export interface ChartDescriptor {
  title?: string;
  description: string;
  dataSummary: string;
  domain?: 'document' | 'general';  // Default: 'general'
  fieldName?: string;
}

/**
 * False positive / false negative counts over validated records.
 */
export interface ErrorPatternSummary {
  fieldName?: string;
  validatedCount: number;
  falsePositivesByMethod: Record<string, number>;
  falseNegativesByMethod: Record<string, number>;
  fpAverageConfidence?: number;
  fnAverageConfidence?: number;
}

export interface SectionRequest {
  topic: string;
  dataContext: string;
}

export type AnalysisType = 'data_summary' | 'error_patterns' | 'chart_commentary' | 'general';

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Everything a section generator needs. The tracker is shared across all
 * sections of a report so the disclosure covers the whole run.
 */
export interface AnalysisContext extends InvocationContext {
  selectOptions?: Omit<SelectModelOptions, 'createClient'>;
  /** Domain documentation folder. Default: CONTEXT_DIR or ./context */
  contextDir?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════════════════

export interface ReportPlan {
  title: string;
  keyMetrics?: Record<string, string | number>;
  dataSummary?: DataSummary;
  charts?: ChartDescriptor[];
  errorPatterns?: ErrorPatternSummary[];
  sections?: SectionRequest[];
}

export interface ReportOptions extends Partial<AnalysisContext> {
  /** Generation timestamp shown in the report. Default: now */
  now?: Date;
}

export interface ReportResult {
  markdown: string;
  usage: Record<string, number>;
  primaryModel?: string;
}

export interface ContextSection {
  title: string;
  content: string;
}
