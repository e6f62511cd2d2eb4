import type {
  AnalysisContext,
  AnalysisType,
  ChartDescriptor,
  DataSummary,
  ErrorPatternSummary,
  SectionRequest,
} from './types.js';
import type { ModelConfig } from '../library/llm/types.js';
import { selectModel } from '../library/llm/model-selector.js';
import { invokeLLMWithFallback } from '../library/llm/fallback.js';
import { errorMessage } from '../library/llm/errors.js';
import { logModelSelected, logNotConfigured } from '../library/llm/llm-logging.js';
import { loadConfig } from '../library/config.js';
import { AI_NOT_CONFIGURED_MESSAGE, AI_UNAVAILABLE_MESSAGE } from '../library/constants.js';
import { getContextForAnalysis } from './context-loader.js';
import {
  buildChartCommentaryPrompt,
  buildDataSummaryPrompt,
  buildErrorPatternsPrompt,
  buildSectionPrompt,
} from './prompts.js';
import { logSelectionFailed } from './report-logging.js';

function domainContext(
  context: AnalysisContext,
  type: AnalysisType,
  fieldName?: string
): Promise<string> {
  const contextDir = context.contextDir ?? loadConfig().contextDir;
  return getContextForAnalysis(type, fieldName, { contextDir });
}

/**
 * Resolve a model and run the prompt through the fallback chain.
 * Always resolves to displayable text.
 */
async function generate(prompt: string, context: AnalysisContext): Promise<string> {
  let config: ModelConfig | undefined;
  try {
    config = await selectModel({ ...context.selectOptions, createClient: context.createClient });
  } catch (error) {
    const message = errorMessage(error);
    logSelectionFailed(message);
    return `AI analysis unavailable (initialization error: ${message.slice(0, 100)}).`;
  }

  if (!config) {
    logNotConfigured();
    return AI_NOT_CONFIGURED_MESSAGE;
  }

  logModelSelected(config);
  const text = await invokeLLMWithFallback(config, prompt, context);
  return text ?? AI_UNAVAILABLE_MESSAGE;
}

export async function analyzeDataSummary(
  summary: DataSummary,
  context: AnalysisContext
): Promise<string> {
  const contextText = summary.methodDistribution
    ? await domainContext(context, 'data_summary', summary.fieldName)
    : '';
  return generate(buildDataSummaryPrompt(summary, contextText), context);
}

export async function generateChartCommentary(
  chart: ChartDescriptor,
  context: AnalysisContext
): Promise<string> {
  const contextText = await domainContext(context, 'chart_commentary', chart.fieldName);
  return generate(buildChartCommentaryPrompt(chart, contextText), context);
}

/**
 * Commentary on FP/FN patterns. Nothing is sent to a model when there are
 * no validated records.
 */
export async function analyzeErrorPatterns(
  errors: ErrorPatternSummary,
  context: AnalysisContext
): Promise<string> {
  if (errors.validatedCount === 0) {
    const field = errors.fieldName ? ` for field ${errors.fieldName}` : '';
    return `No validated data available${field} for error analysis.`;
  }
  const contextText = await domainContext(context, 'error_patterns', errors.fieldName);
  return generate(buildErrorPatternsPrompt(errors, contextText), context);
}

export async function generateSectionText(
  section: SectionRequest,
  context: AnalysisContext
): Promise<string> {
  const contextText = await domainContext(context, 'general');
  return generate(buildSectionPrompt(section, contextText), context);
}
