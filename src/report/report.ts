import * as fs from 'fs';
import * as path from 'path';
import { format } from 'date-fns';
import type { AnalysisContext, ReportOptions, ReportPlan, ReportResult } from './types.js';
import { ModelTracker } from '../library/llm/model-tracker.js';
import { createProgressTracker, spinner } from '../library/ui.js';
import { errorMessage } from '../library/llm/errors.js';
import {
  analyzeDataSummary,
  analyzeErrorPatterns,
  generateChartCommentary,
  generateSectionText,
} from './analysis.js';
import { formatSummaryRecord } from './table-formatter.js';
import { formatModelDisclosure } from './disclosure.js';
import { logReportComplete, logReportHeader } from './report-logging.js';

interface SectionTask {
  heading: string;
  run: (context: AnalysisContext) => Promise<string>;
}

function planTasks(plan: ReportPlan): SectionTask[] {
  const tasks: SectionTask[] = [];

  if (plan.dataSummary) {
    const summary = plan.dataSummary;
    tasks.push({ heading: 'Data overview', run: (ctx) => analyzeDataSummary(summary, ctx) });
  }
  for (const chart of plan.charts ?? []) {
    tasks.push({
      heading: chart.title ?? chart.description,
      run: (ctx) => generateChartCommentary(chart, ctx),
    });
  }
  for (const errors of plan.errorPatterns ?? []) {
    tasks.push({
      heading: errors.fieldName ? `Error patterns: ${errors.fieldName}` : 'Error patterns',
      run: (ctx) => analyzeErrorPatterns(errors, ctx),
    });
  }
  for (const section of plan.sections ?? []) {
    tasks.push({ heading: section.topic, run: (ctx) => generateSectionText(section, ctx) });
  }

  return tasks;
}

/**
 * Generate every requested section in order and assemble the markdown report.
 *
 * All sections share one tracker, so the closing disclosure reflects the
 * whole run. Pass `tracker` to aggregate across several reports.
 */
export async function generateReport(
  plan: ReportPlan,
  options: ReportOptions = {}
): Promise<ReportResult> {
  if (!plan.title || plan.title.trim() === '') {
    throw new Error('title is required');
  }
  const tasks = planTasks(plan);
  if (tasks.length === 0) {
    throw new Error('report plan has no sections');
  }

  const { now = new Date(), ...contextOptions } = options;
  const tracker = options.tracker ?? new ModelTracker();
  const context: AnalysisContext = { ...contextOptions, tracker };
  const startTime = Date.now();

  logReportHeader(plan.title, tasks.length);
  const progress = createProgressTracker('sections');
  progress.start(tasks.length);

  const blocks: string[] = [];
  for (const [index, task] of tasks.entries()) {
    const body = await task.run(context);
    blocks.push(`## ${task.heading}\n\n${body.trim()}`);
    progress.update(index + 1);
  }
  progress.stop();

  const parts = [`# ${plan.title}`, `*Generated on ${format(now, 'd MMMM yyyy, HH:mm')}*`];
  if (plan.keyMetrics) {
    parts.push(formatSummaryRecord(plan.keyMetrics, 'Key metrics'));
  }
  parts.push(...blocks, `## About this report\n\n${formatModelDisclosure(tracker)}`);

  logReportComplete(tracker, Date.now() - startTime);

  return {
    markdown: `${parts.join('\n\n')}\n`,
    usage: tracker.getUsageStats(),
    primaryModel: tracker.getPrimaryModel(),
  };
}

/**
 * Write a report to disk, creating parent folders. Failures are logged and
 * reported through the return value.
 */
export function writeReport(filePath: string, markdown: string): boolean {
  spinner.start(`Writing ${filePath}`);
  try {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, markdown, 'utf-8');
    spinner.succeed(`Report written to ${filePath}`);
    return true;
  } catch (error) {
    spinner.fail(`Failed to write report to ${filePath}`);
    console.error(`Failed to write report to ${filePath}:`, errorMessage(error));
    return false;
  }
}
