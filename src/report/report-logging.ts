import type { ModelTracker } from '../library/llm/model-tracker.js';
import { theme, formatDuration } from '../library/ui.js';

export function logReportHeader(title: string, sectionCount: number): void {
  console.log('');
  console.log(theme.divider(title));
  console.log(`  ${theme.bullet} ${sectionCount} section(s) to generate`);
}

export function logReportComplete(tracker: ModelTracker, durationMs: number): void {
  const primary = tracker.getPrimaryModel();
  const status = primary ? `${theme.check} ${theme.success('Report ready')}` : `${theme.warn} Report ready`;
  console.log(
    `  ${status}` +
      theme.separator +
      `${tracker.getSuccessfulCallsCount()} AI response(s)` +
      theme.separator +
      (primary ? `primary model ${theme.bold(primary)}` : theme.warning('no AI model answered')) +
      theme.separator +
      theme.dim(formatDuration(durationMs))
  );
}

export function logSelectionFailed(message: string): void {
  console.error(`  ${theme.cross} ${theme.error('Model selection failed:')} ${message}`);
}

export function logContextFileSkipped(fileName: string, message: string): void {
  console.warn(`  ${theme.warn} Skipping context file ${fileName}: ${message}`);
}

export function logContextDirUnreadable(contextDir: string, message: string): void {
  console.warn(`  ${theme.warn} Cannot read context folder ${contextDir}: ${message}`);
}
