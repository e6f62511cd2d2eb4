import type { ModelTracker } from '../library/llm/model-tracker.js';

/**
 * Closing note naming the model(s) that actually wrote the commentary.
 */
export function formatModelDisclosure(tracker: ModelTracker): string {
  const primary = tracker.getPrimaryModel();
  if (!primary) {
    return '*No AI model was used to generate the commentary in this report.*';
  }

  const lines = [`The AI commentary in this report was generated by **${primary}**.`];
  const usage = Object.entries(tracker.getUsageStats());
  if (usage.length > 1) {
    lines.push('', 'Models used:');
    for (const [model, count] of usage) {
      lines.push(`- ${model}: ${count} ${count === 1 ? 'response' : 'responses'}`);
    }
  }
  return lines.join('\n');
}
