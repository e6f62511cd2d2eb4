import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logReportComplete } from '../report-logging.js';
import { ModelTracker } from '../../library/llm/model-tracker.js';

describe('logReportComplete', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('names the primary model and the response count', () => {
    const tracker = new ModelTracker();
    tracker.trackCall('gpt-5.2');
    tracker.trackCall('gpt-5.2');

    logReportComplete(tracker, 2000);

    const [line] = vi.mocked(console.log).mock.calls[0];
    expect(line).toContain('Report ready');
    expect(line).toContain('2 AI response(s)');
    expect(line).toContain('gpt-5.2');
    expect(line).toContain('2s');
  });

  it('warns when no model answered', () => {
    logReportComplete(new ModelTracker(), 0);

    const [line] = vi.mocked(console.log).mock.calls[0];
    expect(line).toContain('no AI model answered');
  });
});
