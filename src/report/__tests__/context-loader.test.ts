import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  findRelevantSections,
  getContextForAnalysis,
  loadContextFiles,
  splitIntoSections,
} from '../context-loader.js';
import type { ContextSection } from '../types.js';

const METRICS_BODY = 'Precision and recall by method.'.repeat(4);
const ERRORS_BODY = 'Validation errors are grouped by pattern. '.repeat(4).trim();
const OFFICE_BODY = 'Office hours are nine to five on weekdays. '.repeat(4).trim();

describe('splitIntoSections', () => {
  it('splits on markdown headings and upper-case title lines', () => {
    const sections = splitIntoSections('Preamble\n## Data\nbody one\nFIELD NAMES\nbody two', 0);

    expect(sections).toEqual([
      { title: 'Introduction', content: 'Preamble' },
      { title: 'Data', content: 'body one' },
      { title: 'FIELD NAMES', content: 'body two' },
    ]);
  });

  it('drops sections shorter than the minimum', () => {
    const long = 'x'.repeat(120);
    const sections = splitIntoSections(`# Short\nbrief\n# Long\n${long}`);

    expect(sections).toEqual([{ title: 'Long', content: long }]);
  });
});

describe('findRelevantSections', () => {
  const sections: ContextSection[] = [
    { title: 'Overview', content: 'general notes' },
    { title: 'Validation', content: 'pattern' },
    { title: 'Error codes', content: 'error error pattern' },
    { title: 'Misc', content: 'nothing' },
  ];

  it('ranks by keyword hits, weighting titles', () => {
    const relevant = findRelevantSections(sections, ['error', 'pattern']);

    expect(relevant.map((s) => s.title)).toEqual(['Error codes', 'Validation']);
  });

  it('caps the result', () => {
    expect(findRelevantSections(sections, ['error', 'pattern'], 1).map((s) => s.title)).toEqual([
      'Error codes',
    ]);
  });

  it('falls back to the first sections without any hit', () => {
    expect(findRelevantSections(sections, ['invoice'], 2).map((s) => s.title)).toEqual([
      'Overview',
      'Validation',
    ]);
  });

  it('returns the first sections without keywords', () => {
    expect(findRelevantSections(sections, [], 1).map((s) => s.title)).toEqual(['Overview']);
  });
});

describe('loadContextFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fieldreport-context-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('returns an empty string for a missing folder', async () => {
    expect(await loadContextFiles({ contextDir: path.join(dir, 'missing') })).toBe('');
  });

  it('formats each file as a titled block', async () => {
    fs.writeFileSync(path.join(dir, 'metrics.md'), `# Metrics\n${METRICS_BODY}`);

    expect(await loadContextFiles({ contextDir: dir })).toBe(
      `\n=== CONTEXT FROM Markdown: metrics.md ===\n\n\n## Metrics\n\n${METRICS_BODY}\n\n`
    );
  });

  it('reads markdown files in name order and skips the rest', async () => {
    fs.writeFileSync(path.join(dir, 'b.md'), `# Second\n${METRICS_BODY}`);
    fs.writeFileSync(path.join(dir, 'a.markdown'), `# First\n${METRICS_BODY}`);
    fs.writeFileSync(path.join(dir, 'README.md'), `# Readme\n${METRICS_BODY}`);
    fs.writeFileSync(path.join(dir, '.draft.md'), `# Draft\n${METRICS_BODY}`);
    fs.writeFileSync(path.join(dir, 'notes.txt'), `# Notes\n${METRICS_BODY}`);

    const text = await loadContextFiles({ contextDir: dir });

    expect(text.indexOf('## First')).toBeGreaterThan(-1);
    expect(text.indexOf('## First')).toBeLessThan(text.indexOf('## Second'));
    expect(text).not.toContain('## Readme');
    expect(text).not.toContain('## Draft');
    expect(text).not.toContain('## Notes');
  });

  it('returns an empty string when the folder cannot be listed', async () => {
    const notADir = path.join(dir, 'context.md');
    fs.writeFileSync(notADir, `# Metrics\n${METRICS_BODY}`);

    expect(await loadContextFiles({ contextDir: notADir })).toBe('');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('skips files with no section long enough', async () => {
    fs.writeFileSync(path.join(dir, 'tiny.md'), '# Tiny\nshort');

    expect(await loadContextFiles({ contextDir: dir })).toBe('');
  });
});

describe('getContextForAnalysis', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fieldreport-context-'));
    fs.writeFileSync(
      path.join(dir, 'guide.md'),
      `# Office\n${OFFICE_BODY}\n# Error handling\n${ERRORS_BODY}`
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('keeps only sections relevant to the analysis type', async () => {
    const text = await getContextForAnalysis('error_patterns', undefined, { contextDir: dir });

    expect(text).toContain(`## Error handling\n\n${ERRORS_BODY}`);
    expect(text).not.toContain('## Office');
  });

  it('keeps every section for general analysis', async () => {
    const text = await getContextForAnalysis('general', undefined, { contextDir: dir });

    expect(text).toContain('## Office');
    expect(text).toContain('## Error handling');
  });
});
