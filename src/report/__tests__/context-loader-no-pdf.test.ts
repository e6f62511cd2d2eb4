import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadContextFiles } from '../context-loader.js';

// pdf-parse not installed
vi.mock('pdf-parse', () => {
  throw new Error("Cannot find module 'pdf-parse'");
});

const BODY = 'Validated fields are compared after normalisation.'.repeat(3);

describe('loadContextFiles without pdf-parse', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fieldreport-no-pdf-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('skips PDF files silently', async () => {
    fs.writeFileSync(path.join(dir, 'manual.pdf'), 'pdf bytes');
    fs.writeFileSync(path.join(dir, 'notes.md'), `# Notes\n${BODY}`);

    const text = await loadContextFiles({ contextDir: dir });

    expect(text).toBe(`\n=== CONTEXT FROM Markdown: notes.md ===\n\n\n## Notes\n\n${BODY}\n\n`);
    expect(console.warn).not.toHaveBeenCalled();
  });
});
