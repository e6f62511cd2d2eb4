import * as fs from 'fs';
import * as path from 'path';
import type { AnalysisType, ContextSection } from './types.js';
import { DEFAULT_CONTEXT_DIR } from '../library/constants.js';
import { errorMessage } from '../library/llm/errors.js';
import { logContextDirUnreadable, logContextFileSkipped } from './report-logging.js';

const TITLE_PATTERN = /^(#{1,6}\s+.+?)$|^([A-Z][A-Z\s]{3,})$/;
const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];
const PDF_EXTENSION = '.pdf';
const DEFAULT_MAX_SECTIONS = 5;
const TITLE_MATCH_SCORE = 3;

const ANALYSIS_KEYWORDS: Record<AnalysisType, readonly string[]> = {
  data_summary: ['dictionary', 'data', 'field', 'column', 'dataset', 'terminology', 'system'],
  error_patterns: ['error', 'pattern', 'validation', 'comparison', 'fp', 'fn', 'tp', 'tn'],
  chart_commentary: ['method', 'performance', 'metrics', 'precision', 'recall', 'accuracy', 'f1', 'chart'],
  general: [],
};

export interface LoadContextOptions {
  contextDir?: string;
  keywords?: string[];
  maxSectionsPerFile?: number;
}

/**
 * Split a document on markdown headings and all-caps title lines.
 * Sections whose body is shorter than `minSectionLength` are dropped.
 */
export function splitIntoSections(text: string, minSectionLength = 100): ContextSection[] {
  const sections: ContextSection[] = [];
  let title = 'Introduction';
  let lines: string[] = [];

  const flush = () => {
    const body = lines.join('\n');
    if (body.length >= minSectionLength) {
      sections.push({ title, content: body.trim() });
    }
  };

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (TITLE_PATTERN.test(trimmed)) {
      flush();
      title = trimmed.replace(/^#+/, '').trim();
      lines = [];
    } else {
      lines.push(line);
    }
  }
  flush();

  return sections;
}

function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') return 0;
  return haystack.split(needle).length - 1;
}

/**
 * Rank sections by keyword hits (title hits weigh more).
 * Without any hit the first sections are returned unranked.
 */
export function findRelevantSections(
  sections: ContextSection[],
  keywords: string[],
  maxSections = DEFAULT_MAX_SECTIONS
): ContextSection[] {
  if (keywords.length === 0) return sections.slice(0, maxSections);

  const lowered = keywords.map((k) => k.toLowerCase());
  const relevant = sections
    .map((section) => {
      const title = section.title.toLowerCase();
      const text = `${title} ${section.content.toLowerCase()}`;
      let score = 0;
      for (const keyword of lowered) {
        if (title.includes(keyword)) score += TITLE_MATCH_SCORE;
        score += countOccurrences(text, keyword);
      }
      return { score, section };
    })
    .filter((scored) => scored.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((scored) => scored.section);

  return relevant.length > 0 ? relevant.slice(0, maxSections) : sections.slice(0, maxSections);
}

type PdfParser = (data: Buffer) => Promise<{ text: string }>;

let pdfParser: Promise<PdfParser | undefined> | undefined;

// pdf-parse is optional: without it PDF context files are skipped
function loadPdfParser(): Promise<PdfParser | undefined> {
  pdfParser ??= import('pdf-parse').then(
    (module) => module.default,
    () => undefined
  );
  return pdfParser;
}

interface ContextDocument {
  fileType: 'Markdown' | 'PDF';
  text: string;
}

async function readContextDocument(filePath: string): Promise<ContextDocument | undefined> {
  const extension = path.extname(filePath).toLowerCase();
  if (MARKDOWN_EXTENSIONS.includes(extension)) {
    return { fileType: 'Markdown', text: fs.readFileSync(filePath, 'utf-8') };
  }
  if (extension === PDF_EXTENSION) {
    const parse = await loadPdfParser();
    if (!parse) return undefined;
    const { text } = await parse(fs.readFileSync(filePath));
    return { fileType: 'PDF', text };
  }
  return undefined;
}

function listContextDir(contextDir: string): string[] {
  try {
    return fs.readdirSync(contextDir).sort();
  } catch (error) {
    logContextDirUnreadable(contextDir, errorMessage(error));
    return [];
  }
}

/**
 * Load markdown and PDF files from the context folder as one prompt-ready
 * block. Missing or unreadable folder → empty string; unreadable files are
 * skipped.
 */
export async function loadContextFiles(options: LoadContextOptions = {}): Promise<string> {
  const {
    contextDir = DEFAULT_CONTEXT_DIR,
    keywords = [],
    maxSectionsPerFile = DEFAULT_MAX_SECTIONS,
  } = options;

  if (!fs.existsSync(contextDir)) return '';

  const parts: string[] = [];
  for (const fileName of listContextDir(contextDir)) {
    if (fileName.startsWith('.') || fileName.toLowerCase() === 'readme.md') continue;

    const filePath = path.join(contextDir, fileName);
    try {
      if (!fs.statSync(filePath).isFile()) continue;

      const document = await readContextDocument(filePath);
      if (!document) continue;

      const sections = splitIntoSections(document.text);
      const relevant =
        keywords.length > 0
          ? findRelevantSections(sections, keywords, maxSectionsPerFile)
          : sections.slice(0, maxSectionsPerFile);
      if (relevant.length === 0) continue;

      parts.push(`\n=== CONTEXT FROM ${document.fileType}: ${fileName} ===\n`);
      for (const section of relevant) {
        parts.push(`\n## ${section.title}\n`, section.content, '\n');
      }
    } catch (error) {
      logContextFileSkipped(fileName, errorMessage(error));
    }
  }

  return parts.join('\n');
}

/**
 * Context relevant to one kind of analysis, optionally focused on a field.
 */
export function getContextForAnalysis(
  analysisType: AnalysisType = 'general',
  fieldName?: string,
  options: Omit<LoadContextOptions, 'keywords'> = {}
): Promise<string> {
  const keywords = [...ANALYSIS_KEYWORDS[analysisType]];
  if (fieldName) {
    keywords.push(fieldName.toLowerCase(), 'field');
  }
  return loadContextFiles({ ...options, keywords });
}
