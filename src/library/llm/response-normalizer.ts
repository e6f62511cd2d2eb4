import type { ProviderResponse, ResponseFragment } from './types.js';

// Tried in order when `content` is missing
const ALTERNATIVE_TEXT_FIELDS = ['output_text', 'refusal'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFragment(value: unknown): ResponseFragment | undefined {
  if (typeof value === 'string') return value;
  if (!isRecord(value)) return undefined;
  const fragment: { type?: string; text?: string } = {};
  if (typeof value.type === 'string') fragment.type = value.type;
  if (typeof value.text === 'string') fragment.text = value.text;
  return fragment;
}

function toFragments(values: readonly unknown[]): ResponseFragment[] {
  return values
    .map(toFragment)
    .filter((fragment): fragment is ResponseFragment => fragment !== undefined);
}

/**
 * Classify a raw provider payload into a ProviderResponse.
 * Adapters call this once; everything downstream works on the union.
 */
export function toProviderResponse(raw: unknown): ProviderResponse {
  if (Array.isArray(raw)) return { kind: 'fragments', fragments: toFragments(raw) };
  if (typeof raw === 'string') return { kind: 'text', text: raw };
  if (!isRecord(raw)) return { kind: 'unknown', value: raw };

  // Getters (e.g. SDK response classes) are read through normal access
  const text: unknown = raw.text;
  if (typeof text === 'string') return { kind: 'text', text };
  if (Array.isArray(text)) return { kind: 'fragments', fragments: toFragments(text) };

  const content: unknown = raw.content;
  if (typeof content === 'string') return { kind: 'text', text: content };
  if (Array.isArray(content)) return { kind: 'fragments', fragments: toFragments(content) };

  if (content === null || content === undefined) {
    for (const field of ALTERNATIVE_TEXT_FIELDS) {
      const alternative: unknown = raw[field];
      if (typeof alternative === 'string') return { kind: 'text', text: alternative };
    }
    return { kind: 'unknown', value: raw };
  }

  return { kind: 'unknown', value: content };
}

/**
 * Join fragments with single spaces. Non-text typed fragments are skipped.
 */
export function joinFragments(fragments: readonly ResponseFragment[]): string {
  const parts: string[] = [];
  for (const fragment of fragments) {
    if (typeof fragment === 'string') {
      parts.push(fragment);
    } else if (
      (fragment.type === undefined || fragment.type === 'text') &&
      fragment.text !== undefined
    ) {
      parts.push(fragment.text);
    }
  }
  return parts.join(' ');
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular structures, BigInt
    return String(value);
  }
}

/**
 * Plain text from any provider response. Never throws.
 */
export function normalizeResponse(response: ProviderResponse): string {
  switch (response.kind) {
    case 'text':
      return response.text;
    case 'fragments':
      return joinFragments(response.fragments);
    case 'unknown':
      return stringify(response.value);
  }
}
