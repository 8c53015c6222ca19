import * as yaml from 'js-yaml';
import { marked, type Token, type TokensList } from 'marked';

export type StructuredRoot = Record<string, unknown>;

export interface MarkdownParts {
  header: string;
  body: string;
}

const FENCE_PATTERN = /^---\s*$/;

export function isRecord(value: unknown): value is StructuredRoot {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function scalarToString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return '';
}

/**
 * Splits a Markdown file into its `---` fenced front matter and the trimmed body.
 * The opening fence must be the first non-blank line.
 */
export function splitFrontMatter(text: string): MarkdownParts {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  let start = 0;
  while (start < lines.length && lines[start].trim() === '') {
    start += 1;
  }

  if (start >= lines.length || !FENCE_PATTERN.test(lines[start])) {
    throw new Error("Opening '---' of the front matter not found");
  }

  let end = -1;
  for (let i = start + 1; i < lines.length; i += 1) {
    if (FENCE_PATTERN.test(lines[i])) {
      end = i;
      break;
    }
  }

  if (end === -1) {
    throw new Error("Closing '---' of the front matter not found");
  }

  return {
    header: lines.slice(start + 1, end).join('\n').trim(),
    body: lines.slice(end + 1).join('\n').trim()
  };
}

/**
 * Front matter is read with the failsafe schema so every scalar keeps the text
 * the author wrote (`1.10`, `007`, `2024-01-31`). Rule sets pass the core schema
 * for their booleans and numbers.
 */
export function parseStructuredText(text: string, schema: yaml.Schema = yaml.FAILSAFE_SCHEMA): StructuredRoot {
  const parsed = yaml.load(text, { schema });

  if (parsed === undefined || parsed === null) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new Error('Structured text must be a mapping of keys to values');
  }

  return parsed;
}

export function contains(root: StructuredRoot, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(root, key) && root[key] !== undefined && root[key] !== null;
}

export function getString(root: StructuredRoot, key: string): string {
  if (!contains(root, key)) {
    return '';
  }
  return scalarToString(root[key]);
}

/** Scalars as written; lists and mappings in their JSON form. */
export function getComparable(root: StructuredRoot, key: string): string {
  if (!contains(root, key)) {
    return '';
  }
  const value = root[key];
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function getList(root: StructuredRoot, key: string): string[] {
  if (!contains(root, key)) {
    return [];
  }

  const value = root[key];
  if (!Array.isArray(value)) {
    return [];
  }

  return value.map((item) => scalarToString(item)).filter((item) => item.length > 0);
}

export function getRecord(root: StructuredRoot, key: string): StructuredRoot | null {
  const value = root[key];
  return isRecord(value) ? value : null;
}

export function parseBody(body: string): TokensList {
  return marked.lexer(body);
}

/** Prose of a parsed body: text runs only, code blocks and raw HTML left out. */
export function bodyProse(tokens: TokensList | Token[]): string {
  const parts: string[] = [];

  marked.walkTokens(tokens, (token) => {
    if (token.type !== 'text') {
      return;
    }
    const children: unknown = 'tokens' in token ? token.tokens : undefined;
    if (Array.isArray(children) && children.length > 0) {
      return;
    }
    parts.push(String(token.raw).trim());
  });

  return parts.filter((part) => part.length > 0).join(' ');
}
