import fs from 'fs-extra';
import path from 'node:path';
import type { TokensList } from 'marked';

import { parseBody, parseStructuredText, splitFrontMatter, type StructuredRoot } from './front_matter.js';
import { listMarkdownFiles, toPosixRelative } from './io.js';
import { validateLanguage } from './language.js';
import { fail, succeed, type Outcome } from './outcome.js';
import type { Reporter } from './reporter.js';
import type { RuleSet } from './rule_set.js';

export const MARKDOWN_EXTENSION = '.md';

export interface LanguageVariant {
  language: string;
  filePath: string;
  header: string;
  data: StructuredRoot;
  body: string;
  tokens: TokensList;
}

export interface ContentDocument {
  rootPath: string;
  variants: Map<string, LanguageVariant>;
}

export interface Folder {
  path: string;
  ruleSet: RuleSet;
  documents: Map<string, ContentDocument>;
}

export interface ResolvedFile {
  filePath: string;
  language: string;
  rootPath: string;
}

function baseNameSegments(filePath: string): string[] {
  return path.basename(filePath, path.extname(filePath)).split('.');
}

export function isIgnoredFile(filePath: string, ruleSet: Pick<RuleSet, 'ignoreFiles'>): boolean {
  return ruleSet.ignoreFiles.has(path.basename(filePath));
}

/**
 * `guide.fr.md` is French, `guide.md` is in the default language. The code must
 * be one of the folder's languages.
 */
export function fileLanguage(
  filePath: string,
  ruleSet: Pick<RuleSet, 'defaultLanguage' | 'languages'>
): Outcome<string> {
  const segments = baseNameSegments(filePath);
  const language = segments.length === 1 ? ruleSet.defaultLanguage : segments[segments.length - 1];

  const valid = validateLanguage(language, ruleSet);
  if (!valid.ok) {
    return fail(
      `File '${toPosixRelative(filePath)}' has an invalid language. Expected ${ruleSet.languages.join(', ')}`,
      valid.error
    );
  }

  return succeed(language);
}

/**
 * Path the document would have in the default language; every translation of
 * one page shares it, whether or not that file exists.
 */
export function rootFilePath(
  filePath: string,
  ruleSet: Pick<RuleSet, 'defaultLanguage' | 'languages'>
): Outcome<string> {
  const absolute = path.resolve(filePath);
  const language = fileLanguage(absolute, ruleSet);
  if (!language.ok) {
    return language;
  }

  if (language.value === ruleSet.defaultLanguage) {
    return succeed(absolute);
  }

  const segments = baseNameSegments(absolute);
  const rootName = `${segments.slice(0, -1).join('.')}${MARKDOWN_EXTENSION}`;
  return succeed(path.join(path.dirname(absolute), rootName));
}

export function resolveFile(
  filePath: string,
  ruleSet: Pick<RuleSet, 'defaultLanguage' | 'languages'>
): Outcome<ResolvedFile> {
  const absolute = path.resolve(filePath);

  const language = fileLanguage(absolute, ruleSet);
  if (!language.ok) {
    return language;
  }

  const rootPath = rootFilePath(absolute, ruleSet);
  if (!rootPath.ok) {
    return rootPath;
  }

  return succeed({ filePath: absolute, language: language.value, rootPath: rootPath.value });
}

export function parseLanguageVariant(text: string, resolved: ResolvedFile): Outcome<LanguageVariant> {
  const label = toPosixRelative(resolved.filePath);

  let parts: { header: string; body: string };
  try {
    parts = splitFrontMatter(text);
  } catch (error) {
    return fail(`File '${label}' has no front matter`, error);
  }

  let data: StructuredRoot;
  try {
    data = parseStructuredText(parts.header);
  } catch (error) {
    return fail(`File '${label}' has invalid front matter`, error);
  }

  return succeed({
    language: resolved.language,
    filePath: resolved.filePath,
    header: parts.header,
    data,
    body: parts.body,
    tokens: parseBody(parts.body)
  });
}

export async function readLanguageVariant(resolved: ResolvedFile): Promise<Outcome<LanguageVariant>> {
  const text = await fs.readFile(resolved.filePath, 'utf8');
  return parseLanguageVariant(text, resolved);
}

/** Adds a variant; a second file for the same root and language replaces the first. */
export function addVariant(
  documents: Map<string, ContentDocument>,
  rootPath: string,
  variant: LanguageVariant,
  reporter: Reporter
): void {
  let document = documents.get(rootPath);
  if (!document) {
    document = { rootPath, variants: new Map() };
    documents.set(rootPath, document);
  }

  const previous = document.variants.get(variant.language);
  if (previous) {
    reporter.warn(
      `Files '${toPosixRelative(previous.filePath)}' and '${toPosixRelative(variant.filePath)}' are both ` +
        `language '${variant.language}' of '${toPosixRelative(rootPath)}'; using the latter`
    );
  }

  document.variants.set(variant.language, variant);
}

export async function buildFolder(
  folderPath: string,
  ruleSet: RuleSet,
  reporter: Reporter
): Promise<Outcome<Folder>> {
  const folder: Folder = { path: path.resolve(folderPath), ruleSet, documents: new Map() };

  reporter.info(`Loading markdown files from '${toPosixRelative(folder.path)}'`);

  const files = await listMarkdownFiles(folder.path);
  let loaded = 0;

  for (const filePath of files) {
    if (isIgnoredFile(filePath, ruleSet)) {
      reporter.warn(`Ignore file '${toPosixRelative(filePath)}'`);
      continue;
    }

    const resolved = resolveFile(filePath, ruleSet);
    if (!resolved.ok) {
      return resolved;
    }

    const variant = await readLanguageVariant(resolved.value);
    if (!variant.ok) {
      return variant;
    }

    addVariant(folder.documents, resolved.value.rootPath, variant.value, reporter);
    loaded += 1;
  }

  reporter.info(`Markdown files in '${toPosixRelative(folder.path)}': ${loaded} (${folder.documents.size} document(s))`);
  return succeed(folder);
}
