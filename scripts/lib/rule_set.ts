import fs from 'fs-extra';
import * as yaml from 'js-yaml';
import path from 'node:path';

import { getRecord, getString, isRecord, parseStructuredText, type StructuredRoot } from './front_matter.js';
import { readTextFile, toPosixRelative } from './io.js';

export const RULE_SET_FILE_NAME = 'content-rules.yaml';
export const SITE_CONFIG_FILE_NAMES = ['config.yaml', 'hugo.yaml'] as const;

export const DEFAULT_SPELL_CHECK_MODEL = 'gpt-4o-mini';
export const DEFAULT_SPELL_CHECK_MAX_TOKENS = 1024;
export const DEFAULT_SPELL_CHECK_PROMPT =
  'You proofread website content. Check the text below for spelling and grammar mistakes{language}. ' +
  "If there are none, answer exactly 'OK'. Otherwise list each mistake on its own line.";

export type HeaderKind = 'scalar' | 'list';

export interface HeaderRule {
  key: string;
  kind: HeaderKind;
}

export interface RequiredListRule {
  key: string;
  allowed: Map<string, Set<string>>;
}

export type LanguageStructureMode = 'off' | 'strict' | 'lenient';

export interface SpellCheckSettings {
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface RuleSet {
  filePath: string;
  defaultLanguage: string;
  languages: string[];
  ignoreFiles: Set<string>;
  requiredHeaders: HeaderRule[];
  requiredLists: RequiredListRule[];
  slugPattern: string | null;
  duplicateHeaders: string[];
  languageStructure: LanguageStructureMode;
  checkFileLanguage: boolean;
  spellCheck: SpellCheckSettings | null;
}

export interface SiteConfig {
  filePath: string;
  languageCode: string;
  title: string;
}

const KNOWN_KEYS = new Set([
  'default-language',
  'languages',
  'ignore-files',
  'required-headers',
  'required-lists',
  'slug-pattern',
  'check-header-duplicates',
  'check-language-structure',
  'check-file-language',
  'spell-check'
]);

const SPELL_CHECK_KEYS = new Set(['enabled', 'prompt', 'model', 'temperature', 'max-tokens']);

class RuleSetReader {
  constructor(
    private readonly root: StructuredRoot,
    private readonly filePath: string
  ) {}

  error(message: string): Error {
    return new Error(`${toPosixRelative(this.filePath)} ${message}`);
  }

  string(key: string, source: StructuredRoot = this.root): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw this.error(`key '${key}' must be a string`);
    }
    return String(value).trim();
  }

  boolean(key: string, fallback: boolean, source: StructuredRoot = this.root): boolean {
    const value = source[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      throw this.error(`key '${key}' must be true or false`);
    }
    return value;
  }

  number(key: string, fallback: number, source: StructuredRoot = this.root): number {
    const value = source[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw this.error(`key '${key}' must be a number`);
    }
    return value;
  }

  stringList(key: string, value: unknown = this.root[key]): string[] {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw this.error(`key '${key}' must be a list`);
    }

    return value.map((entry, index) => {
      if (typeof entry !== 'string' && typeof entry !== 'number') {
        throw this.error(`key '${key}' item ${index + 1} must be a string`);
      }
      return String(entry).trim();
    });
  }

  uniqueStringList(key: string): string[] {
    const values = this.stringList(key);
    const seen = new Set<string>();
    for (const value of values) {
      if (seen.has(value)) {
        throw this.error(`key '${key}' lists '${value}' more than once`);
      }
      seen.add(value);
    }
    return values;
  }

  mapping(key: string): StructuredRoot | null {
    const value = this.root[key];
    if (value === undefined || value === null) {
      return null;
    }
    const record = getRecord(this.root, key);
    if (!record) {
      throw this.error(`key '${key}' must be a mapping`);
    }
    return record;
  }
}

function readRequiredLists(reader: RuleSetReader): RequiredListRule[] {
  const section = reader.mapping('required-lists');
  if (!section) {
    return [];
  }

  const rules: RequiredListRule[] = [];
  for (const [key, scopes] of Object.entries(section)) {
    if (!isRecord(scopes)) {
      throw reader.error(`required-lists.${key} must map language codes to lists of values`);
    }

    const allowed = new Map<string, Set<string>>();
    for (const [language, items] of Object.entries(scopes)) {
      allowed.set(language, new Set(reader.stringList(`required-lists.${key}.${language}`, items)));
    }

    rules.push({ key, allowed });
  }

  return rules;
}

function readRequiredHeaders(reader: RuleSetReader, root: StructuredRoot, lists: RequiredListRule[]): HeaderRule[] {
  const value = root['required-headers'];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw reader.error("key 'required-headers' must be a list");
  }

  const listKeys = new Set(lists.map((rule) => rule.key));

  return value.map((entry, index): HeaderRule => {
    if (typeof entry === 'string') {
      const key = entry.trim();
      return { key, kind: listKeys.has(key) ? 'list' : 'scalar' };
    }

    if (isRecord(entry)) {
      const key = getString(entry, 'key').trim();
      const kind = getString(entry, 'kind').trim() || (listKeys.has(key) ? 'list' : 'scalar');
      if (!key) {
        throw reader.error(`required-headers item ${index + 1} is missing 'key'`);
      }
      if (kind !== 'scalar' && kind !== 'list') {
        throw reader.error(`required-headers.${key} has unsupported kind '${kind}'. Expected scalar|list`);
      }
      return { key, kind };
    }

    throw reader.error(`required-headers item ${index + 1} must be a key or a { key, kind } mapping`);
  });
}

function readLanguageStructure(reader: RuleSetReader, root: StructuredRoot): LanguageStructureMode {
  const value = root['check-language-structure'];
  if (value === undefined || value === null || value === false) {
    return 'off';
  }
  if (value === true) {
    return 'strict';
  }
  if (value === 'off' || value === 'strict' || value === 'lenient') {
    return value;
  }
  throw reader.error(
    `key 'check-language-structure' must be true, false, strict, lenient or off. Found '${String(value)}'`
  );
}

function readSpellCheck(reader: RuleSetReader): SpellCheckSettings | null {
  const section = reader.mapping('spell-check');
  if (!section) {
    return null;
  }

  for (const key of Object.keys(section)) {
    if (!SPELL_CHECK_KEYS.has(key)) {
      throw reader.error(`spell-check has unknown key '${key}'`);
    }
  }

  if (!reader.boolean('enabled', true, section)) {
    return null;
  }

  const maxTokens = reader.number('max-tokens', DEFAULT_SPELL_CHECK_MAX_TOKENS, section);
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw reader.error("spell-check.max-tokens must be a positive integer");
  }

  return {
    prompt: reader.string('prompt', section) || DEFAULT_SPELL_CHECK_PROMPT,
    model: reader.string('model', section) || DEFAULT_SPELL_CHECK_MODEL,
    temperature: reader.number('temperature', 0, section),
    maxTokens
  };
}

export function parseRuleSet(text: string, filePath: string): RuleSet {
  let root: StructuredRoot;
  try {
    root = parseStructuredText(text, yaml.CORE_SCHEMA);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${toPosixRelative(filePath)} is not valid YAML: ${message}`);
  }

  const reader = new RuleSetReader(root, filePath);

  for (const key of Object.keys(root)) {
    if (!KNOWN_KEYS.has(key)) {
      throw reader.error(`has unknown key '${key}'`);
    }
  }

  const defaultLanguage = reader.string('default-language');
  if (!defaultLanguage) {
    throw reader.error("is missing required key 'default-language'");
  }

  const languages = reader.uniqueStringList('languages');
  const requiredLists = readRequiredLists(reader);
  const slugPattern = reader.string('slug-pattern') || null;

  if (slugPattern) {
    try {
      new RegExp(slugPattern);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw reader.error(`slug-pattern '${slugPattern}' is not a valid regular expression: ${message}`);
    }
  }

  return {
    filePath,
    defaultLanguage,
    languages: languages.length > 0 ? languages : [defaultLanguage],
    ignoreFiles: new Set(reader.stringList('ignore-files')),
    requiredHeaders: readRequiredHeaders(reader, root, requiredLists),
    requiredLists,
    slugPattern,
    duplicateHeaders: reader.uniqueStringList('check-header-duplicates'),
    languageStructure: readLanguageStructure(reader, root),
    checkFileLanguage: reader.boolean('check-file-language', false),
    spellCheck: readSpellCheck(reader)
  };
}

export async function loadRuleSet(filePath: string): Promise<RuleSet> {
  const text = await readTextFile(filePath, 'Rule set file');
  return parseRuleSet(text, filePath);
}

export async function loadSiteConfig(siteFolder: string): Promise<SiteConfig> {
  for (const fileName of SITE_CONFIG_FILE_NAMES) {
    const filePath = path.join(siteFolder, fileName);
    if (!(await fs.pathExists(filePath))) {
      continue;
    }

    const text = await fs.readFile(filePath, 'utf8');
    let root: StructuredRoot;
    try {
      root = parseStructuredText(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`${toPosixRelative(filePath)} is not valid YAML: ${message}`);
    }

    return {
      filePath,
      languageCode: getString(root, 'languageCode').trim(),
      title: getString(root, 'title').trim()
    };
  }

  throw new Error(
    `Site configuration file '${SITE_CONFIG_FILE_NAMES.join("' or '")}' doesn't exist in '${toPosixRelative(siteFolder)}'`
  );
}
