import { bodyProse, contains, getComparable, getList, getString } from './front_matter.js';
import type { ContentDocument, Folder, LanguageVariant } from './file_resolution.js';
import { toPosixRelative } from './io.js';
import { twoLetterLanguage, validateLanguage } from './language.js';
import type { LanguageDetector } from './language_detection.js';
import { fail, succeed, type Outcome } from './outcome.js';
import type { Reporter } from './reporter.js';
import { RULE_SET_FILE_NAME, type RuleSet, type SiteConfig } from './rule_set.js';
import type { SpellChecker, SpellCheckResult } from './spell_check.js';

export interface EngineServices {
  reporter: Reporter;
  languageDetector: LanguageDetector;
  spellChecker: SpellChecker;
  spellCheckApiKey?: string;
}

/**
 * First file seen for each tracked header value. One table per folder run;
 * nothing outside `validateFolderContent` holds on to it.
 */
export class DuplicateTable {
  private readonly seen = new Map<string, Map<string, string>>();

  record(key: string, value: string, filePath: string): Outcome {
    let values = this.seen.get(key);
    if (!values) {
      values = new Map();
      this.seen.set(key, values);
    }

    const first = values.get(value);
    if (first !== undefined && first !== filePath) {
      return fail(
        `Detected duplicates ${key}: '${value}' in two files '${toPosixRelative(first)}' and '${toPosixRelative(filePath)}'`
      );
    }

    values.set(value, filePath);
    return succeed();
  }
}

function label(variant: LanguageVariant): string {
  return toPosixRelative(variant.filePath);
}

function validateLanguageConfiguration(ruleSet: RuleSet, site: SiteConfig | null, reporter: Reporter): Outcome {
  if (ruleSet.languages.length === 0) {
    return fail(`Languages are not defined in the ${RULE_SET_FILE_NAME} file`);
  }

  if (site) {
    reporter.info(`Site language code in '${toPosixRelative(site.filePath)}': ${site.languageCode}`);
    const siteLanguage = validateLanguage(site.languageCode, ruleSet);
    if (!siteLanguage.ok) {
      return fail(`Site language code in '${toPosixRelative(site.filePath)}' is invalid`, siteLanguage.error);
    }
  }

  reporter.info(`Default language used for primary files *.md: '${ruleSet.defaultLanguage}'`);
  const defaultLanguage = validateLanguage(ruleSet.defaultLanguage, ruleSet);
  if (!defaultLanguage.ok) {
    return fail(`Default language in '${toPosixRelative(ruleSet.filePath)}' is invalid`, defaultLanguage.error);
  }

  reporter.info(`All used languages: ${ruleSet.languages.join(', ')}`);
  for (const language of ruleSet.languages) {
    const valid = validateLanguage(language, ruleSet);
    if (!valid.ok) {
      return valid;
    }
  }

  for (const list of ruleSet.requiredLists) {
    for (const language of ruleSet.languages) {
      if (!list.allowed.has(language)) {
        return fail(`Undefined language in the key required-lists.${list.key}: ${language}. Check the languages key`);
      }
    }

    for (const language of list.allowed.keys()) {
      if (!ruleSet.languages.includes(language)) {
        return fail(`Undefined language in the key required-lists.${list.key}: ${language}. Check the languages key`);
      }
    }
  }

  reporter.info('All languages are valid');
  return succeed();
}

function validateDocumentLanguages(folder: Folder, document: ContentDocument, reporter: Reporter): Outcome {
  const { ruleSet } = folder;

  for (const language of ruleSet.languages) {
    if (document.variants.has(language)) {
      continue;
    }

    const message = `File '${toPosixRelative(document.rootPath)}' doesn't have language '*.${language}.md'`;
    if (ruleSet.languageStructure === 'strict') {
      return fail(message);
    }
    reporter.warn(message);
  }

  return succeed();
}

/** Folder-level structure: languages of the rule set and completeness of every document. */
export function validateFolder(folder: Folder, site: SiteConfig | null, reporter: Reporter): Outcome {
  reporter.info(`Folder '${toPosixRelative(folder.path)}'`);

  if (folder.documents.size === 0) {
    reporter.warn(`Folder '${toPosixRelative(folder.path)}' doesn't have any markdown files`);
  }

  if (folder.ruleSet.languageStructure === 'off') {
    return succeed();
  }

  const languages = validateLanguageConfiguration(folder.ruleSet, site, reporter);
  if (!languages.ok) {
    return languages;
  }

  for (const document of folder.documents.values()) {
    reporter.info(
      `File '${toPosixRelative(document.rootPath)}' found languages ${[...document.variants.keys()].join(', ')}`
    );

    const complete = validateDocumentLanguages(folder, document, reporter);
    if (!complete.ok) {
      return complete;
    }
  }

  return succeed();
}

export function checkRequiredHeaders(ruleSet: RuleSet, variant: LanguageVariant): Outcome {
  for (const header of ruleSet.requiredHeaders) {
    if (header.kind === 'list') {
      if (getList(variant.data, header.key).length === 0) {
        return fail(`There is no required header key '${header.key}' (list) in the file '${label(variant)}'`);
      }
      continue;
    }

    if (getString(variant.data, header.key).trim() === '') {
      return fail(`There is no required header key '${header.key}' (value) in the file '${label(variant)}'`);
    }
  }

  return succeed();
}

export function checkRequiredLists(ruleSet: RuleSet, variant: LanguageVariant): Outcome {
  for (const list of ruleSet.requiredLists) {
    const items = getList(variant.data, list.key);
    if (items.length === 0) {
      return fail(`There is no required list '${list.key}' in the file '${label(variant)}'`);
    }

    const allowed = list.allowed.get(variant.language);
    if (!allowed) {
      return fail(
        `There is no required list '${list.key}' for language '${variant.language}' of the file '${label(variant)}'. ` +
          `Check required-lists in the ${RULE_SET_FILE_NAME}`
      );
    }

    for (const item of items) {
      if (!allowed.has(item)) {
        return fail(
          `Value '${item}' of the list '${list.key}' in the file '${label(variant)}' is not allowed for ` +
            `language '${variant.language}'. Check required-lists in the ${RULE_SET_FILE_NAME}`
        );
      }
    }
  }

  return succeed();
}

export function checkSlug(ruleSet: RuleSet, variant: LanguageVariant): Outcome {
  if (!ruleSet.slugPattern || !contains(variant.data, 'slug')) {
    return succeed();
  }

  const slug = getString(variant.data, 'slug');
  const pattern = new RegExp(`^(?:${ruleSet.slugPattern})$`);
  if (!pattern.test(slug)) {
    return fail(`Slug '${slug}' in the file '${label(variant)}' doesn't match the pattern '${ruleSet.slugPattern}'`);
  }

  return succeed();
}

export function checkHeaderDuplicates(ruleSet: RuleSet, variant: LanguageVariant, duplicates: DuplicateTable): Outcome {
  for (const key of ruleSet.duplicateHeaders) {
    if (!contains(variant.data, key)) {
      continue;
    }

    const recorded = duplicates.record(key, getComparable(variant.data, key), variant.filePath);
    if (!recorded.ok) {
      return recorded;
    }
  }

  return succeed();
}

export async function checkBody(ruleSet: RuleSet, variant: LanguageVariant, services: EngineServices): Promise<Outcome> {
  if (ruleSet.spellCheck) {
    let result: SpellCheckResult;
    try {
      result = ruleSet.checkFileLanguage
        ? await services.spellChecker.check(variant.body, variant.language)
        : await services.spellChecker.check(variant.body);
    } catch (error) {
      return fail(`File '${label(variant)}' failed spell check`, error);
    }

    if (!result.ok) {
      return fail(`File '${label(variant)}' failed spell check`, new Error(result.reason));
    }
    return succeed();
  }

  if (!ruleSet.checkFileLanguage || variant.body.trim() === '') {
    return succeed();
  }

  const prose = bodyProse(variant.tokens) || variant.body;
  const detected = services.languageDetector.detect(prose);
  if (!detected) {
    return fail(`Language of the file '${label(variant)}' could not be detected, expected '${variant.language}'`);
  }

  if (twoLetterLanguage(detected) !== variant.language.toLowerCase()) {
    return fail(`Language '${detected}' of the file '${label(variant)}' is not expected '${variant.language}'`);
  }

  return succeed();
}

/** Every check for one language variant, stopping at the first failure. */
export async function validateContent(
  folder: Folder,
  variant: LanguageVariant,
  duplicates: DuplicateTable,
  services: EngineServices
): Promise<Outcome> {
  const { ruleSet } = folder;
  services.reporter.info(`Checking file '${label(variant)}' language '${variant.language}'`);

  const checks = [
    () => checkRequiredHeaders(ruleSet, variant),
    () => checkRequiredLists(ruleSet, variant),
    () => checkSlug(ruleSet, variant),
    () => checkHeaderDuplicates(ruleSet, variant, duplicates)
  ];

  for (const check of checks) {
    const outcome = check();
    if (!outcome.ok) {
      return outcome;
    }
  }

  return checkBody(ruleSet, variant, services);
}

async function initialiseSpellChecker(folder: Folder, services: EngineServices): Promise<Outcome> {
  const settings = folder.ruleSet.spellCheck;
  if (!settings) {
    return succeed();
  }

  if (!services.spellCheckApiKey) {
    return fail(`Spell check is enabled in '${toPosixRelative(folder.ruleSet.filePath)}' but no API key was given`);
  }

  try {
    await services.spellChecker.initialise(services.spellCheckApiKey, settings);
  } catch (error) {
    return fail(`Spell checker could not be initialised for '${toPosixRelative(folder.path)}'`, error);
  }

  services.reporter.info(`Connected to the spell check API (model ${settings.model})`);
  return succeed();
}

export async function validateFolderContent(folder: Folder, services: EngineServices): Promise<Outcome<number>> {
  services.reporter.info(`Checking all files content in the folder '${toPosixRelative(folder.path)}'`);

  const initialised = await initialiseSpellChecker(folder, services);
  if (!initialised.ok) {
    return initialised;
  }

  const duplicates = new DuplicateTable();
  let checked = 0;

  for (const document of folder.documents.values()) {
    for (const variant of document.variants.values()) {
      const outcome = await validateContent(folder, variant, duplicates, services);
      if (!outcome.ok) {
        return outcome;
      }
      checked += 1;
    }
  }

  return succeed(checked);
}
