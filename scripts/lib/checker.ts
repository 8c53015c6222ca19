import path from 'node:path';

import { validateFolder, validateFolderContent, type EngineServices } from './engine.js';
import { buildFolder } from './file_resolution.js';
import { directoryExists, findFilesNamed, toPosixRelative } from './io.js';
import { tinyLanguageDetector, type LanguageDetector } from './language_detection.js';
import { fail, succeed, toCheckError, type CheckError, type Outcome } from './outcome.js';
import type { Reporter } from './reporter.js';
import { loadRuleSet, loadSiteConfig, RULE_SET_FILE_NAME } from './rule_set.js';
import { ChatSpellChecker, type SpellChecker } from './spell_check.js';

export interface CheckOptions {
  siteFolder: string;
  reporter: Reporter;
  spellCheckApiKey?: string;
  spellChecker?: SpellChecker;
  languageDetector?: LanguageDetector;
}

export interface CheckSummary {
  siteFolder: string;
  folders: number;
  documents: number;
  files: number;
}

export type RunResult = { ok: true; summary: CheckSummary } | { ok: false; error: CheckError };

async function resolveSiteFolder(siteFolder: string): Promise<Outcome<string>> {
  if (!siteFolder.trim()) {
    return fail('Site folder is required');
  }

  const absolute = path.resolve(siteFolder);
  if (!(await directoryExists(absolute))) {
    return fail(`Site folder '${siteFolder}' doesn't exist`);
  }

  return succeed(absolute);
}

async function checkSite(options: CheckOptions): Promise<Outcome<CheckSummary>> {
  const { reporter } = options;

  const siteFolder = await resolveSiteFolder(options.siteFolder);
  if (!siteFolder.ok) {
    return siteFolder;
  }
  reporter.info(`Site folder exists: ${siteFolder.value}`);

  const site = await loadSiteConfig(siteFolder.value);
  reporter.info(`Website title: ${site.title}, language code: ${site.languageCode}`);

  const ruleSetFiles = await findFilesNamed(siteFolder.value, RULE_SET_FILE_NAME);
  if (ruleSetFiles.length === 0) {
    return fail(`'${RULE_SET_FILE_NAME}' file doesn't exist in any subdirectory of '${toPosixRelative(siteFolder.value)}'`);
  }

  const services: EngineServices = {
    reporter,
    languageDetector: options.languageDetector ?? tinyLanguageDetector,
    spellChecker: options.spellChecker ?? new ChatSpellChecker(),
    spellCheckApiKey: options.spellCheckApiKey
  };

  const summary: CheckSummary = { siteFolder: siteFolder.value, folders: 0, documents: 0, files: 0 };

  for (const ruleSetFile of ruleSetFiles) {
    reporter.info(`Rule set '${toPosixRelative(ruleSetFile)}' is loading...`);
    const ruleSet = await loadRuleSet(ruleSetFile);

    const folder = await buildFolder(path.dirname(ruleSetFile), ruleSet, reporter);
    if (!folder.ok) {
      return folder;
    }

    const structure = validateFolder(folder.value, site, reporter);
    if (!structure.ok) {
      return structure;
    }

    const content = await validateFolderContent(folder.value, services);
    if (!content.ok) {
      return content;
    }

    summary.folders += 1;
    summary.documents += folder.value.documents.size;
    summary.files += content.value;
  }

  return succeed(summary);
}

/**
 * Walks every governed folder under the site and stops at the first failure.
 * Errors thrown by loaders and file reads end the run the same way.
 */
export async function runCheck(options: CheckOptions): Promise<RunResult> {
  try {
    const outcome = await checkSite(options);
    return outcome.ok ? { ok: true, summary: outcome.value } : outcome;
  } catch (error) {
    return { ok: false, error: toCheckError(error) };
  }
}
