import assert from 'node:assert/strict';
import test from 'node:test';

import { runCheck } from '../lib/checker.js';
import type { LanguageDetector } from '../lib/language_detection.js';
import { MemoryReporter } from '../lib/reporter.js';
import { FakeSpellChecker } from './builders.js';
import { page, withTempCwd, writeFixtureFile } from './test_fs.js';

const RULES = `
default-language: en
languages: [en, fr]
required-headers: [title]
check-header-duplicates: [id]
check-language-structure: strict
check-file-language: true
`;

const greetingDetector: LanguageDetector = {
  detect: (text) => (text.includes('Bonjour') ? 'fr' : 'en')
};

async function writeSite(root: string, rules = RULES): Promise<void> {
  await writeFixtureFile(root, 'site/config.yaml', 'languageCode: en\ntitle: Test site');
  await writeFixtureFile(root, 'site/posts/content-rules.yaml', rules);
  await writeFixtureFile(root, 'site/posts/a.md', page('title: Hello\nid: 1', 'Hello world.'));
  await writeFixtureFile(root, 'site/posts/a.fr.md', page('title: Bonjour\nid: 2', 'Bonjour le monde.'));
}

test('runCheck passes a complete site and reports a summary', async () => {
  await withTempCwd('content-checker-site-', async (root) => {
    await writeSite(root);
    const reporter = new MemoryReporter();

    const result = await runCheck({ siteFolder: 'site', reporter, languageDetector: greetingDetector });

    assert.deepEqual(result, {
      ok: true,
      summary: { siteFolder: `${root}/site`, folders: 1, documents: 1, files: 2 }
    });
    assert.deepEqual(reporter.warnings, []);
    assert.ok(reporter.infos.includes('Website title: Test site, language code: en'));
    assert.ok(reporter.infos.includes('All languages are valid'));
  });
});

test('runCheck sends every variant to the spell checker once it is initialised', async () => {
  await withTempCwd('content-checker-spell-', async (root) => {
    await writeSite(root, `${RULES}\nspell-check:\n  model: test-model`);
    const reporter = new MemoryReporter();
    const spellChecker = new FakeSpellChecker();

    const result = await runCheck({
      siteFolder: 'site',
      reporter,
      spellChecker,
      spellCheckApiKey: 'test-key',
      languageDetector: greetingDetector
    });

    assert.equal(result.ok, true);
    assert.equal(spellChecker.initialised.length, 1);
    assert.equal(spellChecker.initialised[0].apiKey, 'test-key');
    assert.deepEqual(
      spellChecker.checks.map((check) => check.expectedLanguage).sort(),
      ['en', 'fr']
    );
    assert.ok(reporter.infos.includes('Connected to the spell check API (model test-model)'));
  });
});

test('runCheck fails on duplicate header values across documents', async () => {
  await withTempCwd('content-checker-duplicates-', async (root) => {
    await writeSite(root, 'default-language: en\nlanguages: [en, fr]\ncheck-header-duplicates: [id]');
    await writeFixtureFile(root, 'site/posts/b.md', page('title: Other\nid: 1'));

    const result = await runCheck({ siteFolder: 'site', reporter: new MemoryReporter() });

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "Detected duplicates id: '1' in two files 'site/posts/a.md' and 'site/posts/b.md'");
    }
  });
});

test('runCheck fails when a document misses a language under strict structure', async () => {
  await withTempCwd('content-checker-structure-', async (root) => {
    await writeSite(root);
    await writeFixtureFile(root, 'site/posts/b.md', page('title: Only English\nid: 3'));

    const result = await runCheck({
      siteFolder: 'site',
      reporter: new MemoryReporter(),
      languageDetector: greetingDetector
    });

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "File 'site/posts/b.md' doesn't have language '*.fr.md'");
    }
  });
});

test('runCheck reports a missing site folder, site config or rule set', async () => {
  await withTempCwd('content-checker-missing-', async (root) => {
    const reporter = new MemoryReporter();

    const missingFolder = await runCheck({ siteFolder: 'nope', reporter });
    assert.equal(missingFolder.ok ? '' : missingFolder.error.message, "Site folder 'nope' doesn't exist");

    await writeFixtureFile(root, 'site/posts/a.md', page('title: Hello'));
    const missingConfig = await runCheck({ siteFolder: 'site', reporter });
    assert.equal(
      missingConfig.ok ? '' : missingConfig.error.message,
      "Site configuration file 'config.yaml' or 'hugo.yaml' doesn't exist in 'site'"
    );

    await writeFixtureFile(root, 'site/config.yaml', 'languageCode: en\ntitle: Test site');
    const missingRules = await runCheck({ siteFolder: 'site', reporter });
    assert.equal(
      missingRules.ok ? '' : missingRules.error.message,
      "'content-rules.yaml' file doesn't exist in any subdirectory of 'site'"
    );
  });
});
