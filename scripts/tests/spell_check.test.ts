import assert from 'node:assert/strict';
import test from 'node:test';

import {
  buildSpellCheckPrompt,
  ChatSpellChecker,
  interpretSpellCheckAnswer,
  type CompletionClient,
  type CompletionRequest
} from '../lib/spell_check.js';

class FakeCompletionClient implements CompletionClient {
  readonly verified: string[] = [];
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly answer: string) {}

  async verifyModel(model: string): Promise<void> {
    this.verified.push(model);
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.answer;
  }
}

const SETTINGS = { prompt: 'Proofread{language}.', model: 'test-model', temperature: 0, maxTokens: 200 };

test('buildSpellCheckPrompt fills or appends the language hint', () => {
  assert.equal(buildSpellCheckPrompt('Proofread{language}.', 'fr'), 'Proofread (expected language: fr).');
  assert.equal(buildSpellCheckPrompt('Proofread{language}.'), 'Proofread.');
  assert.equal(buildSpellCheckPrompt('Proofread.', 'fr'), "Proofread. The text must be written in language 'fr'.");
  assert.equal(buildSpellCheckPrompt('Proofread.'), 'Proofread.');
});

test('interpretSpellCheckAnswer accepts OK and reports anything else', () => {
  assert.deepEqual(interpretSpellCheckAnswer(' ok. '), { ok: true });
  assert.deepEqual(interpretSpellCheckAnswer('OK'), { ok: true });
  assert.deepEqual(interpretSpellCheckAnswer("'teh' should be 'the'"), { ok: false, reason: "'teh' should be 'the'" });
  assert.deepEqual(interpretSpellCheckAnswer(''), { ok: false, reason: 'Empty answer from the spell checker' });
});

test('ChatSpellChecker must be initialised before checking', async () => {
  const checker = new ChatSpellChecker(() => new FakeCompletionClient('OK'));

  await assert.rejects(checker.check('Hello'), { message: 'Spell checker is not initialised' });
});

test('ChatSpellChecker verifies the model and sends the text with the configured settings', async () => {
  const client = new FakeCompletionClient('OK');
  const keys: string[] = [];
  const checker = new ChatSpellChecker((apiKey) => {
    keys.push(apiKey);
    return client;
  });

  await checker.initialise('test-key', SETTINGS);
  const result = await checker.check('Bonjour le monde', 'fr');

  assert.deepEqual(result, { ok: true });
  assert.deepEqual(keys, ['test-key']);
  assert.deepEqual(client.verified, ['test-model']);
  assert.deepEqual(client.requests, [
    {
      model: 'test-model',
      temperature: 0,
      maxTokens: 200,
      system: 'Proofread (expected language: fr).',
      user: 'Bonjour le monde'
    }
  ]);
});

test('ChatSpellChecker returns the model answer as the failure reason', async () => {
  const checker = new ChatSpellChecker(() => new FakeCompletionClient("'wrold' should be 'world'"));

  await checker.initialise('test-key', SETTINGS);

  assert.deepEqual(await checker.check('Hello wrold'), { ok: false, reason: "'wrold' should be 'world'" });
});
