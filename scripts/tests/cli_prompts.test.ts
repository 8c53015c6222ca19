import assert from 'node:assert/strict';
import test from 'node:test';

import { inputValidated, type PromptAdapter } from '../lib/cli_prompts.js';

class MockPromptAdapter implements PromptAdapter {
  readonly inputCalls: Array<{ message: string; defaultValue?: string }> = [];

  constructor(private readonly inputs: string[]) {}

  async input(options: { message: string; defaultValue?: string }): Promise<string> {
    this.inputCalls.push(options);
    const next = this.inputs.shift();
    if (next === undefined) {
      throw new Error('No more queued input values');
    }
    return next;
  }
}

test('inputValidated trims by default and returns the first valid value', async () => {
  const prompt = new MockPromptAdapter(['  posts  ']);

  const value = await inputValidated(prompt, { message: 'Folder:', defaultValue: '.' });

  assert.equal(value, 'posts');
  assert.deepEqual(prompt.inputCalls, [{ message: 'Folder:', defaultValue: '.' }]);
});

test('inputValidated logs validation errors and asks again', async () => {
  const prompt = new MockPromptAdapter(['', 'Docs']);
  const logged: string[] = [];

  const value = await inputValidated(
    prompt,
    {
      message: 'Folder:',
      normalize: (raw) => raw.trim().toLowerCase(),
      validate: (candidate) => (candidate ? undefined : 'A folder is required')
    },
    (message) => logged.push(message)
  );

  assert.equal(value, 'docs');
  assert.deepEqual(logged, ['A folder is required']);
  assert.equal(prompt.inputCalls.length, 2);
});

test('inputValidated awaits asynchronous validation', async () => {
  const prompt = new MockPromptAdapter(['a', 'b']);

  const value = await inputValidated(
    prompt,
    { message: 'Pick:', validate: async (candidate) => (candidate === 'b' ? undefined : 'Not b') },
    () => undefined
  );

  assert.equal(value, 'b');
});
