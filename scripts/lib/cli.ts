import { inputValidated, interactivePromptAdapter, type PromptAdapter } from './cli_prompts.js';
import { runCheck, type RunResult } from './checker.js';
import { directoryExists } from './io.js';
import { describeError } from './outcome.js';
import { ConsoleReporter } from './reporter.js';

const KNOWN_OPTIONS = new Set(['site', 'api-key']);

export interface CliSettings {
  siteFolder: string;
  spellCheckApiKey?: string;
}

export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  interactive: boolean;
  prompt: PromptAdapter;
}

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Options first, then environment, then (on a terminal) a prompt for the site folder. */
export async function resolveCliSettings(args: string[], environment: CliEnvironment): Promise<CliSettings> {
  const options = parseCliOptionMap(args);
  for (const key of options.keys()) {
    if (!KNOWN_OPTIONS.has(key)) {
      throw new Error(`Unknown option '--${key}'. Expected --site <folder> and optionally --api-key <key>`);
    }
  }

  const { env } = environment;

  let siteFolder = nonEmpty(options.get('site')) ?? nonEmpty(env.CONTENT_CHECK_SITE);

  if (!siteFolder && environment.interactive) {
    siteFolder = await inputValidated(environment.prompt, {
      message: 'Site folder to check:',
      defaultValue: '.',
      validate: async (value) =>
        (await directoryExists(value)) ? undefined : `Folder '${value}' doesn't exist`
    });
  }

  if (!siteFolder) {
    throw new Error('Site folder is required. Pass --site <folder> or set CONTENT_CHECK_SITE');
  }

  return {
    siteFolder,
    spellCheckApiKey:
      nonEmpty(options.get('api-key')) ?? nonEmpty(env.SPELL_CHECK_API_KEY) ?? nonEmpty(env.OPENAI_API_KEY)
  };
}

export async function runCli(
  argv: string[] = process.argv.slice(2),
  environment: CliEnvironment = {
    env: process.env,
    interactive: Boolean(process.stdin.isTTY),
    prompt: interactivePromptAdapter
  }
): Promise<RunResult> {
  const settings = await resolveCliSettings(argv, environment);
  const reporter = new ConsoleReporter();

  console.log('Checking localized content...');

  const result = await runCheck({
    siteFolder: settings.siteFolder,
    spellCheckApiKey: settings.spellCheckApiKey,
    reporter
  });

  if (!result.ok) {
    console.error(`  ERROR: ${describeError(result.error)}`);
  }

  console.log(`\n${result.ok ? 0 : 1} error(s), ${reporter.warnings.length} warning(s)`);

  if (result.ok) {
    const { folders, documents, files } = result.summary;
    console.log(`Checked ${files} file(s) of ${documents} document(s) in ${folders} folder(s).`);
    console.log('Validation passed.');
  }

  return result;
}
