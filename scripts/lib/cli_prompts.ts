import { input as inputPrompt } from '@inquirer/prompts';

export interface PromptAdapter {
  input(options: {
    message: string;
    defaultValue?: string;
  }): Promise<string>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async input(options): Promise<string> {
    return inputPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};

export async function inputValidated(
  prompt: PromptAdapter,
  options: {
    message: string;
    defaultValue?: string;
    normalize?: (value: string) => string;
    validate?: (value: string) => Promise<string | undefined> | string | undefined;
  },
  log: (message: string) => void = console.log
): Promise<string> {
  while (true) {
    const raw = await prompt.input({
      message: options.message,
      defaultValue: options.defaultValue
    });

    const normalized = options.normalize ? options.normalize(raw) : raw.trim();
    const errorMessage = options.validate ? await options.validate(normalized) : undefined;
    if (!errorMessage) {
      return normalized;
    }

    log(errorMessage);
  }
}
