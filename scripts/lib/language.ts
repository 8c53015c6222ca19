import { fail, succeed, type Outcome } from './outcome.js';
import type { RuleSet } from './rule_set.js';

const LOWERCASE_LETTER = /^\p{Ll}$/u;

const displayNames = new Intl.DisplayNames(['en'], { type: 'language', fallback: 'none' });

/** True when the runtime's locale data has a display name for `code`. */
export function isKnownLocale(code: string): boolean {
  try {
    return displayNames.of(code) !== undefined;
  } catch {
    return false;
  }
}

/** Two-letter language of a locale tag such as `en-US`, lower-cased. */
export function twoLetterLanguage(tag: string): string {
  try {
    return new Intl.Locale(tag).language.toLowerCase();
  } catch {
    return tag.trim().toLowerCase();
  }
}

export function validateLanguage(code: string | null | undefined, ruleSet: Pick<RuleSet, 'languages'>): Outcome {
  if (!code || code.trim().length === 0) {
    return fail('Language code is required');
  }

  if (code.length !== 2) {
    return fail(`Language code '${code}' is invalid. It should be 2 characters long`);
  }

  if (!LOWERCASE_LETTER.test(code[0]) || !LOWERCASE_LETTER.test(code[1])) {
    return fail(`Language code '${code}' is invalid. It should be lower case`);
  }

  if (!ruleSet.languages.includes(code)) {
    return fail(`Language code '${code}' is not defined in the rule set, expected ${ruleSet.languages.join(', ')}`);
  }

  if (!isKnownLocale(code)) {
    return fail(`Language code '${code}' is invalid. It should be a known locale`);
  }

  return succeed();
}
