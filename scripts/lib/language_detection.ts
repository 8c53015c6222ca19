import { detect } from 'tinyld';

import { twoLetterLanguage } from './language.js';

export interface LanguageDetector {
  /** Two-letter code of the text's language, or null when it cannot tell. */
  detect(text: string): string | null;
}

export const tinyLanguageDetector: LanguageDetector = {
  detect(text: string): string | null {
    const code = detect(text);
    return code ? twoLetterLanguage(code) : null;
  }
};
