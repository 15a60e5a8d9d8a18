/**
 * LanguageDetector - Maps a file extension to a language id.
 *
 * Only python, typescript and javascript get a structural outline; every
 * other language is reviewed on text-level style alone.
 */

import * as path from 'path';

export type SupportedLanguage =
  | 'python'
  | 'typescript'
  | 'javascript'
  | 'java'
  | 'go'
  | 'rust'
  | 'ruby'
  | 'php'
  | 'csharp'
  | 'cpp'
  | 'c'
  | 'unknown';

export type OutlineLanguage = Extract<SupportedLanguage, 'python' | 'typescript' | 'javascript'>;

const LANGUAGE_EXTENSIONS: ReadonlyArray<[SupportedLanguage, string[]]> = [
  ['python', ['.py', '.pyw']],
  ['typescript', ['.ts', '.tsx', '.mts', '.cts']],
  ['javascript', ['.js', '.jsx', '.mjs', '.cjs']],
  ['java', ['.java']],
  ['go', ['.go']],
  ['rust', ['.rs']],
  ['ruby', ['.rb', '.rake']],
  ['php', ['.php']],
  ['csharp', ['.cs']],
  ['cpp', ['.cpp', '.cc', '.cxx', '.hpp', '.hxx']],
  ['c', ['.c', '.h']],
];

export class LanguageDetector {
  private extensionMap: Map<string, SupportedLanguage> = new Map();

  constructor() {
    for (const [lang, extensions] of LANGUAGE_EXTENSIONS) {
      for (const ext of extensions) {
        this.extensionMap.set(ext, lang);
      }
    }
  }

  detect(filePath: string): SupportedLanguage {
    const ext = path.extname(filePath).toLowerCase();
    return this.extensionMap.get(ext) ?? 'unknown';
  }

  /**
   * Language whose files can be outlined structurally, or null.
   */
  outlineLanguage(filePath: string): OutlineLanguage | null {
    const lang = this.detect(filePath);
    if (lang === 'python' || lang === 'typescript' || lang === 'javascript') {
      return lang;
    }
    return null;
  }
}
