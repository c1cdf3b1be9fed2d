/**
 * Languages a subscriber may choose for solutions.
 */

export const KNOWN_LANGUAGES = ['python', 'java', 'cpp', 'javascript', 'go', 'rust'] as const;

export type Language = typeof KNOWN_LANGUAGES[number];

export interface LanguageProfile {
  displayName: string;
  /** Fence tag used in markdown code blocks */
  fence: string;
  commentPrefix: string;
}

export const LANGUAGE_PROFILES: Record<Language, LanguageProfile> = {
  python: { displayName: 'Python', fence: 'python', commentPrefix: '#' },
  java: { displayName: 'Java', fence: 'java', commentPrefix: '//' },
  cpp: { displayName: 'C++', fence: 'cpp', commentPrefix: '//' },
  javascript: { displayName: 'JavaScript', fence: 'javascript', commentPrefix: '//' },
  go: { displayName: 'Go', fence: 'go', commentPrefix: '//' },
  rust: { displayName: 'Rust', fence: 'rust', commentPrefix: '//' }
};

export function isKnownLanguage(value: string): value is Language {
  return KNOWN_LANGUAGES.some(language => language === value);
}
