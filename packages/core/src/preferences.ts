// morphseg/preferences - Configuration accessor

export interface Preferences {
  /** TSV frequency list used to find Vietnamese compound words */
  path_frequency: string;
  /** MeCab executable */
  path_mecab: string;
}

export type PreferenceKey = keyof Preferences;

export const DEFAULT_PREFERENCES: Readonly<Preferences> = {
  path_frequency: 'frequency.txt',
  path_mecab: 'mecab'
};

let preferences: Preferences = { ...DEFAULT_PREFERENCES };

export function getPreference<K extends PreferenceKey>(key: K): Preferences[K] {
  return preferences[key];
}

export function setPreferences(values: Partial<Preferences>): void {
  preferences = { ...preferences, ...values };
}

export function resetPreferences(): void {
  preferences = { ...DEFAULT_PREFERENCES };
}

/**
 * Apply MORPHSEG_* variables. Unset or empty variables leave the current
 * value alone.
 */
export function loadPreferencesFromEnv(env: Record<string, string | undefined> = process.env): Preferences {
  const values: Partial<Preferences> = {};
  if (env.MORPHSEG_FREQUENCY_PATH) values.path_frequency = env.MORPHSEG_FREQUENCY_PATH;
  if (env.MORPHSEG_MECAB_PATH) values.path_mecab = env.MORPHSEG_MECAB_PATH;
  setPreferences(values);
  return { ...preferences };
}
