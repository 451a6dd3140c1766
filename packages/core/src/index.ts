// @morphseg/core - Morphemizers, registry and their shared primitives

// Shared types
export * from './types.js';

// Character utilities
export { CJK_IDEOGRAPH_RANGES, isCjkIdeograph, matchCjkIdeographs, filterCjkIdeographs } from './characters.js';

// Configuration, logging and errors
export {
  type Preferences,
  type PreferenceKey,
  DEFAULT_PREFERENCES,
  getPreference,
  setPreferences,
  resetPreferences,
  loadPreferencesFromEnv
} from './preferences.js';
export { DEBUG, setDebug, dp, describeError } from './log.js';
export { AnalyzerError, UnknownMorphemizerError, type AnalyzerBackend } from './errors.js';

// Memoization
export { SegmentCache, SEGMENT_CACHE_CAPACITY, type SegmentCacheStats } from './cache.js';

// Morphemizers
export { Morphemizer, type MorphemizerOptions } from './morphemizer.js';
export { SpaceMorphemizer, splitOnSpaces } from './morphemizers/space.js';
export { MecabMorphemizer, UNAVAILABLE, type MecabMorphemizerOptions } from './morphemizers/mecab.js';
export { JiebaMorphemizer, type JiebaMorphemizerOptions } from './morphemizers/jieba.js';
export { CjkCharMorphemizer } from './morphemizers/cjkChar.js';
export { VietnameseMorphemizer, type VietnameseMorphemizerOptions } from './morphemizers/vietnamese.js';

// External analyzers
export type { JapaneseAnalyzer, ChineseSegmenter, TaggedWord } from './analyzers/types.js';
export {
  MecabAnalyzer,
  MECAB_ARGS,
  parseMecabOutput,
  parseMecabDictionaryInfo,
  formatMecabIdentity,
  type MecabDictionaryInfo
} from './analyzers/mecab.js';
export { JiebaSegmenter } from './analyzers/jieba.js';

// Compound vocabulary
export {
  STUDY_PLAN_SENTINEL,
  JOINER,
  EMPTY_VOCABULARY,
  buildCompoundVocabulary,
  parseFrequencyList,
  loadFrequencyList,
  vocabularyOf,
  type CompoundVocabulary,
  type VocabularyLoadResult
} from './vocabulary.js';

// Registry
export {
  MorphemizerRegistry,
  getDefaultRegistry,
  resetDefaultRegistry,
  getAllMorphemizers,
  getMorphemizerByName,
  type RegistryOptions
} from './registry.js';
