// Re-export all public types and classes
export * from './types';
export * from './errors';
export * from './characters';
export * from './CodepointScanner';
export { LanguageHyphenator, DEFAULT_MIN_PREFIX, DEFAULT_MIN_SUFFIX, type PatternSource } from './hyphenation/LanguageHyphenator';
export { LanguageRegistry, defaultLanguageRegistry, createBuiltinLanguageEntries, type LanguageEntry } from './hyphenation/LanguageRegistry';
export { Hyphenator, defaultHyphenator, setPreferredLanguage, primaryLanguageTag } from './hyphenation/Hyphenator';
export { buildPatternTrie, loadPatternModule, parseCompiledPatterns, compiledPatternsSchema, type CompiledPatterns } from './hyphenation/PatternTable';
export { TextShaper } from './TextShaper';
export { CachedTextMeasurer } from './MeasurementCache';
export { FixedAdvanceMeasurer, type FixedAdvanceOptions } from './FixedAdvanceMeasurer';
export { LineControl } from './LineControl';
export { LayoutEngine, MAX_COST, type LayoutEngineOptions } from './LayoutEngine';
export * from './config';
export * from './evaluation/HyphenationEvaluation';
export { logger, type Logger } from './logger';
