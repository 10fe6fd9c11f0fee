export * from './PatternLibrary.js';
export * from './SkillVocabulary.js';
export * from './TextPatterns.js';
export * from './matching.js';
