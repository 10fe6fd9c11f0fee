export * from './curves.js';
export * from './types.js';
export * from './ProfileScorer.js';
export * from './TechnicalScorer.js';
export * from './SoftSkillScorer.js';
