/**
 * Domain Entities - Central export
 */

export * from './JobRequirement.js';
export * from './CandidateProfile.js';
export * from './Evaluation.js';
export * from './Document.js';
export * from './TrackedJob.js';
