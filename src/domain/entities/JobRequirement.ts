/**
 * JobRequirement - Canonical structured form of a job description
 *
 * Produced by the RequirementExtractor and consumed by the resolver and
 * every scorer. Records are frozen once built.
 */

// =============================================================================
// ENUMERATIONS
// =============================================================================

export const SENIORITY_LEVELS = ['junior', 'mid', 'senior', 'unspecified'] as const;

export type Seniority = (typeof SENIORITY_LEVELS)[number];

export const CONTRACT_TYPES = ['CDI', 'CDD', 'INTERNSHIP', 'APPRENTICESHIP', 'FREELANCE'] as const;

export type ContractType = (typeof CONTRACT_TYPES)[number];

// =============================================================================
// REQUIREMENT
// =============================================================================

export interface SalaryRange {
  min: number;
  max: number;
}

export interface JobRequirement {
  readonly title: string;
  readonly seniority: Seniority;
  readonly experienceMin: number;
  readonly experienceMax: number; // 0 = no upper bound
  readonly requiredSkills: readonly string[];
  readonly optionalSkills: readonly string[];
  readonly languages: readonly string[];
  readonly location: string;
  readonly salary: Readonly<SalaryRange>;
  readonly contractType: ContractType;
  readonly keywords: readonly string[];
  readonly notes: string;
}

/**
 * Structured overrides supplied by a recruiter alongside the job text.
 * Any field given here wins over what the text suggests.
 */
export interface RequirementHints {
  title?: string;
  seniority?: Seniority;
  experienceMin?: number;
  experienceMax?: number;
  requiredSkills?: string[];
  optionalSkills?: string[];
  languages?: string[];
  location?: string;
  salaryMin?: number;
  salaryMax?: number;
  contractType?: ContractType;
  notes?: string;
}

export const UNSPECIFIED = 'unspecified';
