/**
 * CandidateProfile - Canonical structured form of one résumé
 */

export interface Experience {
  title: string;
  startYear: number;
  /** `'present'` for an ongoing role, `null` when the end could not be read */
  endYear: number | 'present' | null;
}

export interface Education {
  degree: string;
}

export type ProfileField = 'name' | 'email' | 'phone' | 'experiences' | 'education' | 'skills' | 'languages';

export interface CandidateProfile {
  id: string;
  name: string;
  email: string;
  phone: string;
  experiences: Experience[];
  education: Education[];
  skills: string[];
  languages: string[];
  yearsExperience: number;
  rawText: string;
  coverLetter: string;
  degradedFields: ProfileField[];
}

export const NAME_NOT_FOUND = 'name not found';
export const MAX_EXPERIENCES = 10;
export const MAX_EDUCATION = 5;
