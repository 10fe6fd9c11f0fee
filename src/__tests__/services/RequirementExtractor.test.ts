/**
 * Requirement Extractor Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  RequirementExtractor,
  clauseAround,
  parseRequirementHints,
} from '../../domain/services/RequirementExtractor.js';
import { ValidationError } from '../../domain/errors.js';

const JOB_POSTING = [
  'Senior Data Engineer - Paris',
  "CDI, 45-55k€ par an, 5 ans d'expérience minimum",
  '',
  'Compétences requises:',
  '- Python',
  '- Apache Spark',
  'Nice to have:',
  '- Docker',
  '- Kafka',
  'Missions:',
  'Build pipelines with Airflow.',
  'Anglais courant.',
].join('\n');

describe('RequirementExtractor', () => {
  const extractor = new RequirementExtractor();

  describe('short postings', () => {
    it('should classify skills from their clause', () => {
      const requirement = extractor.extract('Data Scientist, 3 years, Python required, Power BI nice to have');

      expect(requirement.title).toBe('Data Scientist');
      expect(requirement.experienceMin).toBe(3);
      expect(requirement.experienceMax).toBe(0);
      expect(requirement.requiredSkills).toEqual(['Python']);
      expect(requirement.optionalSkills).toEqual(['Power BI']);
    });

    it('should read experience ranges without double counting the upper bound', () => {
      const requirement = extractor.extract('Backend role, 3-5 years of experience');

      expect(requirement.experienceMin).toBe(3);
      expect(requirement.experienceMax).toBe(5);
    });

    it('should keep a skill required once any mention requires it', () => {
      const requirement = extractor.extract('Python required. Python is a plus.');

      expect(requirement.requiredSkills).toEqual(['Python']);
      expect(requirement.optionalSkills).toEqual([]);
    });
  });

  describe('structured postings', () => {
    const requirement = extractor.extract(JOB_POSTING);

    it('should read title, seniority, location and contract', () => {
      expect(requirement.title).toBe('Data Engineer');
      expect(requirement.seniority).toBe('senior');
      expect(requirement.location).toBe('Paris');
      expect(requirement.contractType).toBe('CDI');
    });

    it('should scale a salary range whose unit is on the upper bound', () => {
      expect(requirement.salary).toEqual({ min: 45000, max: 55000 });
    });

    it('should read the minimum experience', () => {
      expect(requirement.experienceMin).toBe(5);
    });

    it('should classify skills by section', () => {
      expect(requirement.requiredSkills).toEqual(['Python', 'Apache Spark']);
      expect(requirement.optionalSkills).toEqual(['Docker', 'Kafka', 'Apache Airflow']);
    });

    it('should detect languages', () => {
      expect(requirement.languages).toEqual(['English']);
    });

    it('should freeze the record', () => {
      expect(Object.isFrozen(requirement)).toBe(true);
      expect(Object.isFrozen(requirement.requiredSkills)).toBe(true);
      expect(Object.isFrozen(requirement.salary)).toBe(true);
    });
  });

  describe('hints', () => {
    it('should let hints override and extend the text', () => {
      const requirement = extractor.extract(JOB_POSTING, {
        title: 'Platform Engineer',
        requiredSkills: ['docker'],
        salaryMin: 50000,
        location: 'Lyon',
      });

      expect(requirement.title).toBe('Platform Engineer');
      expect(requirement.requiredSkills).toEqual(['Python', 'Apache Spark', 'Docker']);
      expect(requirement.optionalSkills).toEqual(['Kafka', 'Apache Airflow']);
      expect(requirement.salary).toEqual({ min: 50000, max: 55000 });
      expect(requirement.location).toBe('Lyon');
    });

    it('should canonicalize skill aliases given as hints', () => {
      const requirement = extractor.extract('Poste à pourvoir', {
        requiredSkills: ['postgres'],
        optionalSkills: ['sklearn', 'Postgres'],
      });

      expect(requirement.requiredSkills).toEqual(['PostgreSQL']);
      expect(requirement.optionalSkills).toEqual(['Scikit-learn']);
    });

    it('should never let the maximum fall below the minimum', () => {
      const requirement = extractor.extract('Backend role, 3-5 years', { experienceMin: 7 });

      expect(requirement.experienceMin).toBe(7);
      expect(requirement.experienceMax).toBe(7);
    });

    it('should treat null as no hints', () => {
      expect(parseRequirementHints(null)).toEqual({});
    });

    it('should reject inconsistent ranges', () => {
      expect(() => parseRequirementHints({ experienceMin: 5, experienceMax: 2 })).toThrow(ValidationError);
    });

    it('should reject unknown contract types', () => {
      expect(() => parseRequirementHints({ contractType: 'GIG' })).toThrow('Invalid requirement hints');
    });
  });

  describe('degraded input', () => {
    it('should fall back to sentinels on empty text', () => {
      const requirement = extractor.extract('');

      expect(requirement).toEqual({
        title: 'unspecified',
        seniority: 'unspecified',
        experienceMin: 0,
        experienceMax: 0,
        requiredSkills: [],
        optionalSkills: [],
        languages: ['French'],
        location: 'unspecified',
        salary: { min: 0, max: 0 },
        contractType: 'CDI',
        keywords: [],
        notes: '',
      });
    });

    it('should use the configured default language', () => {
      const english = new RequirementExtractor({ defaultLanguage: 'English' });
      expect(english.extract('Backend role').languages).toEqual(['English']);
    });
  });

  describe('keywords', () => {
    it('should rank frequent words first and keep first-seen order on ties', () => {
      const requirement = extractor.extract('kafka kafka streaming kafka streaming data');
      expect(requirement.keywords).toEqual(['kafka', 'streaming', 'data']);
    });
  });

  describe('clauseAround', () => {
    it('should stop at commas and sentence ends', () => {
      const text = 'We use Java, Python is a plus. Go too';
      const start = text.indexOf('Python');
      expect(clauseAround(text, start, start + 6)).toBe(' Python is a plus');
    });

    it('should not split on a dot inside a word', () => {
      const text = 'Experience with Node.js required';
      const start = text.indexOf('Node.js');
      expect(clauseAround(text, start, start + 7)).toBe(text);
    });
  });
});
