/**
 * Profile Extractor Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ProfileExtractor } from '../../domain/services/ProfileExtractor.js';
import { NAME_NOT_FOUND } from '../../domain/entities/CandidateProfile.js';
import { makeRequirement } from '../helpers/fakes.js';

const RESUME = [
  'JEAN DUPONT',
  'jean.dupont@example.com | 06 12 34 56 78',
  '',
  'Expérience professionnelle',
  'Data Engineer chez Acme - 2018 - 2021',
  'Lead Data Engineer chez Beta - 2021 - présent',
  '',
  'Formation',
  'Master Informatique, Université de Lyon - 2017',
  '',
  'Compétences',
  'Python, SQL, Docker',
  'Langues',
  'Français, Anglais',
].join('\n');

const fixedClock = () => new Date('2024-06-01T00:00:00Z');

describe('ProfileExtractor', () => {
  const extractor = new ProfileExtractor({ clock: fixedClock });

  describe('well-formed résumé', () => {
    const profile = extractor.extract(RESUME, { coverLetter: 'Madame, Monsieur' });

    it('should read identity and contact fields', () => {
      expect(profile.name).toBe('Jean Dupont');
      expect(profile.email).toBe('jean.dupont@example.com');
      expect(profile.phone).toBe('06 12 34 56 78');
      expect(profile.id).toBe('jean.dupont');
    });

    it('should read dated experiences', () => {
      expect(profile.experiences).toEqual([
        { title: 'Data Engineer chez Acme', startYear: 2018, endYear: 2021 },
        { title: 'Lead Data Engineer chez Beta', startYear: 2021, endYear: 'present' },
      ]);
    });

    it('should resolve "present" with the injected clock', () => {
      expect(profile.yearsExperience).toBe(6);
    });

    it('should read education from its section', () => {
      expect(profile.education).toEqual([{ degree: 'Master Informatique, Université de Lyon - 2017' }]);
    });

    it('should read skills and languages', () => {
      expect(profile.skills).toEqual(['Python', 'SQL', 'Docker']);
      expect(profile.languages).toEqual(['French', 'English']);
    });

    it('should keep the source text and cover letter', () => {
      expect(profile.rawText).toBe(RESUME);
      expect(profile.coverLetter).toBe('Madame, Monsieur');
      expect(profile.degradedFields).toEqual([]);
    });
  });

  describe('degraded input', () => {
    it('should fall back to sentinels on empty text', () => {
      const profile = extractor.extract('');

      expect(profile.name).toBe(NAME_NOT_FOUND);
      expect(profile.email).toBe('');
      expect(profile.phone).toBe('');
      expect(profile.experiences).toEqual([]);
      expect(profile.education).toEqual([]);
      expect(profile.skills).toEqual([]);
      expect(profile.languages).toEqual(['French']);
      expect(profile.yearsExperience).toBe(0);
      expect(profile.id).toBe('candidate-da39a3ee');
      expect(profile.degradedFields).toEqual([
        'email',
        'name',
        'phone',
        'experiences',
        'education',
        'skills',
        'languages',
      ]);
    });

    it('should derive the name from the email when no line qualifies', () => {
      const profile = extractor.extract('contact: marie.curie@example.org\nsome text');

      expect(profile.name).toBe('Marie Curie');
      expect(profile.id).toBe('marie.curie');
    });

    it('should skip headings and prefixes when looking for the name', () => {
      const profile = extractor.extract('CV - Paul Martin\nExpérience\nnothing dated here');
      expect(profile.name).toBe('Paul Martin');
    });

    it('should ignore an experience without an end year in the total', () => {
      const profile = extractor.extract('Expérience\nConsultant chez Gamma - 2015');

      expect(profile.experiences).toEqual([{ title: 'Consultant chez Gamma', startYear: 2015, endYear: null }]);
      expect(profile.yearsExperience).toBe(0);
    });

    it('should floor the total rather than each inverted span', () => {
      const profile = extractor.extract(
        'Expérience\nAnalyste chez Gamma - 2015 - 2020\nConsultant chez Delta - 2023 - 2020'
      );

      expect(profile.experiences).toEqual([
        { title: 'Analyste chez Gamma', startYear: 2015, endYear: 2020 },
        { title: 'Consultant chez Delta', startYear: 2023, endYear: 2020 },
      ]);
      expect(profile.yearsExperience).toBe(2);
    });
  });

  it('should be deterministic', () => {
    expect(extractor.extract(RESUME)).toEqual(extractor.extract(RESUME));
  });

  it('should find requirement skills that are not in the vocabulary', () => {
    const requirement = makeRequirement({ requiredSkills: ['COBOL'] });
    const profile = extractor.extract('Maintenance of COBOL batch jobs', { requirement });

    expect(profile.skills).toEqual(['COBOL']);
  });
});
