/**
 * Decision Aggregator Tests
 */

import { describe, it, expect } from '@jest/globals';
import type { CandidateEvaluation, Recommendation } from '../../domain/entities/Evaluation.js';
import { NO_CANDIDATES_SUMMARY } from '../../domain/entities/Evaluation.js';
import {
  DecisionAggregator,
  computeGlobalScore,
  recommendationFor,
} from '../../domain/services/DecisionAggregator.js';
import { makeProfile, makeRequirement } from '../helpers/fakes.js';

function evaluation(
  name: string,
  profile: number,
  technical: number,
  softSkills: number,
  missingRequired: string[] = []
): CandidateEvaluation {
  const id = name.toLowerCase().replace(/\s+/g, '.');
  return {
    sourceName: `${id}.pdf`,
    similarity: 0,
    profile: makeProfile({ id, name }),
    scores: {
      profile: { score: profile, rationale: 'profile note' },
      technical: {
        score: technical,
        rationale: 'technical note',
        matchedRequired: [],
        missingRequired,
        matchedOptional: [],
      },
      softSkills: {
        score: softSkills,
        rationale: 'soft-skill note',
        motivation: 50,
        communication: 50,
        leadership: 30,
        detectedSoftSkills: [],
      },
    },
  };
}

describe('computeGlobalScore', () => {
  it('should weight technical skills highest', () => {
    expect(computeGlobalScore(evaluation('A', 80, 90, 70).scores)).toBe(81);
  });

  it('should accept custom weights', () => {
    const scores = evaluation('A', 100, 0, 0).scores;
    expect(computeGlobalScore(scores, { profile: 0.5, technical: 0.25, softSkills: 0.25 })).toBe(50);
  });
});

describe('recommendationFor', () => {
  const cases: Array<[number, Recommendation]> = [
    [80, 'strongly_recommended'],
    [79.99, 'recommended'],
    [65, 'recommended'],
    [64.99, 'to_consider'],
    [50, 'to_consider'],
    [49.99, 'to_reject'],
    [0, 'to_reject'],
  ];

  it.each(cases)('should map %p to %s', (score, expected) => {
    expect(recommendationFor(score)).toBe(expected);
  });
});

describe('DecisionAggregator', () => {
  const aggregator = new DecisionAggregator();

  it('should rank by global score and keep evaluation order on ties', () => {
    const ranked = aggregator.rank([
      evaluation('Alice Martin', 50, 50, 50),
      evaluation('Bruno Petit', 60, 60, 60),
      evaluation('Chloe Roux', 50, 50, 50),
    ]);

    expect(ranked.map((e) => [e.profile.name, e.rank])).toEqual([
      ['Bruno Petit', 1],
      ['Alice Martin', 2],
      ['Chloe Roux', 3],
    ]);
    expect(ranked.map((e) => e.globalScore)).toEqual([60, 50, 50]);
  });

  it('should write a justification with strengths and gaps', () => {
    const [ranked] = aggregator.rank([evaluation('Jane Doe', 80, 40, 60, ['SQL'])]);

    expect(ranked.globalScore).toBe(58);
    expect(ranked.recommendation).toBe('to_consider');
    expect(ranked.justification).toBe(
      [
        'Candidate: Jane Doe (jane.doe.pdf)',
        'Global score: 58.0/100',
        'Recommendation: To consider',
        '',
        'Scores:',
        '- Profile: 80.0/100 - profile note',
        '- Technical: 40.0/100 - technical note',
        '- Soft skills: 60.0/100 - soft-skill note',
        '',
        'Strengths:',
        '✓ Experience and background fit the role',
        '',
        'Areas for improvement:',
        '⚠ Technical gaps on the requested skills (missing: SQL)',
      ].join('\n')
    );
  });

  it('should summarize a ranked list', () => {
    const ranked = aggregator.rank([
      evaluation('Jane Doe', 80, 40, 60),
      evaluation('Paul Martin', 80, 90, 70),
    ]);
    const report = aggregator.report(ranked, makeRequirement());

    expect(report.summary).toBe(
      '2 candidates evaluated for Data Engineer. Best: Paul Martin with 81.0/100 (Strongly recommended). ' +
        'Average global score 69.5/100. 1 strongly recommended, 1 to consider.'
    );
    expect(report.statistics?.totalCandidates).toBe(2);
    expect(report.statistics?.global).toEqual({ mean: 69.5, max: 81, min: 58 });
    expect(report.statistics?.recommendations).toEqual({
      strongly_recommended: 1,
      recommended: 0,
      to_consider: 1,
      to_reject: 0,
    });
    expect(report.topCandidates.map((e) => e.profile.name)).toEqual(['Paul Martin', 'Jane Doe']);
  });

  it('should keep only the top candidates in the report', () => {
    const ranked = aggregator.rank([
      evaluation('A One', 10, 10, 10),
      evaluation('B Two', 20, 20, 20),
      evaluation('C Three', 30, 30, 30),
      evaluation('D Four', 40, 40, 40),
    ]);

    const report = aggregator.report(ranked);
    expect(report.topCandidates.map((e) => e.profile.name)).toEqual(['D Four', 'C Three', 'B Two']);
    expect(report.summary.startsWith('4 candidates evaluated. Best: D Four')).toBe(true);
  });

  it('should report an empty candidate list without failing', () => {
    const report = aggregator.report(aggregator.rank([]), makeRequirement());

    expect(report.summary).toBe(NO_CANDIDATES_SUMMARY);
    expect(report.statistics).toBeNull();
    expect(report.topCandidates).toEqual([]);
  });
});
