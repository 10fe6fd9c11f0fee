/**
 * Regular expressions for contacts, dates, durations and salaries.
 *
 * Global expressions are only ever consumed through `matchAll`, which works
 * on a copy, so the shared instances carry no `lastIndex` state.
 */

import { escapeRegExp } from './matching.js';

export interface TextPatterns {
  email: RegExp;
  phones: RegExp[];
  experienceRange: RegExp;
  experienceSingle: RegExp[];
  salaryRange: RegExp;
  salaryPerYear: RegExp;
  salaryLabelled: RegExp;
  experienceEntries: RegExp[];
  educationDegree: RegExp;
  educationDated: RegExp;
  year: RegExp;
}

const YEAR_UNIT = '(?:ans?|années?|years?|yrs?)';

export function buildTextPatterns(presentWords: readonly string[], degreeWords: readonly string[]): TextPatterns {
  const present = presentWords
    .flatMap((word) => [word, word.charAt(0).toUpperCase() + word.slice(1)])
    .map(escapeRegExp)
    .join('|');
  const degrees = degreeWords.map(escapeRegExp).join('|');
  const date = '(\\d{4}|\\d{1,2}\\/\\d{4})';

  return {
    email: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/,
    phones: [
      /(?<!\d)0[1-9](?:[.\s-]?\d{2}){4}(?!\d)/,
      /\+\d{1,3}[\s.-]?\d{1,4}[\s.-]?\d{1,4}[\s.-]?\d{1,9}/,
    ],

    // Run over lower-cased text.
    experienceRange: new RegExp(`(\\d{1,2})\\s*(?:-|–|à|to)\\s*(\\d{1,2})\\s*${YEAR_UNIT}(?![\\p{L}])`, 'gu'),
    experienceSingle: [
      /(\d{1,2})\s*\+?\s*ans?\s*d['’\s]\s*exp/gu,
      new RegExp(`(?:minimum|au moins|at least)\\s*(?:of\\s*)?(\\d{1,2})\\s*\\+?\\s*${YEAR_UNIT}`, 'gu'),
      new RegExp(`(\\d{1,2})\\s*\\+?\\s*${YEAR_UNIT}(?![\\p{L}])`, 'gu'),
    ],

    // Run over lower-cased text with every space removed.
    salaryRange: /(\d+)(k)?(?:€|euros?)?[-–](\d+)(k€|k|€|euros?)/,
    salaryPerYear: /(\d+)(k)?(?:€|euros?)\/(?:an|année|year|yr|annum)/,
    salaryLabelled: /(?:salaire|salary|rémunération|remuneration):?€?(\d+)(k)?/,

    experienceEntries: [
      new RegExp(
        `(\\p{Lu}[^.\\n(]{10,60}?)\\s*[-–]\\s*${date}\\s*[-–]?\\s*(\\d{4}|\\d{1,2}\\/\\d{4}|${present})?`,
        'gu'
      ),
      new RegExp(`(\\p{Lu}[^.\\n(]{10,60}?)\\s*\\((\\d{4})\\s*[-–]\\s*(\\d{4}|${present})\\)`, 'gu'),
    ],
    educationDegree: new RegExp(`(?<![\\p{L}])(?:${degrees})(?![\\p{L}])[^.\\n]{0,100}`, 'gu'),
    educationDated: /(\p{Lu}[^.\n]{10,60}?)\s*[-–]\s*(\d{4})/gu,
    year: /\d{4}/,
  };
}
