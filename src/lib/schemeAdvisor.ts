import { logger } from './logger.js';
import type { ContentStore } from './contentStore.js';
import type { Scheme } from '../types/content.js';

export interface EligibilityProfile {
  age?: number;
  /**
   * Accepted for forward compatibility. No filter reads it yet, even though
   * some schemes carry an income_limit.
   */
  income?: number;
  occupation?: string;
}

type TargetGroupRule = (profile: { age?: number; occupation: string }) => boolean;

const GIRL_CHILD_AGE_BELOW = 10;
const SENIOR_CITIZEN_MIN_AGE = 55;

const mentionsAny = (occupation: string, keywords: readonly string[]) =>
  keywords.some(keyword => occupation.includes(keyword));

// A rule returns false to exclude the scheme. Unknown age or an empty
// occupation never excludes.
const TARGET_GROUP_RULES: Readonly<Record<string, TargetGroupRule>> = {
  farmers: ({ occupation }) => !occupation || mentionsAny(occupation, ['farm', 'agri']),
  girl_child: ({ age }) => age === undefined || age < GIRL_CHILD_AGE_BELOW,
  senior_citizens: ({ age }) => age === undefined || age >= SENIOR_CITIZEN_MIN_AGE,
  // Raw substring match: "student" and "scientist" pass too.
  sc_st_women: ({ occupation }) => !occupation || mentionsAny(occupation, ['sc', 'st', 'women']),
};

export class SchemeAdvisor {
  constructor(private readonly store: ContentStore) {}

  findEligible(profile: EligibilityProfile = {}): Scheme[] {
    const { age } = profile;
    const occupation = (profile.occupation ?? '').toLowerCase();

    const eligible = this.store.schemes.filter(scheme => {
      if (scheme.min_age !== null && age !== undefined && age < scheme.min_age) return false;
      if (scheme.max_age !== null && age !== undefined && age > scheme.max_age) return false;

      if (!Object.hasOwnProperty.call(TARGET_GROUP_RULES, scheme.target_group)) return true;
      return TARGET_GROUP_RULES[scheme.target_group]({ age, occupation });
    });

    logger.debug({ ...profile, matches: eligible.length }, 'Scheme eligibility evaluated');
    return eligible;
  }

  /** First scheme whose name contains `name`, ignoring case. */
  getScheme(name: string): Scheme | null {
    const needle = name.toLowerCase();
    return this.store.schemes.find(scheme => scheme.name.toLowerCase().includes(needle)) ?? null;
  }

  all(): Scheme[] {
    return [...this.store.schemes];
  }
}
