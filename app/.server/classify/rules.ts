import { z } from 'zod';
import { ACTIVITY_CATEGORIES } from '~/types/activity-category';
import type { ActivityCategory } from '~/types/activity-category';
import rawRules from './rules.json';

const CategorySchema = z.custom<ActivityCategory>(
  (value) => ACTIVITY_CATEGORIES.some((category) => category === value),
  { message: 'unknown activity category' }
);

const PatternRuleSchema = z.object({
  category: CategorySchema,
  patterns: z.array(z.string().min(1)).min(1),
});

/**
 * An ordered rule list. `browserMatch` says what a Browsing hit does when
 * browsers are not being asked about: `stop` ends the scan with no match,
 * `skip` moves on to the next rule.
 */
const RuleSetSchema = z.object({
  browserMatch: z.enum(['stop', 'skip']),
  rules: z.array(PatternRuleSchema).min(1),
});

export const ClassificationRulesSchema = z.object({
  identifiers: RuleSetSchema,
  appNames: RuleSetSchema,
  systemAppNames: z.array(z.string().min(1)),
  titleRules: z.array(PatternRuleSchema),
  textRules: z.array(PatternRuleSchema),
  minTextWords: z.number().int().positive(),
  minTextHits: z.number().int().positive(),
});

export type PatternRule = z.infer<typeof PatternRuleSchema>;
export type RuleSet = z.infer<typeof RuleSetSchema>;
export type ClassificationRules = z.infer<typeof ClassificationRulesSchema>;

export const DEFAULT_RULES: ClassificationRules = ClassificationRulesSchema.parse(rawRules);
