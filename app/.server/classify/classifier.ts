/**
 * Rule-based activity classifier
 *
 * Order of evaluation:
 * 1. identifier rules
 * 2. app-name rules
 * 3. browsers only: title, then text, unless they also say Browsing
 * 4. title rules
 * 5. text keyword density
 * 6. Browsing for browsers, otherwise Other
 */

import type { ActivityCategory } from '~/types/activity-category';
import type { ClassificationRules, PatternRule, RuleSet } from './rules';
import { DEFAULT_RULES } from './rules';

export type AppIcon =
  | 'globe'
  | 'message'
  | 'code'
  | 'brush'
  | 'document'
  | 'chart'
  | 'play'
  | 'gear'
  | 'app';

const CATEGORY_ICONS: Partial<Record<ActivityCategory, AppIcon>> = {
  Browsing: 'globe',
  Communication: 'message',
  Development: 'code',
  Design: 'brush',
  Writing: 'document',
  Productivity: 'chart',
  Entertainment: 'play',
};

// Icon lookup walks the app-name families in this order
const ICON_ORDER: ActivityCategory[] = [
  'Browsing',
  'Communication',
  'Development',
  'Design',
  'Writing',
  'Productivity',
  'Entertainment',
];

export interface ActivityClassifier {
  classify(appName: string, appIdentifier: string, windowTitle: string, text?: string | null): ActivityCategory;
  iconForApp(appName: string): AppIcon;
}

function containsAny(value: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => value.includes(pattern));
}

function matchRuleSet(value: string, ruleSet: RuleSet, allowBrowser: boolean): ActivityCategory | null {
  const lower = value.toLowerCase();

  for (const rule of ruleSet.rules) {
    if (!containsAny(lower, rule.patterns)) continue;

    if (rule.category === 'Browsing' && !allowBrowser) {
      if (ruleSet.browserMatch === 'stop') return null;
      continue;
    }
    return rule.category;
  }

  return null;
}

function matchFirst(value: string, rules: readonly PatternRule[]): ActivityCategory | null {
  const lower = value.toLowerCase();
  const rule = rules.find((candidate) => containsAny(lower, candidate.patterns));
  return rule ? rule.category : null;
}

export class RuleBasedClassifier implements ActivityClassifier {
  constructor(private readonly rules: ClassificationRules = DEFAULT_RULES) {}

  classify(appName: string, appIdentifier: string, windowTitle: string, text?: string | null): ActivityCategory {
    const byIdentifier = matchRuleSet(appIdentifier, this.rules.identifiers, false);
    if (byIdentifier) return byIdentifier;

    const byName = matchRuleSet(appName, this.rules.appNames, false);
    if (byName) return byName;

    const isBrowser =
      matchRuleSet(appIdentifier, this.rules.identifiers, true) === 'Browsing' ||
      matchRuleSet(appName, this.rules.appNames, true) === 'Browsing';

    if (isBrowser) {
      const byTitle = this.classifyByTitle(windowTitle);
      if (byTitle && byTitle !== 'Browsing') return byTitle;

      const byText = text ? this.classifyByText(text) : null;
      if (byText && byText !== 'Browsing') return byText;
    }

    const byTitle = this.classifyByTitle(windowTitle);
    if (byTitle) return byTitle;

    const byText = text ? this.classifyByText(text) : null;
    if (byText) return byText;

    return isBrowser ? 'Browsing' : 'Other';
  }

  iconForApp(appName: string): AppIcon {
    const lower = appName.toLowerCase();

    for (const category of ICON_ORDER) {
      const rule = this.rules.appNames.rules.find((candidate) => candidate.category === category);
      const icon = CATEGORY_ICONS[category];
      if (rule && icon && containsAny(lower, rule.patterns)) return icon;
    }

    if (containsAny(lower, this.rules.systemAppNames)) return 'gear';

    return 'app';
  }

  classifyByTitle(windowTitle: string): ActivityCategory | null {
    return matchFirst(windowTitle, this.rules.titleRules);
  }

  /**
   * Keyword density over extracted text. Needs at least `minTextWords` words;
   * the best category must reach `minTextHits`, and ties go to the earlier rule.
   */
  classifyByText(text: string): ActivityCategory | null {
    const lower = text.toLowerCase();
    const wordCount = lower.split(/\s+/).filter((word) => word.length > 0).length;
    if (wordCount < this.rules.minTextWords) return null;

    let best: { category: ActivityCategory; hits: number } | null = null;
    for (const rule of this.rules.textRules) {
      const hits = rule.patterns.filter((keyword) => lower.includes(keyword)).length;
      if (!best || hits > best.hits) {
        best = { category: rule.category, hits };
      }
    }

    return best && best.hits >= this.rules.minTextHits ? best.category : null;
  }
}

const defaultClassifier = new RuleBasedClassifier();

export function classify(
  appName: string,
  appIdentifier: string,
  windowTitle: string,
  text?: string | null
): ActivityCategory {
  return defaultClassifier.classify(appName, appIdentifier, windowTitle, text);
}

export function iconForApp(appName: string): AppIcon {
  return defaultClassifier.iconForApp(appName);
}
