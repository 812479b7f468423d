/**
 * Narrator
 *
 * Turns classified activity into sentences: one per activity entry and one
 * narrative per day. Template based; no I/O.
 */

import type { ActivityCategory } from '~/types/activity-category';
import type { ActivityEntry } from '~/types/activity-entry';
import { formatDuration, truncateTitle } from './format';

export interface Narrator {
  /** Display name of the backend */
  readonly backendName: string;
  readonly isReady: boolean;

  summarizeActivity(
    appName: string,
    windowTitle: string,
    text: string | null,
    category: ActivityCategory,
    duration: number
  ): string;

  summarizeDay(
    entries: readonly Pick<ActivityEntry, 'category' | 'duration'>[],
    totalScreenTime: number,
    topApps: readonly { appName: string }[],
    productivityScore: number
  ): string;
}

export const NO_ACTIVITY_NARRATIVE = 'No activity recorded today.';

const SOURCE_EXTENSIONS = ['.swift', '.py', '.ts', '.js', '.rs', '.go'];
const TERMINAL_APPS = ['terminal', 'iterm', 'warp'];
const PROMPT_MARKERS = ['$', '%', '>'];
const MAX_COMMAND_LENGTH = 60;

const DEVELOPMENT_FLOOR_SECONDS = 30 * 60;
const COMMUNICATION_FLOOR_SECONDS = 15 * 60;

function productivityTier(score: number): string {
  const pct = Math.trunc(score * 100);
  if (score >= 0.75) return `Productivity score: ${pct}%, a highly focused day.`;
  if (score >= 0.5) return `Productivity score: ${pct}%, a balanced day of work and other activities.`;
  if (score >= 0.25) return `Productivity score: ${pct}%, a lighter work day.`;
  return `Productivity score: ${pct}%, mostly leisure and non-work activities.`;
}

function topAppsClause(names: string[]): string | null {
  const [first, second, third] = names;
  if (first === undefined) return null;
  if (second === undefined) return `Most time was spent in ${first}.`;
  if (third === undefined) return `Most time was spent in ${first} and ${second}.`;
  return `Top apps: ${first}, ${second}, and ${third}.`;
}

/**
 * Last prompt-looking line of terminal text, trimmed and shortened
 */
function lastCommand(text: string | null): string | null {
  if (!text) return null;
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0);
  const line = [...lines].reverse().find((candidate) => PROMPT_MARKERS.some((marker) => candidate.includes(marker)));
  if (line === undefined) return null;

  const command = line.trim();
  return command.length > MAX_COMMAND_LENGTH ? `${command.slice(0, MAX_COMMAND_LENGTH)}...` : command;
}

export class HeuristicNarrator implements Narrator {
  readonly backendName = 'Heuristic Engine';
  readonly isReady = true;

  summarizeActivity(
    appName: string,
    windowTitle: string,
    text: string | null,
    category: ActivityCategory,
    duration: number
  ): string {
    const formatted = formatDuration(duration);
    return (
      this.contextualSummary(appName, windowTitle, text, category, formatted) ??
      this.genericSummary(appName, category, formatted)
    );
  }

  summarizeDay(
    entries: readonly Pick<ActivityEntry, 'category' | 'duration'>[],
    totalScreenTime: number,
    topApps: readonly { appName: string }[],
    productivityScore: number
  ): string {
    if (entries.length === 0) {
      return NO_ACTIVITY_NARRATIVE;
    }

    const parts: string[] = [];

    const hours = Math.floor(totalScreenTime / 3600);
    const minutes = Math.floor((totalScreenTime % 3600) / 60);
    parts.push(
      hours > 0
        ? `You spent ${hours}h ${minutes}m on screen today`
        : `You spent ${minutes} minutes on screen today`
    );
    parts.push(`across ${entries.length} activities.`);

    const appsClause = topAppsClause(topApps.slice(0, 3).map((app) => app.appName));
    if (appsClause) parts.push(appsClause);

    const byCategory = new Map<ActivityCategory, number>();
    for (const entry of entries) {
      byCategory.set(entry.category, (byCategory.get(entry.category) ?? 0) + entry.duration);
    }

    let top: [ActivityCategory, number] | null = null;
    for (const pair of byCategory) {
      if (!top || pair[1] > top[1]) top = pair;
    }
    if (top && totalScreenTime > 0) {
      const pct = Math.trunc((top[1] / totalScreenTime) * 100);
      parts.push(`${top[0]} was your primary focus at ${pct}% of total time.`);
    }

    parts.push(productivityTier(productivityScore));

    const development = byCategory.get('Development') ?? 0;
    if (development >= DEVELOPMENT_FLOOR_SECONDS) {
      parts.push(`Development work totaled ${formatDuration(development)}.`);
    }

    const communication = byCategory.get('Communication') ?? 0;
    if (communication >= COMMUNICATION_FLOOR_SECONDS) {
      parts.push(`Communication took ${formatDuration(communication)}.`);
    }

    return parts.join(' ');
  }

  private contextualSummary(
    appName: string,
    windowTitle: string,
    text: string | null,
    category: ActivityCategory,
    duration: string
  ): string | null {
    const title = windowTitle.trim();
    if (!title) return null;

    switch (category) {
      case 'Development':
        return this.developmentSummary(appName, title, text, duration);
      case 'Communication':
        return this.communicationSummary(appName, title, duration);
      case 'Browsing':
        return `Browsing "${truncateTitle(title)}" in ${appName} for ${duration}.`;
      case 'Writing':
        return `Writing in ${appName}: "${truncateTitle(title)}" for ${duration}.`;
      case 'Design':
        return `Designing in ${appName}: "${truncateTitle(title)}" for ${duration}.`;
      case 'Entertainment':
        return `Watching/listening: "${truncateTitle(title)}" in ${appName} for ${duration}.`;
      case 'Productivity':
        return `Using ${appName} (${truncateTitle(title)}) for ${duration}.`;
      case 'Other':
        return null;
    }
  }

  private developmentSummary(appName: string, title: string, text: string | null, duration: string): string {
    const firstPart = title.split(' — ')[0] ?? title;
    if (SOURCE_EXTENSIONS.some((ext) => firstPart.includes(ext))) {
      return `Editing ${firstPart} in ${appName} for ${duration}.`;
    }

    const lowerTitle = title.toLowerCase();
    const lowerApp = appName.toLowerCase();

    if (lowerTitle.includes('terminal') || TERMINAL_APPS.some((app) => lowerApp.includes(app))) {
      const command = lastCommand(text);
      return command
        ? `Working in terminal (${command}) for ${duration}.`
        : `Working in ${appName} for ${duration}.`;
    }

    if (lowerTitle.includes('pull request') || lowerTitle.includes('merge request')) {
      return `Reviewing a pull request in ${appName} for ${duration}.`;
    }

    if (lowerTitle.includes('github.com') || lowerTitle.includes('gitlab.com')) {
      return `Browsing code repositories for ${duration}.`;
    }

    return `Working in ${appName} on "${truncateTitle(firstPart)}" for ${duration}.`;
  }

  private communicationSummary(appName: string, title: string, duration: string): string {
    const lower = title.toLowerCase();
    if (lower.includes('inbox')) {
      return `Checking email in ${appName} for ${duration}.`;
    }
    if (lower.includes('compose') || lower.includes('new message')) {
      return `Writing a message in ${appName} for ${duration}.`;
    }
    if (lower.includes('meeting') || lower.includes('call')) {
      return `In a meeting/call via ${appName} for ${duration}.`;
    }
    return `Communicating via ${appName} (${truncateTitle(title)}) for ${duration}.`;
  }

  private genericSummary(appName: string, category: ActivityCategory, duration: string): string {
    switch (category) {
      case 'Development': return `Working in ${appName} for ${duration}.`;
      case 'Communication': return `Communicating via ${appName} for ${duration}.`;
      case 'Browsing': return `Browsing in ${appName} for ${duration}.`;
      case 'Entertainment': return `Using ${appName} for leisure (${duration}).`;
      case 'Design': return `Designing in ${appName} for ${duration}.`;
      case 'Writing': return `Writing in ${appName} for ${duration}.`;
      case 'Productivity': return `Working in ${appName} for ${duration}.`;
      case 'Other': return `Using ${appName} for ${duration}.`;
    }
  }
}
