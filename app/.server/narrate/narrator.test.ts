import { describe, expect, it } from 'vitest';
import { formatDuration, truncateTitle } from './format';
import { HeuristicNarrator, NO_ACTIVITY_NARRATIVE } from './narrator';

describe('formatDuration', () => {
  it('uses seconds below a minute', () => {
    expect(formatDuration(45)).toBe('45s');
    expect(formatDuration(59.9)).toBe('59s');
  });

  it('uses minutes below an hour and omits zero seconds', () => {
    expect(formatDuration(60)).toBe('1m');
    expect(formatDuration(200)).toBe('3m 20s');
  });

  it('uses hours and omits zero minutes', () => {
    expect(formatDuration(3600)).toBe('1h');
    expect(formatDuration(3659)).toBe('1h');
    expect(formatDuration(7500)).toBe('2h 5m');
  });
});

describe('truncateTitle', () => {
  it('cuts long titles with an ellipsis', () => {
    expect(truncateTitle('a'.repeat(60))).toBe(`${'a'.repeat(50)}...`);
    expect(truncateTitle('  short  ')).toBe('short');
  });
});

describe('HeuristicNarrator.summarizeActivity', () => {
  const narrator = new HeuristicNarrator();

  it('names the file being edited', () => {
    expect(narrator.summarizeActivity('Xcode', 'AppDelegate.swift — MyApp', null, 'Development', 150))
      .toBe('Editing AppDelegate.swift in Xcode for 2m 30s.');
  });

  it('quotes the last terminal command', () => {
    expect(narrator.summarizeActivity('Terminal', 'zsh', 'ls\n~/code $ npm test\n', 'Development', 45))
      .toBe('Working in terminal (~/code $ npm test) for 45s.');
    expect(narrator.summarizeActivity('Terminal', 'zsh', null, 'Development', 45))
      .toBe('Working in Terminal for 45s.');
  });

  it('recognises mail and browsing context', () => {
    expect(narrator.summarizeActivity('Mail', 'Inbox - Work', null, 'Communication', 600))
      .toBe('Checking email in Mail for 10m.');
    expect(narrator.summarizeActivity('Safari', 'Apple', null, 'Browsing', 300))
      .toBe('Browsing "Apple" in Safari for 5m.');
  });

  it('falls back to the generic template', () => {
    expect(narrator.summarizeActivity('Foo', 'Some Window', null, 'Other', 60)).toBe('Using Foo for 1m.');
    expect(narrator.summarizeActivity('Xcode', '   ', null, 'Development', 30)).toBe('Working in Xcode for 30s.');
    expect(narrator.summarizeActivity('Spotify', '', null, 'Entertainment', 7200))
      .toBe('Using Spotify for leisure (2h).');
  });
});

describe('HeuristicNarrator.summarizeDay', () => {
  const narrator = new HeuristicNarrator();

  it('returns the fixed sentence for an empty day', () => {
    expect(narrator.summarizeDay([], 0, [], 0)).toBe(NO_ACTIVITY_NARRATIVE);
  });

  it('composes headline, apps, focus, tier and notable categories', () => {
    const narrative = narrator.summarizeDay(
      [
        { category: 'Development', duration: 2400 },
        { category: 'Communication', duration: 1200 },
      ],
      3600,
      [{ appName: 'Xcode' }, { appName: 'Mail' }],
      0.5
    );

    expect(narrative).toBe(
      'You spent 1h 0m on screen today across 2 activities. ' +
        'Most time was spent in Xcode and Mail. ' +
        'Development was your primary focus at 66% of total time. ' +
        'Productivity score: 50%, a balanced day of work and other activities. ' +
        'Development work totaled 40m. ' +
        'Communication took 20m.'
    );
  });

  it('lists three apps and reports a leisure day in minutes', () => {
    const narrative = narrator.summarizeDay(
      [{ category: 'Entertainment', duration: 600 }],
      600,
      [{ appName: 'Spotify' }, { appName: 'Music' }, { appName: 'TV' }, { appName: 'Steam' }],
      0.1
    );

    expect(narrative).toBe(
      'You spent 10 minutes on screen today across 1 activities. ' +
        'Top apps: Spotify, Music, and TV. ' +
        'Entertainment was your primary focus at 100% of total time. ' +
        'Productivity score: 10%, mostly leisure and non-work activities.'
    );
  });
});
