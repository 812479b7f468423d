import { describe, expect, it } from 'vitest';
import { classify, iconForApp, RuleBasedClassifier } from './classifier';
import { productivityScore } from './productivity';
import { ACTIVITY_CATEGORIES } from '~/types/activity-category';

describe('classify', () => {
  it('matches known identifiers first', () => {
    expect(classify('Spotify', 'com.spotify.client', 'Now Playing', null)).toBe('Entertainment');
    expect(classify('Xcode', 'com.apple.dt.Xcode', 'AppDelegate.swift', null)).toBe('Development');
  });

  it('falls back to app name substrings', () => {
    expect(classify('Slack', 'org.example.chat', '', null)).toBe('Communication');
    expect(classify('Figma', 'org.example.design', '', null)).toBe('Design');
  });

  it('refines browsers with window title signals', () => {
    expect(classify('Safari', 'com.apple.Safari', 'Pull Request #12 · repo', null)).toBe('Development');
    expect(classify('Google Chrome', 'com.google.Chrome', 'Inbox (3) - Gmail', null)).toBe('Communication');
  });

  it('refines browsers with extracted text when the title says nothing', () => {
    const text = 'const x = 1; function foo() { return x }';
    expect(classify('Safari', 'com.apple.Safari', 'Docs', text)).toBe('Development');
  });

  it('defaults browsers to Browsing', () => {
    expect(classify('Safari', 'com.apple.Safari', 'Apple', null)).toBe('Browsing');
    expect(classify('Arc', 'org.example.unknown', '', null)).toBe('Browsing');
  });

  it('returns Other when nothing matches', () => {
    expect(classify('Foo', 'org.example.foo', '', 'hello')).toBe('Other');
  });

  it('ignores text with three words or fewer', () => {
    expect(classify('Foo', 'org.example.foo', '', 'import class return')).toBe('Other');
    expect(classify('Foo', 'org.example.foo', '', 'import class return value')).toBe('Development');
  });

  it('breaks keyword ties in favour of the earlier category', () => {
    expect(classify('Foo', 'org.example.foo', '', 'reply paragraph heading inbox now')).toBe('Communication');
  });

  it('is deterministic and stays inside the category set', () => {
    const inputs: Array<[string, string, string, string | null]> = [
      ['Spotify', 'com.spotify.client', 'Now Playing', null],
      ['Safari', 'com.apple.Safari', 'github.com/org/repo', 'git branch merge'],
      ['', '', '', ''],
      ['Notes', 'com.apple.Notes', 'Draft', 'paragraph heading bold italic'],
    ];
    for (const [name, id, title, text] of inputs) {
      const first = classify(name, id, title, text);
      expect(classify(name, id, title, text)).toBe(first);
      expect(ACTIVITY_CATEGORIES).toContain(first);
    }
  });
});

describe('RuleBasedClassifier.classifyByText', () => {
  const classifier = new RuleBasedClassifier();

  it('needs at least two keyword hits', () => {
    expect(classifier.classifyByText('the build is green today')).toBeNull();
    expect(classifier.classifyByText('the build failed with an error')).toBe('Development');
  });
});

describe('iconForApp', () => {
  it('maps app families to icon hints', () => {
    expect(iconForApp('Safari')).toBe('globe');
    expect(iconForApp('Slack')).toBe('message');
    expect(iconForApp('Xcode')).toBe('code');
    expect(iconForApp('Activity Monitor')).toBe('gear');
    expect(iconForApp('Unknown Thing')).toBe('app');
  });
});

describe('productivityScore', () => {
  it('weights categories by duration', () => {
    expect(productivityScore([{ category: 'Entertainment', duration: 7200 }])).toBeCloseTo(0.1);
    expect(
      productivityScore([
        { category: 'Development', duration: 3600 },
        { category: 'Entertainment', duration: 3600 },
      ])
    ).toBeCloseTo(0.525);
  });

  it('scores empty or zero-length input as 0', () => {
    expect(productivityScore([])).toBe(0);
    expect(productivityScore([{ category: 'Development', duration: 0 }])).toBe(0);
  });
});
