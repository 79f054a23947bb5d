/**
 * Concept Extraction Tests
 */

import { describe, it, expect } from 'vitest';

import { createMockFeatureSet } from '../../__tests__/fakes';
import { extractConcepts, parseTopicLines } from '../concepts';

describe('parseTopicLines', () => {
  it('should strip list markers, emphasis and trailing punctuation', () => {
    expect(parseTopicLines('1. AI Ethics\n2. **Stoicism**\n- data privacy.\nTopics:\n')).toEqual([
      'AI Ethics',
      'Stoicism',
      'data privacy',
    ]);
  });

  it('should strip bullets and quotes', () => {
    expect(parseTopicLines('* "Open source"\n• Chess;\n3) Travel')).toEqual([
      'Open source',
      'Chess',
      'Travel',
    ]);
  });

  it('should drop lines longer than 80 characters', () => {
    const long = 'word '.repeat(20).trim();
    expect(parseTopicLines(`${long}\nHiking`)).toEqual(['Hiking']);
  });
});

describe('extractConcepts', () => {
  it('should count repeated topics by normalized name and keep the first display name', () => {
    const first = createMockFeatureSet({ featureSetID: 'fs-a', outputText: 'AI Ethics\nStoicism' });
    const second = createMockFeatureSet({ featureSetID: 'fs-b', outputText: '- ai  ethics\n- Gardening' });

    expect(extractConcepts([first, second])).toEqual([
      { name: 'AI Ethics', frequency: 2 },
      { name: 'Stoicism', frequency: 1 },
      { name: 'Gardening', frequency: 1 },
    ]);
  });

  it('should only read successful topic feature sets', () => {
    const style = createMockFeatureSet({ analysisTask: 'style', outputText: 'Formal' });
    const failed = createMockFeatureSet({ status: 'failure_adapter_error', outputText: 'Chess' });

    expect(extractConcepts([style, failed])).toEqual([]);
  });
});
