import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'util';
import { formatConfidence, formatSearchResult, formatSuggestions, formatUpdates } from '../utils/format.js';

const plain = (lines: string[]) => lines.map(line => stripVTControlCharacters(line));

describe('format', () => {
  it('renders confidence as a percentage', () => {
    expect(formatConfidence(0.73)).toBe('73%');
    expect(formatConfidence(1)).toBe('100%');
  });

  it('renders an empty suggestion list', () => {
    expect(plain(formatSuggestions({ suggestions: [], method: 'embedding' }))).toEqual(['No matching skills']);
  });

  it('renders a fallback suggestion with its reason', () => {
    const lines = plain(
      formatSuggestions({
        method: 'keyword fallback',
        degradedReason: 'timeout',
        suggestions: [
          {
            skillId: 'lucky-number',
            confidence: 0.33,
            score: 1 / 3,
            method: 'keyword fallback',
            reasoning: 'keyword fallback overlap 0.33 (matched: test)',
            skillMetadata: { name: 'Lucky Number Generator', description: 'Generates a lucky number', category: 'general', capabilities: [] },
            installed: false,
          },
        ],
      }),
    );

    expect(lines).toEqual([
      'Suggested skills (keyword fallback):',
      '  embedding path unavailable: timeout',
      '',
      '  Lucky Number Generator 33%',
      '    Generates a lucky number',
      '    lucky-number · keyword fallback overlap 0.33 (matched: test)',
    ]);
  });

  it('reports when everything is current', () => {
    expect(plain(formatUpdates({ availableUpdates: [], newSkills: [], checkedAt: '2025-01-01T00:00:00.000Z' }))).toEqual([
      'All skills up to date',
    ]);
  });

  it('renders an empty context search', () => {
    expect(plain(formatSearchResult({ count: 0, total: 0, filters: {}, data: [] }))).toEqual(['No matching contexts']);
  });
});
