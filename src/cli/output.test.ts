import { describe, expect, it } from 'vitest';

import { stripAnsi } from '../utils/text';
import { formatStatusLabel, renderNextSteps, renderSuccessSummary } from './output';

describe('formatStatusLabel', () => {
  it('title-cases outcomes', () => {
    expect(stripAnsi(formatStatusLabel('published'))).toBe('Published');
    expect(stripAnsi(formatStatusLabel('export_failed'))).toBe('Export Failed');
  });
});

describe('renderSuccessSummary', () => {
  it('aligns details under a ruled title', () => {
    const output = renderSuccessSummary({
      title: 'Roadmap sync',
      details: [
        ['Status', 'Unchanged'],
        ['Open', '3'],
      ],
    });

    expect(stripAnsi(output).split('\n')).toEqual([
      'Roadmap sync',
      '-'.repeat(60),
      'Status         Unchanged',
      'Open           3',
    ]);
  });
});

describe('renderNextSteps', () => {
  it('is empty without steps', () => {
    expect(renderNextSteps([])).toBe('');
  });
});
