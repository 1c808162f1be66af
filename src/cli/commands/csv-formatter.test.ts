import { describe, it, expect } from 'vitest';
import { formatCsv } from './csv-formatter.js';
import { aggregateResults } from '../../core/analyzer.js';
import { makeFile, makeFunction } from '../../test-utils/fixtures.js';

describe('formatCsv', () => {
  it('should write one row per file after the header', () => {
    const result = aggregateResults('demo', [
      makeFile({
        path: 'bad.py',
        loc: 0,
        classification: 'unavailable',
        error: { kind: 'parse', message: 'bad.py:2: invalid syntax', line: 2 },
      }),
      makeFile({
        path: 'calc.py',
        loc: 12,
        pureLoc: 12,
        classification: 'logic',
        webReadyPercentage: 100,
        functions: [makeFunction({ name: 'total', file: 'calc.py', startLine: 1, endLine: 12 })],
      }),
      makeFile({
        path: 'views.py',
        loc: 10,
        pureLoc: 3,
        uiPercentage: 40,
        classification: 'mixed',
        webReadyPercentage: 30,
        functions: [
          makeFunction({ name: 'draw', file: 'views.py', startLine: 1, endLine: 4, uiCalls: ['tk.Label'] }),
          makeFunction({ name: 'parse', file: 'views.py', startLine: 5, endLine: 7 }),
        ],
      }),
    ]);

    expect(formatCsv(result)).toBe(
      [
        'File Path,Lines of Code,UI Percentage (%),Pure Functions,Classification,Web Ready',
        'bad.py,0,0.0,0,Unavailable,No',
        'calc.py,12,0.0,1,Logic,Yes',
        'views.py,10,40.0,1,Mixed,Partial',
        '',
      ].join('\n')
    );
  });

  it('should mark UI files and files without pure functions as not ready', () => {
    const result = aggregateResults('demo', [
      makeFile({ path: 'main.py', loc: 20, uiPercentage: 95, classification: 'ui' }),
      makeFile({ path: 'state.py', loc: 8, uiPercentage: 12.5, classification: 'mixed' }),
    ]);

    expect(formatCsv(result).split('\n').slice(1, 3)).toEqual([
      'main.py,20,95.0,0,UI,No',
      'state.py,8,12.5,0,Mixed,No',
    ]);
  });

  it('should quote paths that contain separators', () => {
    const result = aggregateResults('demo', [makeFile({ path: 'odd,name.py', loc: 5 })]);
    expect(formatCsv(result).split('\n')[1]).toBe('"odd,name.py",5,0.0,0,Mixed,No');
  });
});
