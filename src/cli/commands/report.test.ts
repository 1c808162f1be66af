import { describe, it, expect } from 'vitest';
import { formatReport } from './report.js';
import { aggregateResults } from '../../core/analyzer.js';
import { makeFile, makeFunction } from '../../test-utils/fixtures.js';

describe('formatReport', () => {
  const result = aggregateResults('demo', [
    makeFile({
      path: 'logic.py',
      loc: 12,
      pureLoc: 12,
      classification: 'logic',
      webReadyPercentage: 100,
      functions: [makeFunction({ name: 'total', file: 'logic.py', startLine: 1, endLine: 12 })],
    }),
    makeFile({
      path: 'bad.py',
      loc: 0,
      classification: 'unavailable',
      error: { kind: 'parse', message: 'bad.py:2: invalid syntax', line: 2 },
    }),
  ]);
  const lines = formatReport(result).split('\n');

  it('should start with the headline numbers', () => {
    expect(lines.slice(0, 7)).toEqual([
      'Project: demo',
      'Web readiness: 100.0% (complexity: low)',
      '',
      'Files: 1 analyzed, 1 failed, 12 LOC',
      '  UI: 0  Logic: 1  Mixed: 0',
      '  Classes: 0  Functions: 1 (1 pure)',
      '  Toolkits: none',
    ]);
  });

  it('should list every file, failed ones with their error', () => {
    expect(lines).toContain('Files (2)');
    expect(lines).toContain('  logic.py  logic        ui   0.0%  ready 100.0%  12 loc');
    expect(lines).toContain('  bad.py    unavailable  bad.py:2: invalid syntax');
  });

  it('should list suggestions with their location', () => {
    expect(lines).toContain('Extraction suggestions (1)');
    expect(lines).toContain('  logic.py:1-12  total  Pure function (12 lines) with no UI calls or external state');
    expect(lines).toContain('Refactoring suggestions (0)');
  });

  it('should end with the conversion guide', () => {
    expect(lines).toContain('  Project has 1 web-ready files and 0 files requiring UI conversion');
    expect(lines).toContain('  Reusable modules: logic.py');
    expect(lines.at(-1)).toBe('  - 1 files could not be analyzed and were excluded from the score');
  });
});
