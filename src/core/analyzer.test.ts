import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import { AnalysisRun, analyzeFile, analyzeProject, decodeSource } from './analyzer.js';
import {
  AnalysisCancelledError,
  AnalysisTimeoutError,
  EmptyInputError,
  InvalidInputError,
  UnsupportedEncodingError,
} from './errors.js';
import { loadPythonParser, type PythonParser } from './ast/tree-sitter/parser.js';
import type { AnalysisInput, ProgressEvent, SourceFile } from '../types/analysis.js';

const WINDOW_AND_HELPER = `def show_window():
    import tkinter as tk
    root = tk.Tk()
    label = tk.Label(root, text="hello")
    label.pack()
    button = tk.Button(root, text="ok")
    button.pack()
    entry = tk.Entry(root)
    entry.pack()
    root.mainloop()

def add_totals(a, b):
    total = a + b
    doubled = total * 2
    return doubled
`;

const STATISTICS = `def compute(values):
    total = 0
    count = 0
    for v in values:
        total += v
        count += 1
    if count == 0:
        return 0
    mean = total / count
    squares = 0
    for v in values:
        squares += (v - mean) ** 2
    variance = squares / count
    result = {
        "mean": mean,
        "variance": variance,
        "count": count,
        "largest": max(values, default=0),
    }
    return result
`;

const PRICING = `TAX_RATE = 0.2


def net_price(price, quantity):
    subtotal = price * quantity
    tax = subtotal * TAX_RATE
    return subtotal + tax
`;

const APP_WINDOW = `import tkinter as tk


class App(tk.Tk):
    def __init__(self):
        super().__init__()
        self.title("Demo")
        self.label = tk.Label(self, text="hi")
        self.label.pack()
`;

const DIALOGS = `from PyQt5.QtWidgets import QMessageBox

history = []


def record(entry):
    history.append(entry)
    return len(history)


def warn(parent, text):
    QMessageBox.warning(parent, "Warning", text)
    return False


def slugify(title):
    lowered = title.lower()
    return lowered.replace(" ", "-")
`;

const BROKEN = `def broken(:
    pass
`;

function project(files: SourceFile[]): AnalysisInput {
  return { projectName: 'demo', files };
}

describe('decodeSource', () => {
  it('should strip a byte-order mark', () => {
    expect(decodeSource({ path: 'a.py', content: '\uFEFFx = 1\n' })).toBe('x = 1\n');
    expect(decodeSource({ path: 'a.py', content: new Uint8Array([0xef, 0xbb, 0xbf, 0x78]) })).toBe('x');
  });

  it('should reject bytes that are not UTF-8', () => {
    expect(() => decodeSource({ path: 'latin.py', content: new Uint8Array([0x78, 0xff]) })).toThrow(
      UnsupportedEncodingError
    );
  });
});

describe('analyzeFile', () => {
  let parser: PythonParser;

  beforeAll(async () => {
    parser = await loadPythonParser();
  });

  it('should record an encoding error on the file', () => {
    const analysis = analyzeFile(parser, { path: 'latin.py', content: new Uint8Array([0x23, 0xe9, 0x0a]) });
    expect(analysis.classification).toBe('unavailable');
    expect(analysis.error).toEqual({ kind: 'encoding', message: 'latin.py: content is not valid UTF-8 text' });
  });

  it('should record a parse error on the file', () => {
    const analysis = analyzeFile(parser, { path: 'broken.py', content: BROKEN });
    expect(analysis.classification).toBe('unavailable');
    expect(analysis.error?.kind).toBe('parse');
    expect(analysis.error?.message).toMatch(/^broken\.py:\d+: invalid syntax$/);
    expect(analysis.loc).toBe(0);
  });

  it('should label an empty file Mixed', () => {
    const analysis = analyzeFile(parser, { path: 'empty.py', content: '' });
    expect(analysis.error).toBeUndefined();
    expect(analysis.loc).toBe(0);
    expect(analysis.classification).toBe('mixed');
    expect(analysis.webReadyPercentage).toBe(0);
  });
});

describe('analyzeProject', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should classify a UI function beside a pure helper as Mixed', async () => {
    const result = await analyzeProject(project([{ path: 'window.py', content: WINDOW_AND_HELPER }]));

    const [file] = result.files;
    expect(file?.loc).toBe(14);
    expect(file?.uiPercentage).toBe(71.4);
    expect(file?.classification).toBe('mixed');
    expect(file?.webReadyPercentage).toBe(28.6);
    expect(file?.toolkits).toEqual(['tkinter']);

    expect(result.extractionSuggestions.map(s => s.function)).toEqual(['add_totals']);
    expect(result.extractionSuggestions[0]?.startLine).toBe(12);
    expect(result.extractionSuggestions[0]?.endLine).toBe(15);
    // eight UI calls put show_window past the refactoring limit
    expect(result.refactoringSuggestions).toEqual([]);

    expect(result.webReadyPercentage).toBe(28.6);
    expect(result.guide.complexity).toBe('high');
    expect(result.structuralRecommendations).toEqual([
      {
        file: 'window.py',
        issue: 'Mixes 1 pure function with 1 UI-bound function',
        suggestion: 'Move the pure functions into a separate module and keep this file as a thin UI layer',
        priority: 'medium',
      },
    ]);
    expect(result.guide.recommendations).toEqual([
      '1 pure functions in 1 files are web-ready and can be reused as-is',
      '1 mixed files need refactoring to separate UI from logic',
      '1 functions can be extracted into reusable modules without changes',
      'Main UI toolkit: tkinter - replace its widgets with web frontend components',
    ]);
  });

  it('should score a file without toolkit code as fully web-ready', async () => {
    const result = await analyzeProject(project([{ path: 'stats.py', content: STATISTICS }]));

    const [file] = result.files;
    expect(file?.loc).toBe(20);
    expect(file?.uiPercentage).toBe(0);
    expect(file?.classification).toBe('logic');
    expect(file?.webReadyPercentage).toBe(100);

    expect(result.webReadyPercentage).toBe(100);
    expect(result.guide.complexity).toBe('low');
    expect(result.guide.reusableModules).toEqual(['stats.py']);
    expect(result.extractionSuggestions).toHaveLength(1);
    expect(result.extractionSuggestions[0]?.reason).toBe(
      'Pure function (20 lines) with no UI calls or external state'
    );
  });

  it('should fail an empty input with a single failed event', async () => {
    const events: ProgressEvent[] = [];
    const run = new AnalysisRun(project([]), { onProgress: event => events.push(event) });

    await expect(run.start()).rejects.toBeInstanceOf(EmptyInputError);
    expect(run.status).toBe('failed');
    expect(run.error?.message).toBe('No files to analyze');
    expect(events).toEqual([{ percent: 0, status: 'failed', message: 'No files to analyze' }]);
  });

  it('should reject duplicate paths', async () => {
    const run = new AnalysisRun(
      project([
        { path: 'a.py', content: 'x = 1\n' },
        { path: 'a.py', content: 'y = 2\n' },
      ])
    );
    await expect(run.start()).rejects.toBeInstanceOf(InvalidInputError);
    expect(run.status).toBe('failed');
  });

  describe('with one broken file among valid ones', () => {
    const files: SourceFile[] = [
      { path: 'c.py', content: DIALOGS },
      { path: 'broken.py', content: BROKEN },
      { path: 'a.py', content: PRICING },
      { path: 'b.py', content: APP_WINDOW },
    ];

    it('should analyze the valid files and report the broken one', async () => {
      const run = new AnalysisRun(project(files));
      const result = await run.start();

      expect(run.status).toBe('completed');
      expect(run.result).toBe(result);
      expect(result.files.map(f => [f.path, f.classification])).toEqual([
        ['a.py', 'logic'],
        ['b.py', 'ui'],
        ['broken.py', 'unavailable'],
        ['c.py', 'mixed'],
      ]);
      expect(result.files[2]?.error?.kind).toBe('parse');

      expect(result.files[1]?.uiPercentage).toBe(85.7);
      expect(result.files[3]?.uiPercentage).toBe(27.3);

      expect(result.summary).toEqual({
        totalFiles: 4,
        analyzedFiles: 3,
        failedFiles: 1,
        totalLoc: 23,
        uiFiles: 1,
        logicFiles: 1,
        mixedFiles: 1,
        totalClasses: 1,
        totalFunctions: 5,
        pureFunctions: 2,
        toolkits: ['PyQt5', 'tkinter'],
      });
      // (5 logic lines + 3 pure lines) / 23
      expect(result.webReadyPercentage).toBe(34.8);
      expect(result.extractionSuggestions.map(s => `${s.file}:${s.function}`)).toEqual([
        'a.py:net_price',
        'c.py:slugify',
      ]);
      expect(result.refactoringSuggestions).toEqual([]);
      expect(result.guide.summary).toBe('Project has 1 web-ready files and 2 files requiring UI conversion');
      expect(result.guide.reusableModules).toEqual(['a.py']);
      expect(result.guide.componentsToReplace).toEqual(['b.py']);
      expect(result.guide.recommendations).toEqual([
        '2 pure functions in 2 files are web-ready and can be reused as-is',
        '1 mixed files need refactoring to separate UI from logic',
        '2 functions can be extracted into reusable modules without changes',
        'Main UI toolkit: PyQt5 - replace its widgets with web frontend components',
        '1 files could not be analyzed and were excluded from the score',
      ]);
    });

    it('should report monotone progress ending in one completed event', async () => {
      const events: ProgressEvent[] = [];
      await analyzeProject(project(files), { onProgress: event => events.push(event) });

      expect(events.map(e => e.percent)).toEqual([10, 28, 45, 63, 80, 90, 100]);
      expect(events.filter(e => e.status === 'completed')).toHaveLength(1);
      expect(events.at(-1)).toEqual({ percent: 100, status: 'completed', message: 'Analysis completed' });
      expect(events[1]?.message).toBe('Analyzed a.py (1/4)');
      expect(events[5]?.message).toBe('Aggregating results');
    });

    it('should produce the same result for the same input', async () => {
      const first = await analyzeProject(project(files));
      const second = await analyzeProject(project([...files].reverse()));
      expect(second).toEqual(first);
    });
  });

  it('should complete with an encoding failure recorded', async () => {
    const result = await analyzeProject(
      project([
        { path: 'ok.py', content: PRICING },
        { path: 'latin.py', content: new Uint8Array([0x23, 0xe9, 0x0a]) },
      ])
    );
    expect(result.summary.failedFiles).toBe(1);
    expect(result.files[0]?.error?.kind).toBe('encoding');
    expect(result.webReadyPercentage).toBe(100);
  });

  it('should stop before the first file when cancelled', async () => {
    const parser = await loadPythonParser();
    const events: ProgressEvent[] = [];
    const run = new AnalysisRun(project([{ path: 'a.py', content: PRICING }]), {
      parser,
      onProgress: event => events.push(event),
    });

    const pending = run.start();
    run.cancel();

    await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
    expect(run.status).toBe('failed');
    const error = run.error;
    expect(error instanceof AnalysisCancelledError ? error.completedPaths : null).toEqual([]);
    expect(events.map(e => [e.percent, e.status])).toEqual([
      [10, 'running'],
      [10, 'failed'],
    ]);
  });

  it('should keep the analyses finished before a cancel', async () => {
    const parser = await loadPythonParser();
    const events: ProgressEvent[] = [];
    const run: AnalysisRun = new AnalysisRun(
      project([
        { path: 'a.py', content: PRICING },
        { path: 'b.py', content: APP_WINDOW },
      ]),
      {
        parser,
        onProgress: event => {
          events.push(event);
          if (event.message.startsWith('Analyzed a.py')) run.cancel();
        },
      }
    );

    await expect(run.start()).rejects.toBeInstanceOf(AnalysisCancelledError);

    const error = run.error;
    expect(error instanceof AnalysisCancelledError ? error.completedPaths : null).toEqual(['a.py']);
    const partial = error instanceof AnalysisCancelledError ? error.partial : [];
    expect(partial.map(file => [file.path, file.classification, file.webReadyPercentage])).toEqual([
      ['a.py', 'logic', 100],
    ]);
    expect(run.partial).toEqual(partial);
    expect(run.partial).not.toBe(run.partial);
    expect(events.map(e => [e.percent, e.status])).toEqual([
      [10, 'running'],
      [45, 'running'],
      [45, 'failed'],
    ]);
  });

  it('should stop when the abort signal fires', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      analyzeProject(project([{ path: 'a.py', content: PRICING }]), { signal: controller.signal })
    ).rejects.toBeInstanceOf(AnalysisCancelledError);
  });

  it('should fail when the run outlives its timeout', async () => {
    const parser = await loadPythonParser();
    let clock = 1_000_000;
    vi.spyOn(Date, 'now').mockImplementation(() => (clock += 1_000));

    const run = new AnalysisRun(
      project([
        { path: 'a.py', content: PRICING },
        { path: 'b.py', content: STATISTICS },
      ]),
      { parser, timeoutMs: 50 }
    );

    await expect(run.start()).rejects.toBeInstanceOf(AnalysisTimeoutError);
    expect(run.status).toBe('failed');
    expect(run.error?.message).toBe('Analysis timed out after 50ms');
  });

  it('should return the same promise when started twice', () => {
    const run = new AnalysisRun(project([{ path: 'a.py', content: PRICING }]));
    const first = run.start();
    expect(run.start()).toBe(first);
    return first;
  });
});
