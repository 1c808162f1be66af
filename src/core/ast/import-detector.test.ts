import { describe, it, expect, beforeAll } from 'vitest';
import { boundNames, detectToolkit, detectToolkits } from './import-detector.js';
import { extractImports } from './imports.js';
import { createToolkitRegistry, isUiBaseClass } from './toolkits.js';
import { loadPythonParser, type PythonParser } from './tree-sitter/parser.js';
import type { ImportInfo } from './types.js';

function plain(module: string, alias?: string): ImportInfo {
  return { kind: 'import', module, names: [alias ? { name: module, alias } : { name: module }], line: 1, level: 0 };
}

function from(module: string, names: string[], level = 0): ImportInfo {
  return { kind: 'from', module, names: names.map(name => ({ name })), line: 1, level };
}

describe('detectToolkit', () => {
  it('should match tkinter and its submodules', () => {
    expect(detectToolkit(plain('tkinter'))).toBe('tkinter');
    expect(detectToolkit(plain('tkinter.ttk'))).toBe('tkinter');
    expect(detectToolkit(from('tkinter', ['messagebox']))).toBe('tkinter');
  });

  it('should match Qt only through its UI submodules', () => {
    expect(detectToolkit(from('PyQt5.QtWidgets', ['QLabel']))).toBe('PyQt5');
    expect(detectToolkit(from('PySide6', ['QtGui']))).toBe('PySide6');
    expect(detectToolkit(from('PyQt5.QtNetwork', ['QTcpSocket']))).toBeUndefined();
    expect(detectToolkit(from('PyQt6', ['QtNetwork']))).toBeUndefined();
  });

  it('should treat a bare package import as the toolkit', () => {
    expect(detectToolkit(plain('PyQt6'))).toBe('PyQt6');
    expect(detectToolkit(plain('wx'))).toBe('wx');
  });

  it('should require an exact root match', () => {
    expect(detectToolkit(plain('tkinterx'))).toBeUndefined();
    expect(detectToolkit(plain('mywx.frames'))).toBeUndefined();
  });

  it('should ignore relative imports', () => {
    expect(detectToolkit(from('tkinter', ['widgets'], 1))).toBeUndefined();
  });

  it('should honour a custom registry', () => {
    const registry = createToolkitRegistry([{ name: 'kivy', submodules: ['*'] }], ['App']);
    expect(detectToolkit(plain('kivy.app'), registry)).toBe('kivy');
    expect(detectToolkit(plain('tkinter'), registry)).toBeUndefined();
  });
});

describe('boundNames', () => {
  it('should bind aliases, roots and imported names', () => {
    expect(boundNames(plain('tkinter', 'tk'))).toEqual(['tk']);
    expect(boundNames(plain('tkinter.ttk'))).toEqual(['tkinter']);
    expect(boundNames(from('PyQt5.QtWidgets', ['QLabel', 'QWidget']))).toEqual(['QLabel', 'QWidget']);
  });

  it('should bind the non-dotted UI base classes for a toolkit wildcard', () => {
    const names = boundNames({ ...from('tkinter', ['*']), toolkit: 'tkinter' });
    expect(names).toContain('Frame');
    expect(names).toContain('QWidget');
    expect(names).not.toContain('wx.Frame');
  });

  it('should bind nothing for a wildcard from another module', () => {
    expect(boundNames(from('helpers', ['*']))).toEqual([]);
  });
});

describe('detectToolkits', () => {
  it('should annotate toolkit imports and collect bindings', () => {
    const result = detectToolkits([
      plain('os'),
      plain('tkinter', 'tk'),
      from('PyQt5.QtWidgets', ['QLabel']),
    ]);

    expect(result.toolkits).toEqual(['PyQt5', 'tkinter']);
    expect(result.imports.map(imp => imp.toolkit)).toEqual([undefined, 'tkinter', 'PyQt5']);
    expect([...result.bindings].sort()).toEqual(['QLabel', 'tk']);
  });

  it('should return nothing for a file without toolkit imports', () => {
    const result = detectToolkits([plain('json'), from('collections', ['OrderedDict'])]);
    expect(result.toolkits).toEqual([]);
    expect(result.bindings.size).toBe(0);
  });
});

describe('isUiBaseClass', () => {
  it('should match dotted bases by full text or last segment', () => {
    expect(isUiBaseClass('wx.Frame')).toBe(true);
    expect(isUiBaseClass('QtWidgets.QMainWindow')).toBe(true);
    expect(isUiBaseClass('tk.Tk')).toBe(true);
    expect(isUiBaseClass('object')).toBe(false);
    expect(isUiBaseClass('qwidget')).toBe(false);
  });
});

describe('extractImports', () => {
  let parser: PythonParser;

  beforeAll(async () => {
    parser = await loadPythonParser();
  });

  it('should read plain, aliased, from, relative and wildcard imports', () => {
    const code = `import os, sys as system
import tkinter.ttk
from PyQt5.QtWidgets import QLabel, QWidget as Base
from . import models
from ..util import helpers
from tkinter import *
`;
    const imports = extractImports(parser.parse(code).rootNode);

    expect(imports).toEqual([
      { kind: 'import', module: 'os', names: [{ name: 'os' }], line: 1, level: 0 },
      { kind: 'import', module: 'sys', names: [{ name: 'sys', alias: 'system' }], line: 1, level: 0 },
      { kind: 'import', module: 'tkinter.ttk', names: [{ name: 'tkinter.ttk' }], line: 2, level: 0 },
      {
        kind: 'from',
        module: 'PyQt5.QtWidgets',
        names: [{ name: 'QLabel' }, { name: 'QWidget', alias: 'Base' }],
        line: 3,
        level: 0,
      },
      { kind: 'from', module: '', names: [{ name: 'models' }], line: 4, level: 1 },
      { kind: 'from', module: 'util', names: [{ name: 'helpers' }], line: 5, level: 2 },
      { kind: 'from', module: 'tkinter', names: [{ name: '*' }], line: 6, level: 0 },
    ]);
  });

  it('should include imports nested in functions', () => {
    const code = `def run():
    import tkinter as tk
    return tk
`;
    const imports = extractImports(parser.parse(code).rootNode);
    expect(imports).toHaveLength(1);
    expect(imports[0]?.line).toBe(2);
  });
});
