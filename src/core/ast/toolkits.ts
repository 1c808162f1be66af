/**
 * Registry of recognised GUI toolkits and their UI base classes.
 * Built once at module load and shared read-only by every analysis run.
 */

/** Matches every submodule of a toolkit root */
export const ANY_SUBMODULE = '*';

export interface ToolkitDefinition {
  /** Root module name, matched exactly (e.g. 'PyQt5') */
  name: string;
  /** Submodules that count as UI, or ANY_SUBMODULE */
  submodules: readonly string[];
}

export interface ToolkitRegistry {
  readonly toolkits: ReadonlyMap<string, ReadonlySet<string>>;
  /** Known UI base-class names, case-sensitive */
  readonly uiBaseClasses: ReadonlySet<string>;
}

const QT_SUBMODULES = ['QtWidgets', 'QtGui', 'QtCore', 'QtWebEngineWidgets'] as const;

export const TOOLKITS: readonly ToolkitDefinition[] = [
  { name: 'PyQt5', submodules: [...QT_SUBMODULES, 'uic'] },
  { name: 'PyQt6', submodules: [...QT_SUBMODULES, 'uic'] },
  { name: 'PySide2', submodules: QT_SUBMODULES },
  { name: 'PySide6', submodules: QT_SUBMODULES },
  { name: 'tkinter', submodules: [ANY_SUBMODULE] },
  { name: 'wx', submodules: [ANY_SUBMODULE] },
];

export const UI_BASE_CLASSES: readonly string[] = [
  // Qt
  'QWidget',
  'QMainWindow',
  'QDialog',
  'QFrame',
  'QScrollArea',
  'QPushButton',
  'QLabel',
  'QLineEdit',
  'QTextEdit',
  'QComboBox',
  'QCheckBox',
  'QRadioButton',
  'QSlider',
  'QProgressBar',
  'QTableWidget',
  'QListWidget',
  'QTreeWidget',
  'QGraphicsView',
  'QGraphicsScene',
  'QGraphicsItem',
  'QApplication',
  // tkinter
  'Tk',
  'Toplevel',
  'Frame',
  'Canvas',
  'Button',
  'Label',
  // wx
  'wx.Frame',
  'wx.Panel',
  'wx.App',
  'wx.Dialog',
];

/**
 * Build an immutable registry from toolkit definitions.
 */
export function createToolkitRegistry(
  definitions: readonly ToolkitDefinition[] = TOOLKITS,
  uiBaseClasses: readonly string[] = UI_BASE_CLASSES
): ToolkitRegistry {
  const toolkits = new Map<string, ReadonlySet<string>>();
  for (const def of definitions) {
    toolkits.set(def.name, new Set(def.submodules));
  }
  return Object.freeze({
    toolkits,
    uiBaseClasses: new Set(uiBaseClasses),
  });
}

export const DEFAULT_TOOLKIT_REGISTRY: ToolkitRegistry = createToolkitRegistry();

/**
 * Whether a base-class expression names a known UI base class.
 * Dotted bases match by full text or by their last segment.
 */
export function isUiBaseClass(base: string, registry: ToolkitRegistry = DEFAULT_TOOLKIT_REGISTRY): boolean {
  if (registry.uiBaseClasses.has(base)) {
    return true;
  }
  const lastDot = base.lastIndexOf('.');
  return lastDot !== -1 && registry.uiBaseClasses.has(base.slice(lastDot + 1));
}
