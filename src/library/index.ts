export type { Macro, MacroKind, PersistedMacro } from './types';
export { DEFAULT_STAGE } from './types';
export { MacroLibrary, parseMacro, toPersistedMacro } from './persistence';
export { newMacro, newEmptyFrame, duplicateEntry, moveEntry, applyFrameEdit } from './editing';
export type { FrameEdit } from './editing';
export { formatFrameLine, macroToSnippet, snippetFileName, exportSnippet } from './snippet';
