/**
 * Macro Library Types
 *
 * A macro is a named sequence plus how it gets triggered:
 *   - hotkey   key name reported by a hotkey bridge, e.g. "f6"
 *   - trigger  OSC address, e.g. "/macro/flip-reset"
 *
 * "steps" macros play on the step engine (wait / key / expect),
 * "frames" macros stream on the frame engine.
 */

import { SequenceEntry } from '../sequence/types';

export type MacroKind = 'steps' | 'frames';

/** Free-form stage label kept from the editor, e.g. "Single-Stage" or "Multi-Stage" */
export const DEFAULT_STAGE = 'Single-Stage';

export interface Macro {
  name: string;
  kind: MacroKind;
  stage: string;
  description: string;
  hotkey: string | null;
  trigger: string | null;
  enabled: boolean;
  sequence: SequenceEntry[];
}

/** Shape written to the library JSON file */
export interface PersistedMacro {
  name: string;
  type?: string;
  description?: string;
  hotkey?: string | null;
  trigger?: string | null;
  enabled?: boolean;
  steps?: unknown[];
  frames?: unknown[];
}
