/**
 * Macro Library Persistence
 *
 * Load and save the macro library as a single JSON file:
 *
 * ```json
 * [
 *   { "name": "Jump", "hotkey": "f6", "steps": [
 *       { "type": "wait", "seconds": 0.2 },
 *       { "type": "key", "key": "space", "action": "press" },
 *       { "type": "key", "key": "space", "action": "release" } ] },
 *   { "name": "Flip", "enabled": true, "frames": [
 *       { "dt_ms": 80, "inputs": { "jump": true } } ] }
 * ]
 * ```
 *
 * A missing file is an empty library. An unreadable file is logged and
 * also treated as empty, so a bad save never blocks startup.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { parseFrameRecords, parseStepRecords, toStepRecord } from '../sequence/loader';
import { resolveKey, sameKey } from '../keys/key-names';
import { DEFAULT_STAGE, Macro, PersistedMacro } from './types';

const persistedMacroSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  description: z.string().optional(),
  hotkey: z.string().nullish(),
  trigger: z.string().nullish(),
  enabled: z.boolean().optional(),
  steps: z.array(z.unknown()).optional(),
  frames: z.array(z.unknown()).optional(),
});

/** Read one persisted macro record; returns null when it is not an object */
export function parseMacro(raw: unknown, index = 0): Macro | null {
  const result = persistedMacroSchema.safeParse(raw);
  if (!result.success) return null;

  const rec = result.data;
  const isFrames = rec.frames !== undefined && rec.steps === undefined;
  return {
    name: rec.name?.trim() || `Macro ${index + 1}`,
    kind: isFrames ? 'frames' : 'steps',
    stage: rec.type?.trim() || DEFAULT_STAGE,
    description: rec.description ?? '',
    hotkey: rec.hotkey?.trim().toLowerCase() || null,
    trigger: rec.trigger?.trim() || null,
    enabled: rec.enabled ?? true,
    sequence: isFrames ? parseFrameRecords(rec.frames) : parseStepRecords(rec.steps),
  };
}

export function toPersistedMacro(macro: Macro): PersistedMacro {
  const base: PersistedMacro = {
    name: macro.name,
    type: macro.stage,
    description: macro.description,
    hotkey: macro.hotkey,
    trigger: macro.trigger,
    enabled: macro.enabled,
  };
  const records = macro.sequence.map(toStepRecord);
  return macro.kind === 'frames'
    ? { ...base, frames: records }
    : { ...base, steps: records };
}

export class MacroLibrary {
  private macros: Macro[] = [];
  private readonly filePath: string;
  private log: Logger = getLogger('Library');

  constructor(filePath?: string) {
    this.filePath = filePath ?? path.join(process.cwd(), 'macros.json');
  }

  get path(): string {
    return this.filePath;
  }

  /** Replace the in-memory library with the file contents */
  load(): Macro[] {
    this.macros = this.readFile();
    this.log.info(`Loaded ${this.macros.length} macro(s) from ${this.filePath}`);
    return this.list();
  }

  save(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const payload = this.macros.map(toPersistedMacro);
    fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), 'utf-8');
    this.log.info(`Saved ${this.macros.length} macro(s) to ${this.filePath}`);
  }

  list(): Macro[] {
    return [...this.macros];
  }

  get size(): number {
    return this.macros.length;
  }

  /** Case-insensitive lookup by name */
  get(name: string): Macro | undefined {
    const wanted = name.trim().toLowerCase();
    return this.macros.find(m => m.name.toLowerCase() === wanted);
  }

  /** First enabled macro bound to the hotkey ("F6", "esc", ...) */
  findByHotkey(key: string): Macro | undefined {
    const pressed = resolveKey(key);
    return this.macros.find(m => m.enabled && m.hotkey !== null && sameKey(resolveKey(m.hotkey), pressed));
  }

  /** First enabled macro bound to the OSC trigger address (case-insensitive) */
  findByTrigger(address: string): Macro | undefined {
    const addr = address.toLowerCase().replace(/\/$/, '');
    return this.macros.find(m => m.enabled && m.trigger !== null && m.trigger.toLowerCase().replace(/\/$/, '') === addr);
  }

  /** Add or replace (by name) a macro */
  upsert(macro: Macro): void {
    const existing = this.macros.findIndex(m => m.name.toLowerCase() === macro.name.toLowerCase());
    if (existing >= 0) {
      this.macros[existing] = macro;
    } else {
      this.macros.push(macro);
    }
  }

  remove(name: string): boolean {
    const wanted = name.trim().toLowerCase();
    const index = this.macros.findIndex(m => m.name.toLowerCase() === wanted);
    if (index < 0) return false;
    this.macros.splice(index, 1);
    return true;
  }

  private readFile(): Macro[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    let payload: unknown;
    try {
      payload = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn(`Could not read ${this.filePath}: ${reason}; starting empty`);
      return [];
    }

    if (!Array.isArray(payload)) {
      this.log.warn(`${this.filePath} is not a JSON array; starting empty`);
      return [];
    }

    const items: unknown[] = payload;
    const macros: Macro[] = [];
    items.forEach((item, index) => {
      const macro = parseMacro(item, index);
      if (macro) {
        macros.push(macro);
      } else {
        this.log.warn(`Skipped library entry ${index + 1}: not a macro record`);
      }
    });
    return macros;
  }
}
