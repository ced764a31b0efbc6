/**
 * Sequence Loader
 *
 * Converts persisted step and frame records into sequence entries and back.
 *
 * Persisted step records:
 * ```json
 * { "type": "wait", "seconds": 0.2 }
 * { "type": "key", "key": "space", "action": "press" }
 * { "type": "expect", "text": "Jump now", "expect": "jump" }
 * ```
 *
 * Persisted frame records:
 * ```json
 * { "dt_ms": 80, "inputs": { "throttle": 1.0, "jump": true } }
 * ```
 *
 * A record that cannot be read becomes a `malformed` entry instead of an
 * error, so one bad step never hides the rest of a macro.
 */

import { z } from 'zod';
import { FrameStep, SequenceEntry } from './types';
import { formatStepIssues } from './schema';
import { sanitizeInputs } from './input-vector';

export const DEFAULT_FRAME_MS = 80;

const persistedWaitSchema = z.object({
  type: z.literal('wait'),
  seconds: z.coerce.number().finite().min(0),
});

const persistedKeySchema = z.object({
  type: z.literal('key'),
  key: z.string(),
  action: z.enum(['press', 'release']),
});

const persistedExpectSchema = z.object({
  type: z.literal('expect'),
  text: z.string().optional(),
  expect: z.string().min(1),
});

const persistedStepSchema = z.discriminatedUnion('type', [
  persistedWaitSchema,
  persistedKeySchema,
  persistedExpectSchema,
]);

const persistedFrameSchema = z.object({
  dt_ms: z.number().finite().optional(),
  inputs: z.record(z.unknown()).optional(),
});

export interface PersistedFrame {
  dt_ms: number;
  inputs: Record<string, number | boolean>;
}

/** Read one persisted step record */
export function parseStepRecord(raw: unknown): SequenceEntry {
  const result = persistedStepSchema.safeParse(raw);
  if (!result.success) {
    return { kind: 'malformed', reason: formatStepIssues(result.error), raw };
  }

  const rec = result.data;
  switch (rec.type) {
    case 'wait':
      return { kind: 'wait', seconds: rec.seconds };
    case 'key':
      return { kind: 'key', key: rec.key, action: rec.action };
    case 'expect':
      return { kind: 'expect', label: rec.text ?? rec.expect, expected: rec.expect };
  }
}

/** Read one persisted frame record; durations are rounded and kept at 1 ms or more */
export function parseFrameRecord(raw: unknown): SequenceEntry {
  const result = persistedFrameSchema.safeParse(raw);
  if (!result.success) {
    return { kind: 'malformed', reason: formatStepIssues(result.error), raw };
  }

  const dt = result.data.dt_ms ?? DEFAULT_FRAME_MS;
  return {
    kind: 'frame',
    durationMs: Math.max(1, Math.round(dt)),
    inputs: sanitizeInputs(result.data.inputs ?? {}),
  };
}

export function parseStepRecords(raw: unknown): SequenceEntry[] {
  if (!Array.isArray(raw)) return [];
  return raw.map(parseStepRecord);
}

export function parseFrameRecords(raw: unknown): SequenceEntry[] {
  if (!Array.isArray(raw)) return [];
  return raw.map(parseFrameRecord);
}

/**
 * Write a step back to its persisted record.
 * Malformed entries are written back untouched so a save never loses data.
 */
export function toStepRecord(entry: SequenceEntry): unknown {
  switch (entry.kind) {
    case 'wait':
      return { type: 'wait', seconds: entry.seconds };
    case 'key':
      return { type: 'key', key: entry.key, action: entry.action };
    case 'expect':
      return { type: 'expect', text: entry.label, expect: entry.expected };
    case 'frame':
      return toFrameRecord(entry);
    case 'malformed':
      return entry.raw;
  }
}

export function toFrameRecord(frame: FrameStep): PersistedFrame {
  return { dt_ms: frame.durationMs, inputs: { ...frame.inputs } };
}
