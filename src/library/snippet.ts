/**
 * Frame snippets
 *
 * Compact text form of a frame macro for sharing and review:
 *
 *   # Flip (frames, Single-Stage)
 *   # Half flip with cancel
 *   frames = [
 *       F(80, throttle=1.000, jump=true),
 *       F(40, jump=false),
 *   ]
 *
 * Configured axes are printed first, then configured buttons, each in
 * configured order, then any extra inputs in insertion order. A value is
 * printed as stored, so a button holding 1 or an axis holding true still
 * shows up.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FrameStep, SequenceEntry } from '../sequence/types';
import { DEFAULT_AXES, DEFAULT_BUTTONS } from '../sequence/input-vector';
import { Macro } from './types';

function formatValue(value: number | boolean): string {
  return typeof value === 'number' ? value.toFixed(3) : String(value);
}

export function formatFrameLine(
  frame: FrameStep,
  axes: readonly string[] = DEFAULT_AXES,
  buttons: readonly string[] = DEFAULT_BUTTONS,
): string {
  const parts = [`F(${frame.durationMs}`];
  const known = [...axes, ...buttons];

  for (const name of known) {
    const value = frame.inputs[name];
    if (value !== undefined) parts.push(`${name}=${formatValue(value)}`);
  }
  for (const [name, value] of Object.entries(frame.inputs)) {
    if (known.includes(name)) continue;
    parts.push(`${name}=${formatValue(value)}`);
  }

  return parts.join(', ') + ')';
}

function describeEntry(entry: SequenceEntry): string {
  switch (entry.kind) {
    case 'wait':
      return `wait ${entry.seconds}s`;
    case 'key':
      return `${entry.action} ${entry.key}`;
    case 'expect':
      return `expect ${entry.expected}`;
    case 'frame':
      return formatFrameLine(entry);
    case 'malformed':
      return `malformed: ${entry.reason}`;
  }
}

export function macroToSnippet(macro: Macro): string {
  const lines = [`# ${macro.name} (${macro.kind}, ${macro.stage})`];
  if (macro.description) {
    lines.push(`# ${macro.description}`);
  }

  if (macro.kind === 'frames') {
    lines.push('frames = [');
    for (const entry of macro.sequence) {
      lines.push(entry.kind === 'frame' ? `    ${formatFrameLine(entry)},` : `    # ${describeEntry(entry)}`);
    }
    lines.push(']');
  } else {
    macro.sequence.forEach((entry, i) => {
      lines.push(`${i + 1}. ${describeEntry(entry)}`);
    });
  }

  return lines.join('\n');
}

/** File name for an exported snippet: spaces become underscores */
export function snippetFileName(name: string): string {
  const base = name.trim().replace(/\s+/g, '_');
  return `${base || 'macro'}.txt`;
}

/** Write the macro's snippet into `dir` and return the file path */
export function exportSnippet(macro: Macro, dir: string): string {
  const filePath = path.join(dir, snippetFileName(macro.name));
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, macroToSnippet(macro) + '\n', 'utf-8');
  return filePath;
}
