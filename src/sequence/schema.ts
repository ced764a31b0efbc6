/**
 * Step Validation
 *
 * Zod schemas for the in-memory step union. The engines check every
 * entry right before dispatching it; a step that fails is reported and
 * skipped rather than aborting the run.
 */

import { z } from 'zod';
import { Step } from './types';

const inputVectorSchema = z.record(z.union([z.number().finite(), z.boolean()]));

const waitStepSchema = z.object({
  kind: z.literal('wait'),
  seconds: z.number().finite().min(0),
});

const keyStepSchema = z.object({
  kind: z.literal('key'),
  key: z.string(),
  action: z.enum(['press', 'release']),
});

const expectStepSchema = z.object({
  kind: z.literal('expect'),
  label: z.string(),
  expected: z.string().min(1),
});

const frameStepSchema = z.object({
  kind: z.literal('frame'),
  durationMs: z.number().int().min(1),
  inputs: inputVectorSchema,
});

export const stepSchema = z.discriminatedUnion('kind', [
  waitStepSchema,
  keyStepSchema,
  expectStepSchema,
  frameStepSchema,
]);

export type StepCheck =
  | { ok: true; step: Step }
  | { ok: false; reason: string };

/** Format Zod issues as a single line for status messages */
export function formatStepIssues(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'step';
    return `${path}: ${issue.message}`;
  }).join('; ');
}

/**
 * Check a sequence entry before dispatch.
 * Accepts unknown so entries built outside the type system get the same treatment.
 */
export function checkStep(entry: unknown): StepCheck {
  if (typeof entry === 'object' && entry !== null && 'kind' in entry && entry.kind === 'malformed') {
    const reason = 'reason' in entry && typeof entry.reason === 'string' ? entry.reason : 'malformed step';
    return { ok: false, reason };
  }

  const result = stepSchema.safeParse(entry);
  if (!result.success) {
    return { ok: false, reason: formatStepIssues(result.error) };
  }
  return { ok: true, step: result.data };
}
