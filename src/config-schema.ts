/**
 * Config Schema Validation
 *
 * Zod schemas for validating MacroDeck configuration.
 * Every section is optional; omitted values take the defaults below.
 */

import { z } from 'zod';
import { DEFAULT_AXES, DEFAULT_BUTTONS } from './sequence/input-vector';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

/** Listen ports may be 0 to let the OS pick one */
const listenPortSchema = z.number().int().min(0).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || val === '0.0.0.0' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const inputNameSchema = z.string().min(1);

// --- Playback ---

const playbackConfigSchema = z.object({
  toleranceMs: z.number().int().min(0).default(350),
  pollIntervalMs: z.number().int().min(1).max(1000).default(10),
  frameMode: z.enum(['accumulate', 'replace']).default('accumulate'),
});

// --- Match thresholds ---

const matchConfigSchema = z.object({
  stickThreshold: z.number().min(0).max(1).default(0.6),
  diagonalThreshold: z.number().min(0).max(1).default(0.55),
});

// --- Controller input (OSC bridge) ---

const inputConfigSchema = z.object({
  enabled: z.boolean().default(false),
  listenAddress: hostSchema.default('0.0.0.0'),
  listenPort: listenPortSchema.default(9100),
  staleAfterMs: z.number().int().min(0).default(1000),
});

// --- Key output ---

const keysConfigSchema = z.object({
  mode: z.enum(['log', 'osc']).default('log'),
  host: hostSchema.default('127.0.0.1'),
  port: portSchema.default(9200),
});

// --- Frame stream output ---

const streamConfigSchema = z.object({
  host: hostSchema.default('127.0.0.1'),
  port: portSchema.default(9300),
  axes: z.array(inputNameSchema).default([...DEFAULT_AXES]),
  buttons: z.array(inputNameSchema).default([...DEFAULT_BUTTONS]),
}).refine(
  (stream) => {
    const names = [...stream.axes, ...stream.buttons];
    return new Set(names).size === names.length;
  },
  { message: 'Axis and button names must be unique' }
);

// --- Control server ---

const controlConfigSchema = z.object({
  enabled: z.boolean().default(true),
  listenAddress: hostSchema.default('0.0.0.0'),
  listenPort: listenPortSchema.default(9000),
});

// --- Library ---

const libraryConfigSchema = z.object({
  path: z.string().min(1).default('macros.json'),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const deckConfigSchema = z.object({
  playback: playbackConfigSchema.default({}),
  match: matchConfigSchema.default({}),
  input: inputConfigSchema.default({}),
  keys: keysConfigSchema.default({}),
  stream: streamConfigSchema.default({}),
  control: controlConfigSchema.default({}),
  library: libraryConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type DeckConfigInput = z.input<typeof deckConfigSchema>;
export type DeckConfigOutput = z.output<typeof deckConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateDeckConfig(data: unknown): DeckConfigOutput {
  return deckConfigSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
