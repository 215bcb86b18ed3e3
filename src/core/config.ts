import { z } from 'zod';

import type { QLogLevel, SessionConfig, TurnTimings } from './session/types.js';
import { defaultLogDirectory, defaultWorkingDirectory, normalizeWorkingDirectory } from '../workspace/layout.js';

export const Q_LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly QLogLevel[];

export const DEFAULT_BINARY = 'q';

export function isQLogLevel(value: string): value is QLogLevel {
  return Q_LOG_LEVELS.some((l) => l === value);
}

export const DEFAULT_TURN_TIMINGS: TurnTimings = {
  pollIntervalMs: 1_000,
  promptQuietMs: 500,
  silenceDoneMs: 5_000,
  kickAfterMs: 3_000,
  turnTimeoutMs: 60_000,
  startupPollMs: 500,
  startupQuietMs: 700,
  startupTimeoutMs: 20_000,
  shutdownGraceMs: 2_000,
  partialLineFlushMs: 100
};

export const TIMING_ENV_VARS: Record<keyof TurnTimings, string> = {
  pollIntervalMs: 'QCHAT_BRIDGE_POLL_INTERVAL_MS',
  promptQuietMs: 'QCHAT_BRIDGE_PROMPT_QUIET_MS',
  silenceDoneMs: 'QCHAT_BRIDGE_SILENCE_DONE_MS',
  kickAfterMs: 'QCHAT_BRIDGE_KICK_AFTER_MS',
  turnTimeoutMs: 'QCHAT_BRIDGE_TURN_TIMEOUT_MS',
  startupPollMs: 'QCHAT_BRIDGE_STARTUP_POLL_MS',
  startupQuietMs: 'QCHAT_BRIDGE_STARTUP_QUIET_MS',
  startupTimeoutMs: 'QCHAT_BRIDGE_STARTUP_TIMEOUT_MS',
  shutdownGraceMs: 'QCHAT_BRIDGE_SHUTDOWN_GRACE_MS',
  partialLineFlushMs: 'QCHAT_BRIDGE_PARTIAL_LINE_FLUSH_MS'
};

const MIN_TIMING_MS = 1;

const durationMs = z.number().int().positive();

export const TurnTimingsOverrideSchema = z
  .object({
    pollIntervalMs: durationMs,
    promptQuietMs: durationMs,
    silenceDoneMs: durationMs,
    kickAfterMs: durationMs,
    turnTimeoutMs: durationMs,
    startupPollMs: durationMs,
    startupQuietMs: durationMs,
    startupTimeoutMs: durationMs,
    shutdownGraceMs: durationMs,
    partialLineFlushMs: durationMs
  })
  .partial();

export const SessionConfigInputSchema = z.object({
  binary: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
  trustFsWrite: z.boolean().optional(),
  trustExecuteBash: z.boolean().optional(),
  logLevel: z.enum(Q_LOG_LEVELS).optional(),
  debug: z.boolean().optional(),
  logDir: z.string().min(1).optional(),
  timings: TurnTimingsOverrideSchema.optional()
});

export type SessionConfigInput = z.input<typeof SessionConfigInputSchema>;

/**
 * Parse a millisecond value from the environment. Unset or non-numeric values
 * fall back to `fallback`; decimals are floored and values below `min` clamped.
 */
export function readMsFromEnv(raw: string | undefined, fallback: number, min: number = MIN_TIMING_MS): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;
  const ms = Math.floor(parsed);
  return ms < min ? min : ms;
}

export function resolveTurnTimingsFromEnv(env: NodeJS.ProcessEnv = process.env): TurnTimings {
  const read = (key: keyof TurnTimings) => readMsFromEnv(env[TIMING_ENV_VARS[key]], DEFAULT_TURN_TIMINGS[key]);
  return {
    pollIntervalMs: read('pollIntervalMs'),
    promptQuietMs: read('promptQuietMs'),
    silenceDoneMs: read('silenceDoneMs'),
    kickAfterMs: read('kickAfterMs'),
    turnTimeoutMs: read('turnTimeoutMs'),
    startupPollMs: read('startupPollMs'),
    startupQuietMs: read('startupQuietMs'),
    startupTimeoutMs: read('startupTimeoutMs'),
    shutdownGraceMs: read('shutdownGraceMs'),
    partialLineFlushMs: read('partialLineFlushMs')
  };
}

export function resolveBinaryName(env: NodeJS.ProcessEnv = process.env): string {
  return env.QCHAT_BRIDGE_BINARY?.trim() || DEFAULT_BINARY;
}

/**
 * Validate caller input and fill defaults. Explicit timings win over
 * `QCHAT_BRIDGE_*_MS` variables, which win over the built-in defaults.
 */
export function resolveSessionConfig(input: SessionConfigInput = {}, env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const parsed = SessionConfigInputSchema.parse(input);
  const base = resolveTurnTimingsFromEnv(env);
  const o = parsed.timings ?? {};

  return {
    binary: parsed.binary ?? resolveBinaryName(env),
    cwd: normalizeWorkingDirectory(parsed.cwd ?? defaultWorkingDirectory()),
    trustFsWrite: parsed.trustFsWrite ?? false,
    trustExecuteBash: parsed.trustExecuteBash ?? false,
    logLevel: parsed.logLevel ?? 'info',
    debug: parsed.debug ?? false,
    logDir: normalizeWorkingDirectory(parsed.logDir ?? defaultLogDirectory()),
    timings: {
      pollIntervalMs: o.pollIntervalMs ?? base.pollIntervalMs,
      promptQuietMs: o.promptQuietMs ?? base.promptQuietMs,
      silenceDoneMs: o.silenceDoneMs ?? base.silenceDoneMs,
      kickAfterMs: o.kickAfterMs ?? base.kickAfterMs,
      turnTimeoutMs: o.turnTimeoutMs ?? base.turnTimeoutMs,
      startupPollMs: o.startupPollMs ?? base.startupPollMs,
      startupQuietMs: o.startupQuietMs ?? base.startupQuietMs,
      startupTimeoutMs: o.startupTimeoutMs ?? base.startupTimeoutMs,
      shutdownGraceMs: o.shutdownGraceMs ?? base.shutdownGraceMs,
      partialLineFlushMs: o.partialLineFlushMs ?? base.partialLineFlushMs
    }
  };
}
