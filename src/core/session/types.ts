export interface TextFragment {
  type: 'text';
  text: string;
}

export interface PermissionRequest {
  type: 'permission';
  prompt: string;
}

export type TurnEvent = TextFragment | PermissionRequest;

export type PermissionDecision = 'approve-once' | 'deny' | 'approve-and-trust';

export type TurnState = 'sending' | 'streaming' | 'suspended' | 'done' | 'timed_out' | 'errored';

export type TrustedTool = 'fs_read' | 'fs_write' | 'execute_bash';

export type QLogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface TurnTimings {
  /** Bounded wait on the output queue while streaming. */
  pollIntervalMs: number;
  /** Silence required after the idle prompt before a turn is done. */
  promptQuietMs: number;
  /** Silence after real output that counts as completion without a prompt. */
  silenceDoneMs: number;
  /** Silence before the one-time kick newline is written. */
  kickAfterMs: number;
  /** Hard wall-clock limit for one turn. */
  turnTimeoutMs: number;
  startupPollMs: number;
  startupQuietMs: number;
  startupTimeoutMs: number;
  /** Wait after each shutdown step (quit, SIGTERM). */
  shutdownGraceMs: number;
  /** Idle time before a line without terminator is forwarded by the relay. */
  partialLineFlushMs: number;
}

export interface SessionConfig {
  binary: string;
  cwd: string;
  trustFsWrite: boolean;
  trustExecuteBash: boolean;
  logLevel: QLogLevel;
  debug: boolean;
  /** Directory for diagnostic logs; only used when `debug` is on. */
  logDir?: string;
  timings: TurnTimings;
}

export interface Invocation {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}
