import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';

import type { ChatChild, ChildExit, SpawnChatChild } from '../src/core/session/supervisor.js';
import type { Invocation, SessionConfig, TurnTimings } from '../src/core/session/types.js';

export type Responder = (line: string, child: FakeChatChild) => void;

export interface FakeChatChildOptions {
  /** Written to output as soon as the child exists. */
  banner?: string;
  respond?: Responder;
  /** Keep running after `/quit`. */
  ignoreQuit?: boolean;
  /** Signals the child survives. */
  ignoreSignals?: NodeJS.Signals[];
}

/**
 * In-process stand-in for `q chat`: lines written to stdin are recorded and
 * handed to `respond`; `say` writes to the merged output stream.
 */
export class FakeChatChild implements ChatChild {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly output = new PassThrough();
  readonly exited: Promise<ChildExit>;
  readonly lines: string[] = [];
  readonly signals: NodeJS.Signals[] = [];

  private running = true;
  private partial = '';
  private resolveExit: (exit: ChildExit) => void = () => {};

  constructor(private opts: FakeChatChildOptions = {}) {
    this.exited = new Promise<ChildExit>((resolve) => {
      this.resolveExit = resolve;
    });
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => this.onInput(chunk));
    if (opts.banner) this.say(opts.banner);
  }

  say(text: string): void {
    if (this.running) this.output.write(text);
  }

  exit(exit: ChildExit = { exitCode: 0, signal: null }): void {
    if (!this.running) return;
    this.running = false;
    this.output.end();
    this.resolveExit(exit);
  }

  isRunning(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (!this.opts.ignoreSignals?.includes(signal)) this.exit({ exitCode: null, signal });
    return true;
  }

  private onInput(chunk: string): void {
    this.partial += chunk;
    let nl = this.partial.indexOf('\n');
    while (nl !== -1) {
      const line = this.partial.slice(0, nl);
      this.partial = this.partial.slice(nl + 1);
      this.lines.push(line);
      if (line === '/quit' && !this.opts.ignoreQuit) this.exit();
      else this.opts.respond?.(line, this);
      nl = this.partial.indexOf('\n');
    }
  }
}

/** Spawn seam that hands out the given children in order and records invocations. */
export function spawnFakes(children: FakeChatChild[], invocations: Invocation[] = []): SpawnChatChild {
  let next = 0;
  return (invocation) => {
    invocations.push(invocation);
    const child = children[next];
    next += 1;
    if (!child) throw new Error('no fake child left to spawn');
    return child;
  };
}

export const FAST_TIMINGS: TurnTimings = {
  pollIntervalMs: 20,
  promptQuietMs: 30,
  silenceDoneMs: 150,
  kickAfterMs: 80,
  turnTimeoutMs: 1_500,
  startupPollMs: 20,
  startupQuietMs: 30,
  startupTimeoutMs: 500,
  shutdownGraceMs: 100,
  partialLineFlushMs: 10
};

/** The same timings as `QCHAT_BRIDGE_*_MS` variables, for code that reads the environment. */
export const FAST_TIMING_ENV: NodeJS.ProcessEnv = {
  QCHAT_BRIDGE_POLL_INTERVAL_MS: '20',
  QCHAT_BRIDGE_PROMPT_QUIET_MS: '30',
  QCHAT_BRIDGE_SILENCE_DONE_MS: '150',
  QCHAT_BRIDGE_KICK_AFTER_MS: '80',
  QCHAT_BRIDGE_TURN_TIMEOUT_MS: '1500',
  QCHAT_BRIDGE_STARTUP_POLL_MS: '20',
  QCHAT_BRIDGE_STARTUP_QUIET_MS: '30',
  QCHAT_BRIDGE_STARTUP_TIMEOUT_MS: '500',
  QCHAT_BRIDGE_SHUTDOWN_GRACE_MS: '100',
  QCHAT_BRIDGE_PARTIAL_LINE_FLUSH_MS: '10'
};

export async function makeTempDir(prefix = 'qchat-bridge-'): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export function testConfig(cwd: string, overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    binary: 'q',
    cwd,
    trustFsWrite: false,
    trustExecuteBash: false,
    logLevel: 'info',
    debug: false,
    timings: FAST_TIMINGS,
    ...overrides
  };
}

export interface Capture {
  stream: PassThrough;
  /** Everything written so far; await `settle()` first. */
  text: () => string;
  /** Let pending stream events run. */
  settle: () => Promise<void>;
}

/** Collect a capture stream's writes as one string. */
export function captureStream(): Capture {
  const stream = new PassThrough();
  let buf = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    buf += chunk;
  });
  return { stream, text: () => buf, settle: () => new Promise<void>((resolve) => setImmediate(resolve)) };
}

/** Drain an async generator, keeping its yields and its return value. */
export async function collect<T, R>(gen: AsyncGenerator<T, R, undefined>): Promise<{ events: T[]; result: R }> {
  const events: T[] = [];
  for (;;) {
    const step = await gen.next();
    if (step.done) return { events, result: step.value };
    events.push(step.value);
  }
}
