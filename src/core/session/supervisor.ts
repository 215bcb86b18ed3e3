import { execa } from 'execa';
import { mkdir } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';

import type { DiagnosticLog } from './diagnostics.js';
import { describeError, SessionAlreadyStartedError, SessionWriteError } from './errors.js';
import { findEndOfTurnPrompt } from './patterns.js';
import type { RawOutputQueue } from './queue.js';
import { OutputRelay } from './relay.js';
import { filterTransientStatus, stripTerminalControl } from './sanitizer.js';
import type { Invocation, SessionConfig, TrustedTool } from './types.js';

export const QUIT_DIRECTIVE = '/quit';

export interface ChildExit {
  exitCode: number | null;
  signal: string | null;
}

/** The slice of a spawned process the session needs; stderr is already merged into `output`. */
export interface ChatChild {
  readonly pid: number | undefined;
  readonly stdin: Writable | null;
  readonly output: Readable | null;
  readonly exited: Promise<ChildExit>;
  isRunning(): boolean;
  kill(signal: NodeJS.Signals): boolean;
}

export type SpawnChatChild = (invocation: Invocation) => ChatChild;

// ── Invocation ──────────────────────────────────────────────────────────────

export function trustedTools(config: Pick<SessionConfig, 'trustFsWrite' | 'trustExecuteBash'>): TrustedTool[] {
  const tools: TrustedTool[] = ['fs_read'];
  if (config.trustFsWrite) tools.push('fs_write');
  if (config.trustExecuteBash) tools.push('execute_bash');
  return tools;
}

export function buildChildEnv(config: Pick<SessionConfig, 'logLevel'>, base: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(base)) {
    if (v !== undefined) env[k] = v;
  }
  if (config.logLevel) env.Q_LOG_LEVEL = config.logLevel;
  env.TERM ??= 'xterm-256color';
  env.LANG ??= 'C.UTF-8';
  env.LC_ALL ??= 'C.UTF-8';
  return env;
}

export function buildInvocation(config: SessionConfig, base: NodeJS.ProcessEnv = process.env): Invocation {
  return {
    command: config.binary,
    args: ['chat', `--trust-tools=${trustedTools(config).join(',')}`],
    cwd: config.cwd,
    env: buildChildEnv(config, base)
  };
}

export const spawnWithExeca: SpawnChatChild = (invocation) => {
  const proc = execa(invocation.command, invocation.args, {
    cwd: invocation.cwd,
    env: invocation.env,
    extendEnv: false,
    stdin: 'pipe',
    stdout: 'pipe',
    stderr: 'pipe',
    all: true,
    buffer: false,
    stripFinalNewline: false,
    // Shutdown escalation is driven by the supervisor itself.
    forceKillAfterDelay: false,
    reject: false
  });

  let settled = false;
  const exited: Promise<ChildExit> = proc
    .then((result) => ({
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
      signal: typeof result.signal === 'string' ? result.signal : null
    }))
    .catch(() => ({
      exitCode: typeof proc.exitCode === 'number' ? proc.exitCode : null,
      signal: typeof proc.signalCode === 'string' ? proc.signalCode : null
    }))
    .finally(() => {
      settled = true;
    });

  return {
    pid: proc.pid,
    stdin: proc.stdin,
    output: proc.all ?? proc.stdout,
    exited,
    isRunning: () => !settled && proc.exitCode === null && proc.signalCode === null,
    kill: (signal) => proc.kill(signal)
  };
};

// ── Supervisor ──────────────────────────────────────────────────────────────

/**
 * Owns the `q chat` child: spawns it with the relay attached, waits for the
 * first idle prompt, writes input, and shuts it down with quit → SIGTERM →
 * SIGKILL escalation.
 */
export class ProcessSupervisor {
  private child: ChatChild | null = null;
  private relay: OutputRelay | null = null;
  private lastExit: ChildExit | null = null;

  constructor(
    private config: SessionConfig,
    private queue: RawOutputQueue<string>,
    private log: DiagnosticLog,
    private spawnChild: SpawnChatChild = spawnWithExeca
  ) {}

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get exit(): ChildExit | null {
    return this.lastExit;
  }

  async start(): Promise<string> {
    await this.spawn();
    return await this.warmUp();
  }

  async spawn(): Promise<void> {
    if (this.child) throw new SessionAlreadyStartedError();

    await mkdir(this.config.cwd, { recursive: true });
    const invocation = buildInvocation(this.config);
    const child = this.spawnChild(invocation);
    this.child = child;

    void child.exited.then((exit) => {
      this.lastExit = exit;
      this.log.event('STATE', `child exited code=${exit.exitCode ?? 'null'} signal=${exit.signal ?? 'null'}`);
    });
    child.stdin?.on('error', (err: unknown) => {
      this.log.event('ERROR', `stdin: ${describeError(err)}`);
    });

    if (child.output) {
      this.relay = new OutputRelay(child.output, this.queue, {
        log: this.log,
        partialLineFlushMs: this.config.timings.partialLineFlushMs
      });
    } else {
      this.log.event('ERROR', 'child has no output stream');
    }

    this.log.event('SPAWN', `cmd='${[invocation.command, ...invocation.args].join(' ')}' cwd='${invocation.cwd}' pid=${child.pid ?? 'unknown'}`);
    this.log.event(
      'ENV',
      `Q_LOG_LEVEL=${invocation.env.Q_LOG_LEVEL} TERM=${invocation.env.TERM} LANG=${invocation.env.LANG} LC_ALL=${invocation.env.LC_ALL}`
    );
  }

  /**
   * Collect startup output until the idle prompt shows and output settles.
   * Fails open: on the startup deadline whatever arrived is returned.
   */
  async warmUp(): Promise<string> {
    const t = this.config.timings;
    const deadline = Date.now() + t.startupTimeoutMs;
    let output = '';
    let sawPrompt = false;
    let lastAnyAt = Date.now();

    while (Date.now() < deadline) {
      const chunk = await this.queue.receive(Math.min(t.startupPollMs, Math.max(0, deadline - Date.now())));
      if (chunk !== undefined) {
        output += chunk;
        lastAnyAt = Date.now();
        if (!sawPrompt && findEndOfTurnPrompt(stripTerminalControl(output))) sawPrompt = true;
        continue;
      }
      if (sawPrompt && Date.now() - lastAnyAt >= t.startupQuietMs) break;
      if (!this.isAlive() && this.queue.size === 0) {
        this.log.event('ERROR', 'child exited during startup');
        break;
      }
    }

    this.log.event('STATE', sawPrompt ? 'ready (prompt reached)' : `startup timeout after ${t.startupTimeoutMs}ms; continuing`);
    return filterTransientStatus(stripTerminalControl(output));
  }

  isAlive(): boolean {
    return this.child?.isRunning() ?? false;
  }

  async write(text: string): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin) throw new SessionWriteError('q chat input is not available');
    await writeTo(stdin, text);
  }

  /** Best-effort shutdown; safe to call repeatedly. */
  async close(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = null;
    const grace = this.config.timings.shutdownGraceMs;

    try {
      if (child.isRunning() && child.stdin) {
        try {
          await withTimeout(writeTo(child.stdin, `${QUIT_DIRECTIVE}\n`), grace);
        } catch (err) {
          this.log.event('ERROR', `quit directive: ${describeError(err)}`);
        }
        await waitForExit(child, grace);
      }

      for (const signal of ['SIGTERM', 'SIGKILL'] as const) {
        if (!child.isRunning()) break;
        this.log.event('STATE', `child still running; sending ${signal}`);
        try {
          child.kill(signal);
        } catch (err) {
          this.log.event('ERROR', `${signal}: ${describeError(err)}`);
        }
        await waitForExit(child, grace);
      }
    } finally {
      try {
        child.stdin?.end();
      } catch {
        // ignore
      }
      this.relay?.stop();
      this.relay = null;
      this.log.event('STATE', 'closed');
    }
  }
}

function writeTo(stdin: Writable, text: string): Promise<void> {
  if (stdin.destroyed || stdin.writableEnded) {
    return Promise.reject(new SessionWriteError('q chat input is closed'));
  }
  return new Promise<void>((resolve, reject) => {
    try {
      stdin.write(text, (err) => {
        if (err) reject(new SessionWriteError(describeError(err), err));
        else resolve();
      });
    } catch (err) {
      reject(new SessionWriteError(describeError(err), err));
    }
  });
}

async function waitForExit(child: ChatChild, timeoutMs: number): Promise<void> {
  await withTimeout(child.exited, timeoutMs);
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | null = null;
  try {
    await Promise.race([
      promise.then(() => undefined),
      new Promise<void>((resolve) => {
        timer = setTimeout(() => resolve(), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
