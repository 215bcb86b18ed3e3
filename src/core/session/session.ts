import { DiagnosticLog } from './diagnostics.js';
import { SessionAlreadyStartedError, SessionClosedError, SessionNotStartedError } from './errors.js';
import { RawOutputQueue } from './queue.js';
import { ProcessSupervisor, spawnWithExeca, trustedTools, type SpawnChatChild } from './supervisor.js';
import { TurnEngine } from './turn-engine.js';
import type { PermissionDecision, SessionConfig, TrustedTool, TurnEvent, TurnState } from './types.js';

export interface ChatSessionOptions {
  /** Replaces the real process spawn (tests, alternative launchers). */
  spawn?: SpawnChatChild;
  /** Diagnostic sink; written only when `config.debug` is set. The session closes it. */
  log?: DiagnosticLog;
}

type Phase = 'new' | 'started' | 'closed';

/**
 * A single `q chat` process driven as a request/response API.
 *
 * ```ts
 * const session = new ChatSession(resolveSessionConfig({ cwd }));
 * const banner = await session.start();
 * for await (const ev of session.sendAndStream('hello')) { ... }
 * await session.close();
 * ```
 *
 * One turn at a time; a closed session cannot be restarted.
 */
export class ChatSession {
  private phase: Phase = 'new';
  private readonly queue = new RawOutputQueue<string>();
  private readonly log: DiagnosticLog;
  private readonly providedLog: DiagnosticLog | undefined;
  private readonly supervisor: ProcessSupervisor;
  private readonly engine: TurnEngine;

  constructor(
    readonly config: SessionConfig,
    opts: ChatSessionOptions = {}
  ) {
    this.providedLog = opts.log;
    this.log = config.debug && opts.log ? opts.log : DiagnosticLog.disabled();
    this.supervisor = new ProcessSupervisor(config, this.queue, this.log, opts.spawn ?? spawnWithExeca);
    this.engine = new TurnEngine({
      queue: this.queue,
      write: (text) => this.supervisor.write(text),
      isAlive: () => this.supervisor.isAlive(),
      exitInfo: () => this.supervisor.exit,
      log: this.log,
      timings: config.timings
    });
  }

  get trustedTools(): TrustedTool[] {
    return trustedTools(this.config);
  }

  get logFilePath(): string | null {
    return this.log.enabled ? this.log.path : null;
  }

  get pid(): number | undefined {
    return this.supervisor.pid;
  }

  get isStarted(): boolean {
    return this.phase === 'started';
  }

  get isClosed(): boolean {
    return this.phase === 'closed';
  }

  /** Final state of the most recent turn (or resume). */
  get lastTurnState(): TurnState {
    return this.engine.lastState;
  }

  /** Spawn the child and return its sanitized startup banner. */
  async start(): Promise<string> {
    if (this.phase === 'closed') throw new SessionClosedError();
    if (this.phase === 'started') throw new SessionAlreadyStartedError();
    this.phase = 'started';
    return await this.supervisor.start();
  }

  async *sendAndStream(message: string): AsyncGenerator<TurnEvent, TurnState, undefined> {
    this.assertStarted('sendAndStream');
    return yield* this.engine.sendAndStream(message);
  }

  async answerPermission(decision: PermissionDecision): Promise<void> {
    this.assertStarted('answerPermission');
    await this.engine.answerPermission(decision);
  }

  async *resumeStreaming(): AsyncGenerator<TurnEvent, TurnState, undefined> {
    this.assertStarted('resumeStreaming');
    return yield* this.engine.resumeStreaming();
  }

  isAlive(): boolean {
    return this.phase === 'started' && this.supervisor.isAlive();
  }

  /** Graceful quit, then SIGTERM, then SIGKILL. Never throws; idempotent. */
  async close(): Promise<void> {
    if (this.phase === 'closed') return;
    this.phase = 'closed';
    try {
      await this.supervisor.close();
    } finally {
      this.queue.close();
      await this.log.close();
      if (this.providedLog && this.providedLog !== this.log) await this.providedLog.close();
    }
  }

  private assertStarted(operation: string): void {
    if (this.phase !== 'started') throw new SessionNotStartedError(operation);
  }
}
