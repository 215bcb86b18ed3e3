import type { Readable } from 'node:stream';

import type { DiagnosticLog } from './diagnostics.js';
import { describeError } from './errors.js';
import type { RawOutputQueue } from './queue.js';

export interface OutputRelayOptions {
  log: DiagnosticLog;
  /** Forward an unterminated line after this much idle time (a waiting prompt has no newline). */
  partialLineFlushMs: number;
}

/**
 * Reads the child's merged output and forwards it line by line (terminators
 * kept) into the raw output queue. End-of-stream is not signalled: no more
 * chunks is the signal.
 */
export class OutputRelay {
  readonly done: Promise<void>;

  private pending = '';
  private flushTimer: NodeJS.Timeout | null = null;
  private stopped = false;
  private lines = 0;

  constructor(
    private input: Readable,
    private queue: RawOutputQueue<string>,
    private opts: OutputRelayOptions
  ) {
    input.setEncoding('utf8');
    this.done = new Promise<void>((resolve) => {
      const finish = () => {
        this.flushPending();
        this.stopped = true;
        resolve();
      };
      input.on('data', (chunk: string | Buffer) => this.onData(typeof chunk === 'string' ? chunk : chunk.toString('utf8')));
      input.once('end', finish);
      input.once('close', finish);
      input.once('error', (err: unknown) => {
        this.opts.log.event('ERROR', `output relay: ${describeError(err)}`);
        finish();
      });
    });
  }

  get linesRelayed(): number {
    return this.lines;
  }

  stop(): void {
    this.stopped = true;
    this.clearFlushTimer();
  }

  private onData(chunk: string): void {
    if (this.stopped) return;
    this.pending += chunk;

    let nl = this.pending.indexOf('\n');
    while (nl !== -1) {
      this.forward(this.pending.slice(0, nl + 1));
      this.pending = this.pending.slice(nl + 1);
      nl = this.pending.indexOf('\n');
    }

    this.clearFlushTimer();
    if (this.pending) {
      this.flushTimer = setTimeout(() => this.flushPending(), this.opts.partialLineFlushMs);
    }
  }

  private flushPending(): void {
    this.clearFlushTimer();
    if (!this.pending || this.stopped) return;
    const rest = this.pending;
    this.pending = '';
    this.forward(rest);
  }

  private forward(chunk: string): void {
    this.lines += 1;
    this.opts.log.raw(chunk);
    this.queue.push(chunk);
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = null;
  }
}
