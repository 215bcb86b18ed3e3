import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Writable } from 'node:stream';

export type DiagnosticTag = 'SPAWN' | 'ENV' | 'STATE' | 'SEND' | 'KICK' | 'PERMISSION' | 'TIMEOUT' | 'ERROR';

/**
 * Append-only session diagnostics: one `[HH:MM:SS.mmm] TAG: detail` line per
 * event, interleaved with a verbatim mirror of every raw chunk from the child.
 */
export class DiagnosticLog {
  private closed = false;

  constructor(
    private sink: Writable | null,
    readonly path: string | null = null,
    private now: () => Date = () => new Date()
  ) {
    // Diagnostics stop after the first write error.
    sink?.on('error', () => {
      this.closed = true;
    });
  }

  static disabled(): DiagnosticLog {
    return new DiagnosticLog(null);
  }

  get enabled(): boolean {
    return this.sink !== null && !this.closed;
  }

  event(tag: DiagnosticTag, detail: string): void {
    this.write(`[${formatClockTime(this.now())}] ${tag}: ${detail}\n`);
  }

  raw(chunk: string): void {
    this.write(chunk);
  }

  async close(): Promise<void> {
    if (!this.sink || this.closed) return;
    this.closed = true;
    const sink = this.sink;
    await new Promise<void>((resolve) => {
      try {
        sink.end(() => resolve());
      } catch {
        resolve();
      }
    });
  }

  private write(text: string): void {
    if (!this.sink || this.closed) return;
    try {
      this.sink.write(text);
    } catch {
      // ignore
    }
  }
}

export function formatClockTime(d: Date): string {
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${hh}:${mm}:${ss}.${ms}`;
}

export function diagnosticLogFileName(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
  return `qchat_${date}_${time}.log`;
}

/** Create `dir` if needed and open a timestamped log file in append mode. */
export async function openDiagnosticLog(dir: string, now: Date = new Date()): Promise<DiagnosticLog> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, diagnosticLogFileName(now));
  return new DiagnosticLog(createWriteStream(path, { flags: 'a', encoding: 'utf8' }), path);
}
