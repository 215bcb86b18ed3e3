import { readMsFromEnv } from '../core/config.js';

export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface CancelInfo {
  signal: CancelSignal;
  source: 'signal' | 'keypress';
}

export interface SessionCancellation {
  /** Aborts on the first trigger; passed to interactive prompts. */
  readonly signal: AbortSignal;
  /** Triggers seen so far. */
  readonly count: number;
  dispose(): void;
}

/** The process surface cancellation listens on; `process` in production. */
export interface CancellationHost {
  on(event: CancelSignal, listener: () => void): unknown;
  off(event: CancelSignal, listener: () => void): unknown;
  exit(code: number): void;
  stdin?: NodeJS.ReadStream;
}

export interface SessionCancellationOptions {
  /** First trigger: shut the chat child down (`/quit`, then signals). */
  closeSession: (info: CancelInfo) => Promise<void>;
  env?: NodeJS.ProcessEnv;
  host?: CancellationHost;
}

// /quit, SIGTERM and SIGKILL each get a shutdown grace period before exit is forced.
export const DEFAULT_FORCE_EXIT_GRACE_MS = 6_500;

const EXIT_CODES: Record<CancelSignal, number> = { SIGINT: 130, SIGTERM: 143 };

let activeSignal: AbortSignal | null = null;

/** Signal of the command currently holding the terminal, if any. */
export function getActiveCancelSignal(): AbortSignal | null {
  return activeSignal;
}

/**
 * Ctrl+C handling for commands that own a chat session.
 *
 * The first SIGINT/SIGTERM (or a raw-mode `^C` keypress) aborts pending
 * prompts and starts `closeSession`. A second trigger exits once the close
 * settles or `QCHAT_BRIDGE_FORCE_EXIT_GRACE_MS` passes, whichever is first.
 */
export function installSessionCancellation(opts: SessionCancellationOptions): SessionCancellation {
  const host = opts.host ?? process;
  const graceMs = readMsFromEnv((opts.env ?? process.env).QCHAT_BRIDGE_FORCE_EXIT_GRACE_MS, DEFAULT_FORCE_EXIT_GRACE_MS, 1);
  const controller = new AbortController();
  activeSignal = controller.signal;

  let count = 0;
  let disposed = false;
  let closing: Promise<void> | null = null;
  let exiting = false;

  const trigger = (info: CancelInfo) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      controller.abort(info);
      closing = opts.closeSession(info).catch(() => {
        // the command reports close failures itself
      });
      return;
    }

    if (exiting) return;
    exiting = true;
    const pending = closing ?? Promise.resolve();
    void settleWithin(pending, graceMs).then(() => host.exit(EXIT_CODES[info.signal]));
  };

  const onSigint = () => trigger({ signal: 'SIGINT', source: 'signal' });
  const onSigterm = () => trigger({ signal: 'SIGTERM', source: 'signal' });
  host.on('SIGINT', onSigint);
  host.on('SIGTERM', onSigterm);

  // Raw-mode prompts swallow SIGINT; watch for the ^C byte instead.
  const stdin = host.stdin?.isTTY ? host.stdin : undefined;
  let resumedStdin = false;
  const onStdinData = (chunk: Buffer | string) => {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (buf.includes(3)) trigger({ signal: 'SIGINT', source: 'keypress' });
  };
  if (stdin) {
    stdin.on('data', onStdinData);
    if (stdin.isPaused()) {
      stdin.resume();
      resumedStdin = true;
    }
  }

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      host.off('SIGINT', onSigint);
      host.off('SIGTERM', onSigterm);
      if (stdin) {
        stdin.off('data', onStdinData);
        // Leave stdin as we found it so it does not hold the event loop open.
        if (resumedStdin) stdin.pause();
      }
      if (activeSignal === controller.signal) activeSignal = null;
    },
  };
}

async function settleWithin(promise: Promise<void>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      promise,
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
