import ora from 'ora';

import { INDENT, theme } from './theme.js';

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

export interface SpinnerOptions {
  /** Status output never goes to stdout, which carries the reply. */
  stream?: NodeJS.WritableStream;
  /** Force animation on or off; defaults to "stream is a TTY and not quiet". */
  animate?: boolean;
}

/** Animated `ora` spinner while `q chat` warms up; plain status lines when piped. */
export function startSpinner(text: string, opts: SpinnerOptions = {}): SpinnerHandle {
  const stream = opts.stream ?? process.stderr;
  const isTTY = 'isTTY' in stream && stream.isTTY === true;
  const animate = opts.animate ?? (isTTY && process.env.QCHAT_BRIDGE_QUIET !== '1');
  return animate ? oraSpinner(text, stream) : lineSpinner(text, stream);
}

function oraSpinner(text: string, stream: NodeJS.WritableStream): SpinnerHandle {
  // isEnabled: ora turns itself off under CI=1 even on a real terminal.
  const spinner = ora({ text, stream, spinner: 'dots', indent: INDENT.length, isEnabled: true }).start();
  return {
    update: (t) => {
      spinner.text = t;
    },
    succeed: (t) => {
      spinner.succeed(t ?? spinner.text);
    },
    fail: (t) => {
      spinner.fail(t ?? spinner.text);
    },
    warn: (t) => {
      spinner.warn(t ?? spinner.text);
    },
    stop: () => {
      spinner.stop();
    },
  };
}

function lineSpinner(text: string, stream: NodeJS.WritableStream): SpinnerHandle {
  const line = (symbol: string, t: string) => stream.write(`${INDENT}${symbol}${t}\n`);
  line('', `${text}...`);
  return {
    update: (t) => line('', `${t}...`),
    succeed: (t) => {
      if (t) line(`${theme.check} `, t);
    },
    fail: (t) => {
      if (t) line(`${theme.cross} `, t);
    },
    warn: (t) => {
      if (t) line(`${theme.warning('⚠')} `, t);
    },
    stop: () => {},
  };
}
