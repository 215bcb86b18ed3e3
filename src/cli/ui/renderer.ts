import chalk from 'chalk';

import type { PermissionDecision, TrustedTool, TurnState } from '../../core/session/types.js';
import { theme, INDENT, RULE_WIDTH } from './theme.js';
import { formatMs, sectionBanner, keyValue, drawBox, wrapLines, checkLine, type CheckLine } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';
import { DECISION_LABELS, type PermissionPromptModel } from './permission-prompt.js';
import { promptSelect } from './prompts.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

export interface SessionSummary {
  pid: number | undefined;
  cwd: string;
  trusted: TrustedTool[];
  logFile: string | null;
  /** Sanitized startup output of the child. */
  banner: string;
}

export interface TurnSummary {
  state: TurnState;
  durationMs: number;
  permissions: number;
}

export interface RendererStreams {
  /** Reply text. */
  stdout?: NodeJS.WritableStream;
  /** Everything else: chrome, status, errors. */
  stderr?: NodeJS.WritableStream;
}

/**
 * Every line the CLI shows goes through a Renderer. Reply text is the only
 * thing written to stdout, so `qchat-bridge ask ... > reply.txt` captures
 * just the answer. `InteractiveRenderer` draws for a person;
 * `QuietRenderer` (`--quiet`) emits one JSON object per event on stderr.
 */
export interface Renderer {
  // ── Branding ──
  brand(version: string): void;

  // ── Session ──
  sessionStarted(info: SessionSummary): void;
  sessionClosed(reason: string): void;

  // ── Turns ──
  assistantText(fragment: string): void;
  turnEnd(info: TurnSummary): void;
  presentPermissionPrompt(model: PermissionPromptModel): Promise<PermissionDecision>;

  // ── Checks ──
  checks(title: string, items: CheckLine[]): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
}

const TURN_STATE_NOTES: Partial<Record<TurnState, string>> = {
  timed_out: 'Turn timed out; the reply may be incomplete.',
  errored: 'Turn ended with an error.',
};

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;
  private replyOpen = false;

  constructor(streams: RendererStreams = {}) {
    this.out = streams.stdout ?? process.stdout;
    this.err = streams.stderr ?? process.stderr;
  }

  private writeln(msg: string = ''): void {
    this.endReply();
    this.err.write(msg + '\n');
  }

  /** Keep chrome on its own line after streamed reply text. */
  private endReply(): void {
    if (!this.replyOpen) return;
    this.replyOpen = false;
    this.out.write('\n');
  }

  brand(version: string): void {
    this.writeln(`${INDENT}${chalk.bold('qchat-bridge')} ${theme.dim(`v${version}`)}`);
  }

  sessionStarted(info: SessionSummary): void {
    this.writeln(INDENT + sectionBanner('Session'));
    this.writeln();
    this.writeln(keyValue('PID', info.pid === undefined ? theme.dim('(unknown)') : String(info.pid)));
    this.writeln(keyValue('Directory', info.cwd));
    this.writeln(keyValue('Trusted', info.trusted.join(', ')));
    if (info.logFile) this.writeln(keyValue('Debug log', info.logFile));
    if (info.banner.trim()) {
      this.writeln();
      for (const line of info.banner.trimEnd().split('\n')) this.writeln(`${INDENT}${theme.dim(line)}`);
    }
    this.writeln();
    this.writeln(`${INDENT}${theme.dim('Type /exit to quit, /restart to start a fresh session.')}`);
    this.writeln();
  }

  sessionClosed(reason: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.dim(`Session closed (${reason}).`)}`);
  }

  assistantText(fragment: string): void {
    if (!fragment) return;
    this.out.write(fragment);
    this.replyOpen = !fragment.endsWith('\n');
  }

  turnEnd(info: TurnSummary): void {
    this.endReply();
    const note = TURN_STATE_NOTES[info.state];
    if (note) this.warn(note);
    const asked = info.permissions > 0 ? ` · ${info.permissions} permission prompt${info.permissions === 1 ? '' : 's'}` : '';
    this.writeln(`${INDENT}${theme.dim(`${info.state} in ${formatMs(info.durationMs)}${asked}`)}`);
    this.writeln();
  }

  async presentPermissionPrompt(model: PermissionPromptModel): Promise<PermissionDecision> {
    const boxLines: string[] = [];
    for (const line of wrapLines(model.prompt, RULE_WIDTH - 6)) boxLines.push(line);
    boxLines.push('');
    boxLines.push(`${theme.permission.label('Trusted:')} ${model.trusted.join(', ')}`);

    this.writeln();
    this.writeln(drawBox('Permission requested', boxLines, RULE_WIDTH));
    this.writeln();

    if (model.preset) {
      this.writeln(`${INDENT}${theme.arrow} ${DECISION_LABELS[model.preset]} ${theme.dim('(--on-permission)')}`);
      return model.preset;
    }

    return await promptSelect<PermissionDecision>({
      message: 'Decision',
      choices: [
        { name: chalk.green(DECISION_LABELS['approve-once']), value: 'approve-once' },
        { name: chalk.red(DECISION_LABELS.deny), value: 'deny' },
        { name: chalk.yellow(DECISION_LABELS['approve-and-trust']), value: 'approve-and-trust' },
      ],
    });
  }

  checks(title: string, items: CheckLine[]): void {
    this.writeln(INDENT + sectionBanner(title));
    this.writeln();
    for (const item of items) this.writeln(checkLine(item));
    this.writeln();
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    if (details) {
      this.writeln();
      for (const line of details.split('\n')) this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    this.endReply();
    return startSpinner(message, { stream: this.err });
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private readonly err: NodeJS.WritableStream;
  private readonly now: () => Date;

  constructor(streams: RendererStreams & { now?: () => Date } = {}) {
    this.err = streams.stderr ?? process.stderr;
    this.now = streams.now ?? (() => new Date());
  }

  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: this.now().toISOString(), ...data };
    this.err.write(JSON.stringify(event) + '\n');
  }

  brand(): void { /* no-op in quiet mode */ }

  sessionStarted(info: SessionSummary): void {
    this.emit('session_started', {
      pid: info.pid ?? null,
      cwd: info.cwd,
      trusted: info.trusted,
      log_file: info.logFile,
      banner: info.banner,
    });
  }

  sessionClosed(reason: string): void {
    this.emit('session_closed', { reason });
  }

  assistantText(fragment: string): void {
    this.emit('text', { text: fragment });
  }

  turnEnd(info: TurnSummary): void {
    this.emit('turn_end', { state: info.state, duration_ms: info.durationMs, permissions: info.permissions });
  }

  async presentPermissionPrompt(model: PermissionPromptModel): Promise<PermissionDecision> {
    // Nobody to ask in quiet mode: take the preset, else deny.
    const decision = model.preset ?? 'deny';
    this.emit('permission', { prompt: model.prompt, trusted: model.trusted, decision });
    return decision;
  }

  checks(title: string, items: CheckLine[]): void {
    this.emit('checks', { title, items });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return {
      update: () => {},
      succeed: () => {},
      fail: () => {},
      warn: () => {},
      stop: () => {},
    };
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let current: Renderer | null = null;

/** The renderer commands write through; picked from `QCHAT_BRIDGE_QUIET` until set. */
export function getRenderer(): Renderer {
  current ??= process.env.QCHAT_BRIDGE_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  return current;
}

/** Swap the renderer, e.g. for a capturing one in tests. */
export function setRenderer(renderer: Renderer): void {
  current = renderer;
}

/** Install the renderer matching the global `--quiet` flag. */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  current = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  return current;
}
