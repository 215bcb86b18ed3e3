import type { DiagnosticLog } from './diagnostics.js';
import { describeError } from './errors.js';
import { findEndOfTurnPrompt, findPermissionPrompt, findUnfinishedPermissionPrompt } from './patterns.js';
import type { RawOutputQueue } from './queue.js';
import { filterTransientStatus, removeInputEchoOnce, stripTerminalControl } from './sanitizer.js';
import type { ChildExit } from './supervisor.js';
import type { PermissionDecision, TurnEvent, TurnState, TurnTimings } from './types.js';

export const PERMISSION_TOKENS: Record<PermissionDecision, 'y' | 'n' | 't'> = {
  'approve-once': 'y',
  deny: 'n',
  'approve-and-trust': 't'
};

export interface TurnEngineDeps {
  queue: RawOutputQueue<string>;
  write: (text: string) => Promise<void>;
  isAlive: () => boolean;
  exitInfo: () => ChildExit | null;
  log: DiagnosticLog;
  timings: TurnTimings;
}

/**
 * One conversational turn at a time over the raw output queue.
 *
 * The raw buffer and the emitted offset survive a permission suspension, so
 * `resumeStreaming` picks up exactly where the suspended turn stopped.
 */
export class TurnEngine {
  private rawBuffer = '';
  private emitted = 0;
  private state: TurnState = 'done';

  constructor(private deps: TurnEngineDeps) {}

  get lastState(): TurnState {
    return this.state;
  }

  async *sendAndStream(message: string): AsyncGenerator<TurnEvent, TurnState, undefined> {
    this.state = 'sending';

    const stale = this.deps.queue.drain();
    if (stale.length > 0) this.deps.log.event('STATE', `discarded ${stale.length} stale chunk(s) before send`);
    this.rawBuffer = '';
    this.emitted = 0;

    try {
      await this.deps.write(`${message}\n`);
    } catch (err) {
      this.deps.log.event('ERROR', `send failed: ${describeError(err)}`);
      yield { type: 'text', text: `\n[Error writing to q chat input: ${describeError(err)}]\n` };
      return this.finish('errored');
    }
    this.deps.log.event('SEND', `'${preview(message)}'`);

    return yield* this.stream(message);
  }

  async *resumeStreaming(): AsyncGenerator<TurnEvent, TurnState, undefined> {
    this.deps.log.event('STATE', 'resuming after permission decision');
    return yield* this.stream(undefined);
  }

  async answerPermission(decision: PermissionDecision): Promise<void> {
    const token = PERMISSION_TOKENS[decision];
    await this.deps.write(`${token}\n`);
    this.deps.log.event('PERMISSION', `answered ${decision} (${token})`);
  }

  private async *stream(echoOf: string | undefined): AsyncGenerator<TurnEvent, TurnState, undefined> {
    const t = this.deps.timings;
    this.state = 'streaming';

    const startedAt = Date.now();
    const deadline = startedAt + t.turnTimeoutMs;
    const resumed = echoOf === undefined;
    let echoPending = echoOf;
    let sawOutput = false;
    let kickSent = false;
    let promptSeen = false;
    // End of text held back behind an unfinished narrative permission prompt.
    let heldUntil: number | null = null;
    let lastOutputAt = startedAt;
    let lastAnyAt = startedAt;

    try {
      for (;;) {
        if (Date.now() >= deadline) {
          this.deps.log.event('TIMEOUT', `${t.turnTimeoutMs}ms elapsed. proc.alive=${this.deps.isAlive()}`);
          return this.finish('timed_out');
        }

        const wait = Math.min(promptSeen ? t.promptQuietMs : t.pollIntervalMs, Math.max(0, deadline - Date.now()));
        const chunk = await this.deps.queue.receive(wait);
        const now = Date.now();

        if (chunk !== undefined) {
          this.rawBuffer += chunk;
          lastAnyAt = now;

          const cleaned = stripTerminalControl(this.rawBuffer);
          if (resumed && !sawOutput) this.emitted = skipRepeatedPrompts(cleaned, this.emitted);
          const prompt = findEndOfTurnPrompt(cleaned.slice(this.emitted));
          promptSeen = prompt !== null;
          const fullEnd = prompt ? this.emitted + prompt.index : cleaned.length;
          heldUntil = null;
          if (fullEnd <= this.emitted) continue;

          let span = cleaned.slice(this.emitted, fullEnd);
          if (echoPending !== undefined) span = removeInputEchoOnce(span, echoPending);

          const permission = findPermissionPrompt(span);
          if (permission) {
            const before = filterTransientStatus(span.slice(0, permission.index));
            if (before) yield { type: 'text', text: before };
            const request = span.slice(permission.index).trim();
            this.emitted = fullEnd;
            this.deps.log.event('PERMISSION', `requested (${permission.kind}): '${preview(request)}'`);
            yield { type: 'permission', prompt: request };
            return this.finish('suspended');
          }

          const lead = findUnfinishedPermissionPrompt(cleaned.slice(this.emitted, fullEnd));
          const end = lead === null ? fullEnd : this.emitted + lead;
          if (lead !== null) heldUntil = fullEnd;
          if (end <= this.emitted) continue;

          const text = this.takeText(cleaned, end, echoPending);
          if (text) {
            yield { type: 'text', text };
            echoPending = undefined;
            if (text.trim()) {
              sawOutput = true;
              lastOutputAt = Date.now();
            }
          }
          continue;
        }

        if (heldUntil !== null && now - lastAnyAt >= t.promptQuietMs) {
          // The trust phrase never came: the held lines were reply text after all.
          const text = this.takeText(stripTerminalControl(this.rawBuffer), heldUntil, echoPending);
          heldUntil = null;
          if (text) {
            yield { type: 'text', text };
            echoPending = undefined;
            if (text.trim()) {
              sawOutput = true;
              lastOutputAt = now;
            }
          }
        }

        const promptQuietMs = resumed && !sawOutput ? t.silenceDoneMs : t.promptQuietMs;
        if (promptSeen && now - lastAnyAt >= promptQuietMs) {
          this.deps.log.event('STATE', 'turn done (prompt)');
          return this.finish('done');
        }
        if (sawOutput && now - lastOutputAt >= t.silenceDoneMs) {
          this.deps.log.event('STATE', `turn done (no output for ${t.silenceDoneMs}ms)`);
          return this.finish('done');
        }
        if (!sawOutput && !promptSeen && !kickSent && now - lastAnyAt >= t.kickAfterMs) {
          kickSent = true;
          try {
            await this.deps.write('\n');
            this.deps.log.event('KICK', `sent extra newline after ${t.kickAfterMs}ms of silence`);
          } catch (err) {
            this.deps.log.event('KICK', `failed to send extra newline: ${describeError(err)}`);
          }
        }
        if (!this.deps.isAlive() && this.deps.queue.size === 0) {
          const how = describeExit(this.deps.exitInfo());
          this.deps.log.event('ERROR', `child exited mid-turn (${how})`);
          yield { type: 'text', text: `\n[q chat exited unexpectedly (${how})]\n` };
          return this.finish('errored');
        }
      }
    } catch (err) {
      this.deps.log.event('ERROR', `stream exception: ${describeError(err)}`);
      yield { type: 'text', text: `\n[Error while reading output: ${describeError(err)}]\n` };
      return this.finish('errored');
    }
  }

  /**
   * Sanitized text from the emitted offset up to `end`. The offset only moves
   * when something survives filtering, so a partial echo or spinner frame is
   * looked at again together with the next chunk.
   */
  private takeText(cleaned: string, end: number, echoPending: string | undefined): string {
    let span = cleaned.slice(this.emitted, end);
    if (echoPending !== undefined) span = removeInputEchoOnce(span, echoPending);
    const text = filterTransientStatus(span);
    if (text) this.emitted = end;
    return text;
  }

  private finish(state: TurnState): TurnState {
    this.state = state;
    return state;
  }
}

/**
 * After a permission answer the chat may repeat its idle prompt before the
 * tool's output. Skip prompt lines that have nothing unemitted before them and
 * more output after them; a trailing prompt is left for end-of-turn detection.
 */
function skipRepeatedPrompts(cleaned: string, from: number): number {
  let offset = from;
  for (;;) {
    const rest = cleaned.slice(offset);
    const found = findEndOfTurnPrompt(rest);
    if (!found || rest.slice(0, found.index).trim()) return offset;
    let after = found.index + found.text.length;
    if (rest[after] === '\n') after += 1;
    if (!rest.slice(after).trim()) return offset;
    offset += after;
  }
}

function describeExit(exit: ChildExit | null): string {
  if (typeof exit?.exitCode === 'number') return `exit code ${exit.exitCode}`;
  if (exit?.signal) return `signal ${exit.signal}`;
  return 'exit code unknown';
}

function preview(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
