import { echoCandidates } from './patterns.js';

// ── Terminal control ────────────────────────────────────────────────────────

const CSI_SEQUENCE = /\u001b\[[0-9;?]*[ -/]*[@-~]/g;
const OSC_SEQUENCE = /\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g;
const SAVE_RESTORE_CURSOR = /\u001b[78]/g;

/**
 * Remove CSI (cursor/colour), OSC (title/hyperlink) and save/restore-cursor
 * sequences. Runs to a fixed point, so removing one sequence never leaves a
 * freshly joined one behind. Unrecognized escapes are kept as-is.
 */
export function stripTerminalControl(text: string): string {
  if (!text) return text;
  let current = text;
  for (;;) {
    const next = current.replace(CSI_SEQUENCE, '').replace(OSC_SEQUENCE, '').replace(SAVE_RESTORE_CURSOR, '');
    if (next === current) return next;
    current = next;
  }
}

// ── Transient status ("Thinking..." spinner frames) ─────────────────────────

const SPINNER = '\\u2800-\\u28FF◐◓◑◒◴◷◶◵✶✻✽✢✳⏺∗';
const BULLETS = '•·●◦▪‣∙';
const PUNCT = '.…,:;!?*~_';
const NOISE = `[${SPINNER}${BULLETS}${PUNCT}>\\s]`;

const THINKING_LINE = new RegExp(`^${NOISE}*(?:thinking${NOISE}*)+$`, 'i');
const THINKING_FRAGMENT = new RegExp(`^[thinkg]{1,10}[${PUNCT}]*$`, 'i');
const GLYPH_LINE = new RegExp(`^${NOISE}+$`);
const INLINE_SPINNER_RUN = new RegExp(`(?:[${SPINNER}]+[ \\t]*thinking[${PUNCT}]*[ \\t]*)+(?:>[ \\t]*)?`, 'gi');
const EXCESS_BLANK_LINES = /\n(?:[ \t]*\r?\n){3,}/g;

export function isTransientStatusLine(line: string): boolean {
  const t = line.trim();
  if (!t) return false;
  if (THINKING_LINE.test(t)) return true;
  if (t.length <= 10 && THINKING_FRAGMENT.test(t)) return true;
  return GLYPH_LINE.test(t);
}

/**
 * Drop spinner/"Thinking" redraw frames, strip inline spinner runs, and collapse
 * runs of three or more blank lines to a single blank line.
 */
export function filterTransientStatus(text: string): string {
  if (!text) return text;

  const kept: string[] = [];
  for (const piece of text.split(/(?<=\n)/)) {
    const terminator = /\r?\n$/.exec(piece)?.[0] ?? '';
    const content = piece.slice(0, piece.length - terminator.length);
    if (isTransientStatusLine(content)) continue;

    const cleaned = content.replace(INLINE_SPINNER_RUN, '');
    if (cleaned !== content && !cleaned.trim()) continue;
    kept.push(cleaned + terminator);
  }

  return kept.join('').replace(EXCESS_BLANK_LINES, '\n\n');
}

// ── Input echo ──────────────────────────────────────────────────────────────

/** Remove the child's echo of the message just sent, at most once. */
export function removeInputEchoOnce(text: string, sent: string): string {
  if (!text || !sent) return text;
  for (const candidate of echoCandidates(sent)) {
    const idx = text.indexOf(candidate);
    if (idx !== -1) return text.slice(0, idx) + text.slice(idx + candidate.length);
  }
  return text;
}
