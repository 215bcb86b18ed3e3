/** Both spellings the chat prints when it is idle and waiting for input. */
export const PROMPT_SPELLINGS = ['Amazon Q>', '>'] as const;

const END_OF_TURN_PROMPT = /^[ \t]*(?:Amazon Q>|>)[ \t\r]*$/m;

// Two tool-use code paths phrase their confirmation differently.
const BRACKETED_PERMISSION = /\[y\/n(?:\/t)?\]:/i;
const NARRATIVE_PERMISSION = /Allow this action\?[\s\S]*?Use ['‘’]t['‘’] to trust/i;
const NARRATIVE_OPENING = /Allow this action\?/i;

export interface PatternMatch {
  /** Offset of the match in the searched text. */
  index: number;
  text: string;
}

export interface PermissionPromptMatch extends PatternMatch {
  kind: 'bracketed' | 'narrative';
}

/** First line that is nothing but an idle prompt, or null. */
export function findEndOfTurnPrompt(text: string): PatternMatch | null {
  const m = END_OF_TURN_PROMPT.exec(text);
  if (!m) return null;
  return { index: m.index, text: m[0] };
}

/**
 * Earliest confirmation prompt in `text`. When both idioms appear, the one
 * starting first wins.
 */
export function findPermissionPrompt(text: string): PermissionPromptMatch | null {
  const candidates: PermissionPromptMatch[] = [];

  const narrative = NARRATIVE_PERMISSION.exec(text);
  if (narrative) candidates.push({ kind: 'narrative', index: narrative.index, text: narrative[0] });

  const bracketed = BRACKETED_PERMISSION.exec(text);
  if (bracketed) candidates.push({ kind: 'bracketed', index: bracketed.index, text: bracketed[0] });

  if (candidates.length === 0) return null;
  return candidates.reduce((best, c) => (c.index < best.index ? c : best));
}

/**
 * Offset of an "Allow this action?" whose trust phrase has not arrived yet.
 * The narrative prompt can span lines, so text from here on is not yet known
 * to be reply text.
 */
export function findUnfinishedPermissionPrompt(text: string): number | null {
  const m = NARRATIVE_OPENING.exec(text);
  if (!m || NARRATIVE_PERMISSION.test(text.slice(m.index))) return null;
  return m.index;
}

/**
 * Literal forms the chat may echo back for a sent message, most specific first:
 * prompt-prefixed before bare, CRLF before LF before no terminator.
 */
export function echoCandidates(sent: string): string[] {
  const out: string[] = [];
  for (const prefix of [...PROMPT_SPELLINGS.map((p) => `${p} `), '']) {
    for (const suffix of ['\r\n', '\n', '']) {
      out.push(`${prefix}${sent}${suffix}`);
    }
  }
  return out;
}
