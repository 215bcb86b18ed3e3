import { theme, INDENT, RULE_WIDTH, type Speaker } from './theme.js';

/** Turn duration for the status line: "850ms", "3.2s", "1m 42s". */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1_000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1_000).toFixed(1)}s`;
  const seconds = Math.round(ms / 1_000);
  const rest = seconds % 60;
  return rest === 0 ? `${Math.floor(seconds / 60)}m` : `${Math.floor(seconds / 60)}m ${rest}s`;
}

export function padRight(str: string, width: number): string {
  return str.padEnd(width, ' ');
}

/** Colored speaker tag for the transcript view: "you ›", "q ›". */
export function speakerLabel(speaker: Speaker): string {
  return theme.speaker(speaker)(theme.bold(`${speaker} ›`));
}

/** `── Session ─────────────` */
export function sectionBanner(name: string, width: number = RULE_WIDTH): string {
  const fill = Math.max(4, width - name.length - 4);
  return `${theme.dim('──')} ${theme.bold(name)} ${theme.dim('─'.repeat(fill))}`;
}

/**
 * Frame `lines` in a rounded box with `title` in the top border. Lines may
 * carry colour codes; padding is computed on their visible width.
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const border = theme.permission.border;
  const inner = width - 2;
  const heading = ` ${title} `;

  const top = border('╭─') + theme.permission.title(heading) + border(`${'─'.repeat(Math.max(0, inner - 1 - heading.length))}╮`);
  const row = (content: string) => {
    const gap = ' '.repeat(Math.max(0, inner - 2 - stripAnsi(content).length));
    return `${border('│')} ${content}${gap} ${border('│')}`;
  };
  const bottom = border(`╰${'─'.repeat(inner)}╯`);

  return [top, ...lines.map(row), bottom].join('\n');
}

/** Break long lines at `width` columns so they fit inside a box. */
export function wrapLines(text: string, width: number): string[] {
  const out: string[] = [];
  for (const line of text.split('\n')) {
    if (line.length <= width) {
      out.push(line);
      continue;
    }
    for (let i = 0; i < line.length; i += width) out.push(line.slice(i, i + width));
  }
  return out;
}

/** `  Trusted       fs_read, fs_write` */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return `${INDENT}${theme.dim(padRight(label, labelWidth))}${value}`;
}

export interface CheckLine {
  name: string;
  passed: boolean;
  detail?: string;
}

/** `  ✖ Signed in           run `q login`` */
export function checkLine(item: CheckLine, nameWidth: number = 20): string {
  const icon = item.passed ? theme.check : theme.cross;
  return `${INDENT}${icon} ${padRight(item.name, nameWidth)}${item.detail ? theme.dim(item.detail) : ''}`;
}

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
