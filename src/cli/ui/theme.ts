import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export type Speaker = 'you' | 'q';

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  arrow: chalk.dim('→'),

  // Each side of the conversation gets its own color.
  speaker: (name: Speaker): ChalkInstance => {
    const map: Record<Speaker, ChalkInstance> = {
      you: chalk.cyan,
      q: chalk.magenta,
    };
    return map[name];
  },

  // Permission prompt chrome
  permission: {
    border: chalk.yellow,
    title: chalk.bold.yellow,
    label: chalk.bold,
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;
