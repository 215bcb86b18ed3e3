import { Command, Option } from 'commander';
import { existsSync } from 'node:fs';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Q_LOG_LEVELS } from '../core/config.js';
import { runAskCommand } from './commands/ask.js';
import { runChatCommand } from './commands/chat.js';
import { runDoctorCommand } from './commands/doctor.js';
import { PERMISSION_POLICIES, isPermissionPolicy } from './ui/permission-prompt.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface SessionFlags {
  cwd?: string;
  trustWrite?: boolean;
  trustBash?: boolean;
  logLevel?: string;
  debug?: boolean;
  logDir?: string;
}

export function buildCli(): Command {
  const program = new Command();

  let globalFlags: { verbose: boolean; quiet: boolean } = { verbose: false, quiet: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('qchat-bridge')
    .description('Drive the interactive `q chat` CLI as a request/response session')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    globalFlags = { verbose: !!o.verbose, quiet: !!o.quiet };
    process.env.QCHAT_BRIDGE_VERBOSE = globalFlags.verbose ? '1' : '0';
    process.env.QCHAT_BRIDGE_QUIET = globalFlags.quiet ? '1' : '0';
    createRenderer({ quiet: globalFlags.quiet });
  });

  // ── Conversation Commands ────────────────────────────────────────────────

  withSessionFlags(
    program
      .command('chat')
      .description('Interactive chat (/restart for a fresh session, /exit to quit)')
  ).action(async (opts: SessionFlags) => {
    const res = await runChatCommand({ ...opts, version });
    if (!res.ok) {
      if (isCancelled(res.details)) {
        getRenderer().warn('Cancelled.');
        process.exitCode = 130;
        return;
      }
      getRenderer().error(
        'Chat failed',
        String(res.details ?? 'unknown error'),
        'Run `qchat-bridge doctor` to check the q installation, or retry with --debug.',
      );
      process.exitCode = 1;
    }
  });

  withSessionFlags(
    program
      .command('ask')
      .description('Send one message, print the reply, and exit')
      .argument('<message>', 'Message to send')
      .addOption(
        new Option('--on-permission <policy>', 'Answer tool permission prompts with this policy')
          .choices(PERMISSION_POLICIES)
          .default('deny'),
      )
  ).action(async (message: string, opts: SessionFlags & { onPermission?: string }) => {
    const policy = opts.onPermission && isPermissionPolicy(opts.onPermission) ? opts.onPermission : 'deny';
    const res = await runAskCommand({ ...opts, message, onPermission: policy });
    if (!res.ok) {
      if (isCancelled(res.details)) {
        getRenderer().warn('Cancelled.');
        process.exitCode = 130;
        return;
      }
      getRenderer().error('Ask failed', describeAskFailure(res.details), 'Retry with --debug to keep a session log.');
      process.exitCode = 1;
    }
  });

  // ── Diagnostics ──────────────────────────────────────────────────────────

  program
    .command('doctor')
    .description('Check that `q` is installed and signed in')
    .option('--cwd <dir>', 'Working directory to check')
    .option('--trust-write', 'Include fs_write in the trusted tools')
    .option('--trust-bash', 'Include execute_bash in the trusted tools')
    .action(async (opts: { cwd?: string; trustWrite?: boolean; trustBash?: boolean }) => {
      const res = await runDoctorCommand({ ...opts });
      if (!res.ok) process.exitCode = 1;
    });

  return program;
}

function withSessionFlags(cmd: Command): Command {
  return cmd
    .option('--cwd <dir>', 'Working directory for q chat (default: ~/amazon-q)')
    .option('--trust-write', 'Trust fs_write without asking')
    .option('--trust-bash', 'Trust execute_bash without asking')
    .addOption(new Option('--log-level <level>', 'Q_LOG_LEVEL for the child').choices(Q_LOG_LEVELS))
    .option('--debug', 'Write a diagnostic session log')
    .option('--log-dir <dir>', 'Directory for diagnostic logs (default: ./logs)');
}

function isCancelled(details: unknown): boolean {
  return typeof details === 'object' && details !== null && 'reason' in details && details.reason === 'cancelled';
}

function describeAskFailure(details: unknown): string {
  if (typeof details === 'object' && details !== null && 'state' in details) {
    return `Turn ended in state '${String(details.state)}'`;
  }
  return String(details ?? 'unknown error');
}

await buildCli().parseAsync(process.argv);

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed = JSON.parse(content) as { version?: unknown };
        return typeof parsed.version === 'string' ? parsed.version : null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
