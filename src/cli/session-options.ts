import { resolveSessionConfig, isQLogLevel, type SessionConfigInput } from '../core/config.js';
import { openDiagnosticLog } from '../core/session/diagnostics.js';
import { ChatSession } from '../core/session/session.js';
import { runConversationTurn, type ConversationTurnResult } from '../core/session/conversation.js';
import type { SpawnChatChild } from '../core/session/supervisor.js';
import type { PermissionDecision } from '../core/session/types.js';
import type { Renderer } from './ui/renderer.js';

/** Flags shared by `chat` and `ask`. */
export interface SessionCommandOptions {
  cwd?: string;
  binary?: string;
  trustWrite?: boolean;
  trustBash?: boolean;
  logLevel?: string;
  debug?: boolean;
  logDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Replaces the real `q chat` spawn. */
  spawn?: SpawnChatChild;
}

export function sessionConfigInput(opts: SessionCommandOptions): SessionConfigInput {
  const logLevel = opts.logLevel;
  if (logLevel !== undefined && !isQLogLevel(logLevel)) {
    throw new Error(`Unknown log level '${logLevel}'`);
  }
  return {
    binary: opts.binary,
    cwd: opts.cwd,
    trustFsWrite: opts.trustWrite,
    trustExecuteBash: opts.trustBash,
    logLevel,
    debug: opts.debug,
    logDir: opts.logDir,
  };
}

/** Resolve config, open the debug log when asked for, and build an unstarted session. */
export async function createChatSession(opts: SessionCommandOptions): Promise<ChatSession> {
  const config = resolveSessionConfig(sessionConfigInput(opts), opts.env ?? process.env);
  const log = config.debug && config.logDir ? await openDiagnosticLog(config.logDir) : undefined;
  return new ChatSession(config, { spawn: opts.spawn, log });
}

/** Start the child behind a spinner and print the session summary. */
export async function startChatSession(session: ChatSession, r: Renderer): Promise<void> {
  const spinner = r.spinner('Starting q chat');
  try {
    const banner = await session.start();
    spinner.succeed('q chat ready');
    r.sessionStarted({
      pid: session.pid,
      cwd: session.config.cwd,
      trusted: session.trustedTools,
      logFile: session.logFilePath,
      banner,
    });
  } catch (err) {
    spinner.fail('q chat failed to start');
    throw err;
  }
}

/** One conversation turn with replies and permission prompts routed through the renderer. */
export async function runRenderedTurn(
  session: ChatSession,
  message: string,
  r: Renderer,
  preset?: PermissionDecision
): Promise<ConversationTurnResult> {
  const started = Date.now();
  const result = await runConversationTurn(session, message, {
    onText: (text) => r.assistantText(text),
    decide: (request) => r.presentPermissionPrompt({ prompt: request.prompt, trusted: session.trustedTools, preset }),
  });
  r.turnEnd({ state: result.state, durationMs: Date.now() - started, permissions: result.permissions.length });
  return result;
}
