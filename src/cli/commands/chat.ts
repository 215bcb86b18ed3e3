import { describeError } from '../../core/session/errors.js';
import type { ChatSession } from '../../core/session/session.js';
import { createCliLogger } from '../../utils/logger.js';
import { installSessionCancellation } from '../cancel.js';
import { createChatSession, runRenderedTurn, startChatSession, type SessionCommandOptions } from '../session-options.js';
import { speakerLabel } from '../ui/format.js';
import { isPromptCancellation, promptInput } from '../ui/prompts.js';
import { getRenderer } from '../ui/renderer.js';

export interface ChatCommandOptions extends SessionCommandOptions {
  /** Next line of user input, or null at end of input. Defaults to an interactive prompt. */
  readLine?: () => Promise<string | null>;
  /** Shown in the header when set. */
  version?: string;
}

const EXIT_COMMANDS = new Set(['/exit', '/quit']);
const RESTART_COMMAND = '/restart';

/**
 * `qchat-bridge chat` — interactive loop over one long-lived `q chat` session.
 *
 * `/restart` closes the child and starts a fresh one; `/exit` (or end of input) quits.
 */
export async function runChatCommand(opts: ChatCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const logger = createCliLogger(opts.env);
  const readLine = opts.readLine ?? readPromptLine;

  let session: ChatSession | null = null;
  let cancelled = false;
  let turns = 0;

  const cancellation = installSessionCancellation({
    env: opts.env,
    closeSession: async () => {
      cancelled = true;
      r.warn('Cancelling; closing q chat...');
      await session?.close();
    },
  });

  if (opts.version) r.brand(opts.version);

  try {
    session = await createChatSession(opts);
    await startChatSession(session, r);
    logger.debug('chat session started', { pid: session.pid, cwd: session.config.cwd });

    while (!cancelled) {
      const line = await readLine();
      if (line === null) break;
      const message = line.trim();
      if (!message) continue;
      if (EXIT_COMMANDS.has(message)) break;

      if (message === RESTART_COMMAND) {
        await session.close();
        r.sessionClosed('restart');
        session = await createChatSession(opts);
        await startChatSession(session, r);
        logger.debug('chat session restarted', { pid: session.pid });
        continue;
      }

      if (!session.isAlive()) {
        r.warn(`q chat is no longer running. Type ${RESTART_COMMAND} to start a new session.`);
        continue;
      }

      const result = await runRenderedTurn(session, message, r);
      turns += 1;
      logger.debug('turn finished', { state: result.state, permissions: result.permissions.length });
    }

    if (cancelled) return { ok: false, details: { reason: 'cancelled' } };
    return { ok: true, details: { turns } };
  } catch (err) {
    if (cancelled) return { ok: false, details: { reason: 'cancelled' } };
    return { ok: false, details: describeError(err) };
  } finally {
    cancellation.dispose();
    if (session) {
      await session.close();
      r.sessionClosed(cancelled ? 'cancelled' : 'exit');
    }
  }
}

async function readPromptLine(): Promise<string | null> {
  try {
    return await promptInput({ message: speakerLabel('you') });
  } catch (err) {
    if (isPromptCancellation(err)) return null;
    throw err;
  }
}
