import { describeError } from '../../core/session/errors.js';
import type { ChatSession } from '../../core/session/session.js';
import type { TurnState } from '../../core/session/types.js';
import { createCliLogger } from '../../utils/logger.js';
import { installSessionCancellation } from '../cancel.js';
import { createChatSession, runRenderedTurn, startChatSession, type SessionCommandOptions } from '../session-options.js';
import { decisionForPolicy, type PermissionPolicy } from '../ui/permission-prompt.js';
import { getRenderer } from '../ui/renderer.js';

export interface AskCommandOptions extends SessionCommandOptions {
  message: string;
  /** How to answer permission prompts; defaults to `deny`. */
  onPermission?: PermissionPolicy;
}

export interface AskDetails {
  state: TurnState;
  text: string;
  permissions: number;
}

/**
 * `qchat-bridge ask <message>` — one-shot: start a session, run a single turn, close.
 * Succeeds only when the turn reaches `done`.
 */
export async function runAskCommand(opts: AskCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const logger = createCliLogger(opts.env);
  const preset = decisionForPolicy(opts.onPermission ?? 'deny');

  let session: ChatSession | null = null;
  let cancelled = false;
  const cancellation = installSessionCancellation({
    env: opts.env,
    closeSession: async () => {
      cancelled = true;
      await session?.close();
    },
  });

  try {
    session = await createChatSession(opts);
    await startChatSession(session, r);

    const result = await runRenderedTurn(session, opts.message, r, preset);
    logger.debug('ask finished', { state: result.state, permissions: result.permissions });

    if (cancelled) return { ok: false, details: { reason: 'cancelled' } };
    const details: AskDetails = { state: result.state, text: result.text, permissions: result.permissions.length };
    return { ok: result.state === 'done', details };
  } catch (err) {
    if (cancelled) return { ok: false, details: { reason: 'cancelled' } };
    return { ok: false, details: describeError(err) };
  } finally {
    cancellation.dispose();
    await session?.close();
  }
}
