import type { ChatSession } from './session.js';
import type { PermissionDecision, PermissionRequest, TurnEvent, TurnState } from './types.js';

export interface ConversationHandlers {
  onText?: (text: string) => void;
  /** Asked once per permission prompt; the turn resumes with the answer. */
  decide: (request: PermissionRequest) => Promise<PermissionDecision>;
}

export interface ConversationTurnResult {
  text: string;
  state: TurnState;
  permissions: Array<{ prompt: string; decision: PermissionDecision }>;
}

/**
 * Send one message and drive the turn to completion:
 * answer → resume → (text)* → (permission, repeat) | done.
 */
export async function runConversationTurn(
  session: ChatSession,
  message: string,
  handlers: ConversationHandlers
): Promise<ConversationTurnResult> {
  let text = '';
  const permissions: ConversationTurnResult['permissions'] = [];

  let stream: AsyncGenerator<TurnEvent, TurnState, undefined> = session.sendAndStream(message);
  for (;;) {
    let pending: PermissionRequest | null = null;
    for await (const ev of stream) {
      if (ev.type === 'text') {
        text += ev.text;
        handlers.onText?.(ev.text);
      } else {
        pending = ev;
      }
    }
    if (!pending) break;

    const decision = await handlers.decide(pending);
    permissions.push({ prompt: pending.prompt, decision });
    await session.answerPermission(decision);
    stream = session.resumeStreaming();
  }

  return { text, state: session.lastTurnState, permissions };
}
