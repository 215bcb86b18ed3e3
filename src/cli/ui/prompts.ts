import { input, select } from '@inquirer/prompts';

import { getActiveCancelSignal } from '../cancel.js';

export async function promptSelect<T>(opts: Parameters<typeof select<T>>[0]): Promise<T> {
  const signal = getActiveCancelSignal();
  return await select<T>(opts, signal ? { signal } : {});
}

export async function promptInput(opts: Parameters<typeof input>[0]): Promise<string> {
  const signal = getActiveCancelSignal();
  return await input(opts, signal ? { signal } : {});
}

/** True when a prompt ended because the user cancelled it (Ctrl+C, Ctrl+D or an abort). */
export function isPromptCancellation(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ExitPromptError' || err.name === 'AbortPromptError');
}
