import { access, constants } from 'node:fs/promises';

import { resolveBinaryName } from '../../core/config.js';
import { trustedTools } from '../../core/session/supervisor.js';
import { defaultWorkingDirectory, normalizeWorkingDirectory } from '../../workspace/layout.js';
import { probeChatBinary, type BinaryProbe } from '../../workspace/binary.js';
import { keyValue, type CheckLine } from '../ui/format.js';
import { getRenderer } from '../ui/renderer.js';

export interface DoctorCommandOptions {
  binary?: string;
  cwd?: string;
  trustWrite?: boolean;
  trustBash?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Replaces the real binary probe. */
  probe?: (binary: string, env: NodeJS.ProcessEnv) => Promise<BinaryProbe>;
}

/**
 * `qchat-bridge doctor` — is `q` installed and signed in, and can the working directory be used?
 */
export async function runDoctorCommand(opts: DoctorCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const env = opts.env ?? process.env;
  const binary = opts.binary ?? resolveBinaryName(env);
  const cwd = normalizeWorkingDirectory(opts.cwd ?? defaultWorkingDirectory());
  const probe = opts.probe ?? probeChatBinary;

  const found = await probe(binary, env);
  const cwdState = await describeDirectory(cwd);

  const items: CheckLine[] = [
    { name: 'Binary', passed: found.path !== null, detail: found.path ?? `'${binary}' not found on PATH` },
    { name: 'Version', passed: found.version !== null, detail: found.version ?? 'unknown' },
    { name: 'Signed in', passed: found.identity !== null, detail: found.identity ?? 'run `q login`' },
    { name: 'Working directory', passed: cwdState !== 'not writable', detail: `${cwd} (${cwdState})` },
  ];
  r.checks('Environment', items);

  const trusted = trustedTools({ trustFsWrite: !!opts.trustWrite, trustExecuteBash: !!opts.trustBash });
  r.text(keyValue('Trusted', trusted.join(', ')));
  r.blank();

  const ok = items.every((i) => i.passed);
  return { ok, details: { binary: found, cwd, cwdState, trusted } };
}

type DirectoryState = 'ready' | 'will be created' | 'not writable';

async function describeDirectory(dir: string): Promise<DirectoryState> {
  try {
    await access(dir, constants.W_OK);
    return 'ready';
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 'will be created';
    return 'not writable';
  }
}
