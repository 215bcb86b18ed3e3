import { execa } from 'execa';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, isAbsolute, join } from 'node:path';

export interface BinaryProbe {
  path: string | null;
  version: string | null;
  identity: string | null;
}

/** Locate `name` the way a shell would (`PATH` lookup, executables only). */
export async function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (isAbsolute(name) || name.includes('/')) {
    return (await isExecutable(name)) ? name : null;
  }
  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

/** `<binary> --version` and `<binary> whoami`, each bounded to a few seconds. */
export async function probeChatBinary(binary: string, env: NodeJS.ProcessEnv = process.env): Promise<BinaryProbe> {
  const path = await findExecutable(binary, env);
  if (!path) return { path: null, version: null, identity: null };

  const [version, identity] = await Promise.all([runQuiet(path, ['--version']), runQuiet(path, ['whoami'])]);
  return { path, version, identity };
}

async function runQuiet(file: string, args: string[]): Promise<string | null> {
  const res = await execa(file, args, { reject: false, timeout: 5_000, stdin: 'ignore' });
  const out = typeof res.stdout === 'string' ? res.stdout.trim() : '';
  return out || null;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
