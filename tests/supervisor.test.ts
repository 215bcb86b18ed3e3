import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { DiagnosticLog } from '../src/core/session/diagnostics.js';
import { SessionAlreadyStartedError, SessionWriteError } from '../src/core/session/errors.js';
import { RawOutputQueue } from '../src/core/session/queue.js';
import { ProcessSupervisor, buildChildEnv, buildInvocation, trustedTools } from '../src/core/session/supervisor.js';
import type { Invocation } from '../src/core/session/types.js';
import { FakeChatChild, captureStream, makeTempDir, spawnFakes, testConfig } from './fake-child.js';

describe('invocation', () => {
  it('always trusts fs_read and adds the opted-in tools', () => {
    expect(trustedTools({ trustFsWrite: false, trustExecuteBash: false })).toEqual(['fs_read']);
    expect(trustedTools({ trustFsWrite: true, trustExecuteBash: true })).toEqual(['fs_read', 'fs_write', 'execute_bash']);
  });

  it('builds the chat command line', () => {
    const config = testConfig('/work', { binary: '/opt/q/bin/q', trustFsWrite: true });
    const inv = buildInvocation(config, {});
    expect(inv.command).toBe('/opt/q/bin/q');
    expect(inv.args).toEqual(['chat', '--trust-tools=fs_read,fs_write']);
    expect(inv.cwd).toBe('/work');
  });

  it('sets Q_LOG_LEVEL and defaults terminal variables only when absent', () => {
    const env = buildChildEnv({ logLevel: 'debug' }, { PATH: '/usr/bin', TERM: 'screen', UNSET: undefined });
    expect(env).toEqual({
      PATH: '/usr/bin',
      TERM: 'screen',
      Q_LOG_LEVEL: 'debug',
      LANG: 'C.UTF-8',
      LC_ALL: 'C.UTF-8'
    });
  });
});

describe('ProcessSupervisor', () => {
  it('spawns in a created working directory and returns the sanitized banner', async () => {
    const base = await makeTempDir();
    const cwd = join(base, 'nested', 'work');
    const child = new FakeChatChild({ banner: '\u001b[1mWelcome to Amazon Q\u001b[0m\n⠋ Thinking...\n> ' });
    const invocations: Invocation[] = [];
    const supervisor = new ProcessSupervisor(
      testConfig(cwd),
      new RawOutputQueue<string>(),
      DiagnosticLog.disabled(),
      spawnFakes([child], invocations)
    );

    const banner = await supervisor.start();

    expect(banner).toBe('Welcome to Amazon Q\n');
    expect((await stat(cwd)).isDirectory()).toBe(true);
    expect(invocations).toHaveLength(1);
    expect(invocations[0]?.args).toEqual(['chat', '--trust-tools=fs_read']);
    expect(supervisor.pid).toBe(4242);
    expect(supervisor.isAlive()).toBe(true);

    await supervisor.close();
  });

  it('fails open when the prompt never shows', async () => {
    const cwd = await makeTempDir();
    const sink = captureStream();
    const config = testConfig(cwd);
    const supervisor = new ProcessSupervisor(
      { ...config, timings: { ...config.timings, startupTimeoutMs: 100 } },
      new RawOutputQueue<string>(),
      new DiagnosticLog(sink.stream),
      spawnFakes([new FakeChatChild({ banner: 'Loading tools\n' })])
    );

    expect(await supervisor.start()).toBe('Loading tools\n');
    await sink.settle();
    expect(sink.text()).toContain('STATE: startup timeout after 100ms; continuing\n');

    await supervisor.close();
  });

  it('refuses a second spawn', async () => {
    const cwd = await makeTempDir();
    const supervisor = new ProcessSupervisor(
      testConfig(cwd),
      new RawOutputQueue<string>(),
      DiagnosticLog.disabled(),
      spawnFakes([new FakeChatChild({ banner: '> ' }), new FakeChatChild()])
    );
    await supervisor.spawn();
    await expect(supervisor.spawn()).rejects.toBeInstanceOf(SessionAlreadyStartedError);
    await supervisor.close();
  });

  it('quits gracefully and never writes again on a second close', async () => {
    const cwd = await makeTempDir();
    const child = new FakeChatChild({ banner: '> ' });
    const supervisor = new ProcessSupervisor(
      testConfig(cwd),
      new RawOutputQueue<string>(),
      DiagnosticLog.disabled(),
      spawnFakes([child])
    );
    await supervisor.start();

    await supervisor.close();
    expect(child.lines).toEqual(['/quit']);
    expect(child.signals).toEqual([]);
    expect(child.stdin.writableEnded).toBe(true);
    expect(supervisor.isAlive()).toBe(false);
    expect(supervisor.exit).toEqual({ exitCode: 0, signal: null });

    await supervisor.close();
    expect(child.lines).toEqual(['/quit']);
  });

  it('escalates to SIGTERM and then SIGKILL', async () => {
    const cwd = await makeTempDir();
    const child = new FakeChatChild({ banner: '> ', ignoreQuit: true, ignoreSignals: ['SIGTERM'] });
    const supervisor = new ProcessSupervisor(
      testConfig(cwd),
      new RawOutputQueue<string>(),
      DiagnosticLog.disabled(),
      spawnFakes([child])
    );
    await supervisor.start();

    await supervisor.close();

    expect(child.lines).toEqual(['/quit']);
    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(child.isRunning()).toBe(false);
  });

  it('rejects writes without a child', async () => {
    const supervisor = new ProcessSupervisor(testConfig('/unused'), new RawOutputQueue<string>(), DiagnosticLog.disabled());
    await expect(supervisor.write('hello\n')).rejects.toBeInstanceOf(SessionWriteError);
  });
});
