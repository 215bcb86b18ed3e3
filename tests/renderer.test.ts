import { describe, expect, it } from 'vitest';

import { decisionForPolicy, isPermissionPolicy } from '../src/cli/ui/permission-prompt.js';
import { InteractiveRenderer, QuietRenderer } from '../src/cli/ui/renderer.js';
import { formatMs, padRight, stripAnsi, wrapLines } from '../src/cli/ui/format.js';
import { Logger } from '../src/utils/logger.js';
import { captureStream } from './fake-child.js';

describe('InteractiveRenderer', () => {
  it('streams reply text to stdout and closes an open line before other output', async () => {
    const out = captureStream();
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: out.stream, stderr: err.stream });

    r.assistantText('Hello');
    r.assistantText(' there');
    r.text('status line');
    r.assistantText('Second reply\n');
    r.text('another status');
    await out.settle();
    await err.settle();

    expect(out.text()).toBe('Hello there\nSecond reply\n');
    expect(err.text()).toBe('status line\nanother status\n');
  });

  it('prints spinner progress as status lines on stderr when piped', async () => {
    const out = captureStream();
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: out.stream, stderr: err.stream });

    const spinner = r.spinner('Starting q chat');
    spinner.succeed('q chat ready');
    await out.settle();
    await err.settle();

    expect(out.text()).toBe('');
    expect(stripAnsi(err.text())).toBe('  Starting q chat...\n  ✔ q chat ready\n');
  });

  it('returns the preset permission decision without prompting', async () => {
    const err = captureStream();
    const r = new InteractiveRenderer({ stdout: captureStream().stream, stderr: err.stream });

    const decision = await r.presentPermissionPrompt({
      prompt: "Allow this action? Use 't' to trust",
      trusted: ['fs_read'],
      preset: 'deny'
    });

    expect(decision).toBe('deny');
    await err.settle();
    expect(stripAnsi(err.text())).toContain('Allow this action?');
  });
});

describe('QuietRenderer', () => {
  it('denies permission prompts when no preset is given', async () => {
    const err = captureStream();
    const r = new QuietRenderer({ stderr: err.stream, now: () => new Date('2024-01-02T03:04:05.000Z') });

    expect(await r.presentPermissionPrompt({ prompt: '[y/n]:', trusted: ['fs_read'] })).toBe('deny');
    await err.settle();
    expect(err.text()).toBe(
      '{"type":"permission","timestamp":"2024-01-02T03:04:05.000Z","prompt":"[y/n]:","trusted":["fs_read"],"decision":"deny"}\n'
    );
  });
});

describe('permission policies', () => {
  it('maps CLI policies to decisions', () => {
    expect(decisionForPolicy('deny')).toBe('deny');
    expect(decisionForPolicy('approve')).toBe('approve-once');
    expect(decisionForPolicy('trust')).toBe('approve-and-trust');
    expect(isPermissionPolicy('trust')).toBe(true);
    expect(isPermissionPolicy('always')).toBe(false);
  });
});

describe('format helpers', () => {
  it('formats durations and pads labels', () => {
    expect(formatMs(124)).toBe('124ms');
    expect(formatMs(3_200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
    expect(padRight('ab', 4)).toBe('ab  ');
  });

  it('wraps long lines at the given width', () => {
    expect(wrapLines('abcdefgh\nxy', 3)).toEqual(['abc', 'def', 'gh', 'xy']);
  });
});

describe('Logger', () => {
  const now = () => new Date('2024-01-02T03:04:05.000Z');

  it('filters below the configured level', async () => {
    const out = captureStream();
    const logger = new Logger({ level: 'info', stream: out.stream, now });

    logger.debug('hidden');
    logger.info('session started', { pid: 4242 });
    await out.settle();

    expect(out.text()).toBe('2024-01-02T03:04:05.000Z info session started {"pid":4242}\n');
  });

  it('writes JSON lines', async () => {
    const out = captureStream();
    const logger = new Logger({ level: 'debug', json: true, stream: out.stream, now });

    logger.warn('slow turn');
    await out.settle();

    expect(out.text()).toBe('{"timestamp":"2024-01-02T03:04:05.000Z","level":"warn","message":"slow turn"}\n');
  });
});
