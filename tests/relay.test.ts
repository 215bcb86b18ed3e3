import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';

import { DiagnosticLog } from '../src/core/session/diagnostics.js';
import { RawOutputQueue } from '../src/core/session/queue.js';
import { OutputRelay } from '../src/core/session/relay.js';
import { captureStream } from './fake-child.js';

describe('OutputRelay', () => {
  it('forwards complete lines with their terminators', async () => {
    const input = new PassThrough();
    const queue = new RawOutputQueue<string>();
    const relay = new OutputRelay(input, queue, { log: DiagnosticLog.disabled(), partialLineFlushMs: 10 });

    input.write('one\r\ntwo\nthr');
    expect(await queue.receive(500)).toBe('one\r\n');
    expect(await queue.receive(500)).toBe('two\n');
    expect(await queue.receive(500)).toBe('thr');
    expect(relay.linesRelayed).toBe(3);
  });

  it('joins a line split across writes', async () => {
    const input = new PassThrough();
    const queue = new RawOutputQueue<string>();
    new OutputRelay(input, queue, { log: DiagnosticLog.disabled(), partialLineFlushMs: 1_000 });

    input.write('Hel');
    input.write('lo there\n');
    expect(await queue.receive(500)).toBe('Hello there\n');
  });

  it('flushes a pending partial line at end of stream', async () => {
    const input = new PassThrough();
    const queue = new RawOutputQueue<string>();
    const relay = new OutputRelay(input, queue, { log: DiagnosticLog.disabled(), partialLineFlushMs: 10_000 });

    input.end('last words');
    await relay.done;
    expect(queue.drain()).toEqual(['last words']);
    expect(queue.isClosed).toBe(false);
  });

  it('mirrors every chunk to the diagnostic log', async () => {
    const input = new PassThrough();
    const queue = new RawOutputQueue<string>();
    const sink = captureStream();
    const relay = new OutputRelay(input, queue, { log: new DiagnosticLog(sink.stream), partialLineFlushMs: 10 });

    input.end('\u001b[1mraw\u001b[0m\n');
    await relay.done;
    await sink.settle();
    expect(sink.text()).toBe('\u001b[1mraw\u001b[0m\n');
  });

  it('stops forwarding after stop()', async () => {
    const input = new PassThrough();
    const queue = new RawOutputQueue<string>();
    const relay = new OutputRelay(input, queue, { log: DiagnosticLog.disabled(), partialLineFlushMs: 10 });

    relay.stop();
    input.write('ignored\n');
    expect(await queue.receive(50)).toBeUndefined();
  });
});
