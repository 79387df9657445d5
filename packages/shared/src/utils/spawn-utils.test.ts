import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

interface MockProcess {
  proc: ChildProcess;
  stdout: Readable;
  stderr: Readable;
  kill: ReturnType<typeof vi.fn>;
}

function createMockProcess(): MockProcess {
  const emitter = new EventEmitter();
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });
  const kill = vi.fn(() => {
    emitter.emit('close', null);
    return true;
  });
  const proc = Object.assign(emitter, {
    stdout,
    stderr,
    kill,
  }) as unknown as ChildProcess;

  return { proc, stdout, stderr, kill };
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('captures stdout, stderr and exit code', async () => {
    const mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);

    const promise = spawnAsync('magick', ['-version']);

    mock.stdout.emit('data', Buffer.from('Version: 7'));
    mock.stderr.emit('data', Buffer.from('warning'));
    mock.proc.emit('close', 0);

    await expect(promise).resolves.toEqual({
      stdout: 'Version: 7',
      stderr: 'warning',
      code: 0,
      timedOut: false,
    });
    expect(spawnMock).toHaveBeenCalledWith('magick', ['-version'], {});
  });

  test('passes spawn options through without the custom keys', async () => {
    const mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);

    const promise = spawnAsync('magick', ['in.pdf'], {
      cwd: '/tmp/work',
      captureStderr: false,
      timeoutMs: 1000,
    });
    mock.proc.emit('close', 0);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('magick', ['in.pdf'], {
      cwd: '/tmp/work',
    });
  });

  test('skips capture when disabled', async () => {
    const mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);

    const promise = spawnAsync('magick', [], {
      captureStdout: false,
      captureStderr: false,
    });
    mock.stdout.emit('data', Buffer.from('ignored'));
    mock.stderr.emit('data', Buffer.from('ignored'));
    mock.proc.emit('close', 2);

    await expect(promise).resolves.toEqual({
      stdout: '',
      stderr: '',
      code: 2,
      timedOut: false,
    });
  });

  test('kills the process once the timeout elapses', async () => {
    vi.useFakeTimers();
    const mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);

    const promise = spawnAsync('magick', ['slow.pdf'], { timeoutMs: 50 });
    await vi.advanceTimersByTimeAsync(50);

    await expect(promise).resolves.toEqual({
      stdout: '',
      stderr: '',
      code: 137,
      timedOut: true,
    });
    expect(mock.kill).toHaveBeenCalledWith('SIGKILL');
  });

  test('rejects when the process cannot be spawned', async () => {
    const mock = createMockProcess();
    spawnMock.mockReturnValue(mock.proc);

    const promise = spawnAsync('missing-binary', []);
    mock.proc.emit('error', new Error('spawn missing-binary ENOENT'));

    await expect(promise).rejects.toThrow('spawn missing-binary ENOENT');
  });
});
