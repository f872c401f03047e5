import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

function createMockProcess() {
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });
  const emitter = new EventEmitter();
  const proc = Object.assign(emitter, { stdout, stderr });

  return { proc: proc as unknown as ChildProcess, emitter, stdout, stderr };
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('collects stdout and stderr until the process closes', async () => {
    const { proc, emitter, stdout, stderr } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdfinfo', ['/tmp/input.pdf']);

    stdout.emit('data', Buffer.from('Pages: '));
    stdout.emit('data', Buffer.from('3'));
    stderr.emit('data', Buffer.from('warning'));
    emitter.emit('close', 0);

    await expect(promise).resolves.toEqual({
      stdout: 'Pages: 3',
      stderr: 'warning',
      code: 0,
    });
    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['/tmp/input.pdf'], {});
  });

  test('resolves with a non-zero exit code', async () => {
    const { proc, emitter, stderr } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('magick', ['broken.pdf']);

    stderr.emit('data', Buffer.from('magick: no images defined'));
    emitter.emit('close', 1);

    await expect(promise).resolves.toEqual({
      stdout: '',
      stderr: 'magick: no images defined',
      code: 1,
    });
  });

  test('treats a null exit code as 0', async () => {
    const { proc, emitter } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('true', []);
    emitter.emit('close', null);

    await expect(promise).resolves.toMatchObject({ code: 0 });
  });

  test('rejects when the process cannot be started', async () => {
    const { proc, emitter } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('missing-binary', []);
    emitter.emit('error', new Error('spawn missing-binary ENOENT'));

    await expect(promise).rejects.toThrow('spawn missing-binary ENOENT');
  });

  test('passes spawn options through', async () => {
    const { proc, emitter } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('ls', [], { cwd: '/tmp' });
    emitter.emit('close', 0);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('ls', [], { cwd: '/tmp' });
  });
});
