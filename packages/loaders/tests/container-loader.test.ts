import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock exec-util before importing the loader
vi.mock('../src/exec-util.js', () => ({
  execFile: vi.fn(),
}));

import { ContainerResourceLoader } from '../src/container-loader.js';
import { ContainerCommandError } from '../src/errors.js';
import { execFile } from '../src/exec-util.js';

const mockExecFile = vi.mocked(execFile);

const resources = [
  { id: 'qwen-14b', cost: 4, container: 'qwen-14b-pod' },
  { id: 'whisper', cost: 2, container: 'whisper-pod' },
  { id: 'bare', cost: 1 },
];

const ok = { stdout: '', stderr: '', exitCode: 0, timedOut: false };

describe('ContainerResourceLoader', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('starts the pod with the configured timeout', async () => {
      mockExecFile.mockResolvedValue(ok);
      const loader = new ContainerResourceLoader({ resources, startupGraceMs: 0, timeoutMs: 10_000 });

      await loader.load('qwen-14b');

      expect(mockExecFile).toHaveBeenCalledTimes(1);
      expect(mockExecFile).toHaveBeenCalledWith('podman', ['pod', 'start', 'qwen-14b-pod'], {
        timeout: 10_000,
      });
    });

    it('uses docker when configured', async () => {
      mockExecFile.mockResolvedValue(ok);
      const loader = new ContainerResourceLoader({ resources, runtime: 'docker', startupGraceMs: 0 });

      await loader.load('whisper');

      expect(mockExecFile).toHaveBeenCalledWith('docker', ['pod', 'start', 'whisper-pod'], {
        timeout: 30_000,
      });
    });

    it('waits for the startup grace period after starting', async () => {
      mockExecFile.mockResolvedValue(ok);
      const loader = new ContainerResourceLoader({ resources, startupGraceMs: 20 });

      const startedAt = Date.now();
      await loader.load('qwen-14b');
      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(15);
    });

    it('rejects with the runtime stderr on a non-zero exit', async () => {
      mockExecFile.mockResolvedValue({
        stdout: '',
        stderr: 'Error: no pod with name or ID qwen-14b-pod found\n',
        exitCode: 125,
        timedOut: false,
      });
      const loader = new ContainerResourceLoader({ resources, startupGraceMs: 0 });

      const err = await loader.load('qwen-14b').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ContainerCommandError);
      expect(err).toMatchObject({
        exitCode: 125,
        message:
          'podman pod start qwen-14b-pod failed (exit 125): Error: no pod with name or ID qwen-14b-pod found',
      });
    });

    it('reports a timed-out command', async () => {
      mockExecFile.mockResolvedValue({ stdout: '', stderr: '', exitCode: 1, timedOut: true });
      const loader = new ContainerResourceLoader({ resources, startupGraceMs: 0 });

      await expect(loader.load('whisper')).rejects.toThrow('podman pod start whisper-pod timed out');
    });

    it('rejects resources without a container name', async () => {
      const loader = new ContainerResourceLoader({ resources, startupGraceMs: 0 });

      await expect(loader.load('bare')).rejects.toThrow('Resource "bare" has no container name');
      expect(mockExecFile).not.toHaveBeenCalled();
    });
  });

  describe('unload', () => {
    it('stops the pod', async () => {
      mockExecFile.mockResolvedValue(ok);
      const loader = new ContainerResourceLoader({ resources });

      await loader.unload('whisper');

      expect(mockExecFile).toHaveBeenCalledWith('podman', ['pod', 'stop', 'whisper-pod'], {
        timeout: 30_000,
      });
    });

    it('rejects when the stop command fails', async () => {
      mockExecFile.mockResolvedValue({ stdout: '', stderr: 'device busy', exitCode: 2, timedOut: false });
      const loader = new ContainerResourceLoader({ resources });

      await expect(loader.unload('whisper')).rejects.toThrow(
        'podman pod stop whisper-pod failed (exit 2): device busy',
      );
    });
  });

  describe('syncLoaded', () => {
    it('returns the resource whose pod is running', async () => {
      mockExecFile
        .mockResolvedValueOnce({ ...ok, stdout: 'Exited\n' })
        .mockResolvedValueOnce({ ...ok, stdout: 'Running\n' });
      const loader = new ContainerResourceLoader({ resources });

      await expect(loader.syncLoaded()).resolves.toBe('whisper');
      expect(mockExecFile).toHaveBeenNthCalledWith(
        1,
        'podman',
        ['pod', 'ps', '--filter', 'name=qwen-14b-pod', '--format', '{{.Status}}'],
        { timeout: 5_000 },
      );
    });

    it('returns null when no pod is running or the query fails', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      mockExecFile
        .mockResolvedValueOnce({ stdout: '', stderr: 'cannot connect\n', exitCode: 125, timedOut: false })
        .mockResolvedValueOnce(ok);
      const loader = new ContainerResourceLoader({ resources, logger });

      await expect(loader.syncLoaded()).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Could not query pod qwen-14b-pod: cannot connect');
    });
  });
});
