import { describe, expect, it, vi } from 'vitest';

import type { ProcessRunnerPort } from '../application/ports/process-runner.port';
import { DpkgPackageManager } from './dpkg-package-manager';

const createRunner = (exitCode = 0) => ({
  run: vi.fn<ProcessRunnerPort['run']>().mockResolvedValue(undefined),
  capture: vi.fn<ProcessRunnerPort['capture']>().mockResolvedValue({ exitCode, stdout: '', stderr: '' }),
});

describe('DpkgPackageManager', () => {
  it('asks dpkg for the package status', async () => {
    const runner = createRunner(0);

    await expect(new DpkgPackageManager(runner).isInstalled('libfuse2')).resolves.toBe(true);
    expect(runner.capture).toHaveBeenCalledWith('dpkg', ['-s', 'libfuse2']);
  });

  it('treats a non-zero dpkg status as not installed', async () => {
    await expect(new DpkgPackageManager(createRunner(1)).isInstalled('libfuse2')).resolves.toBe(false);
  });

  it('explains a missing dpkg', async () => {
    const runner = createRunner();
    runner.capture.mockRejectedValue(Object.assign(new Error('spawn dpkg ENOENT'), { code: 'ENOENT' }));

    await expect(new DpkgPackageManager(runner).isInstalled('libfuse2')).rejects.toThrow(
      'dpkg not found. Installing packages requires a Debian-based distribution.',
    );
  });

  it('updates the index before installing', async () => {
    const runner = createRunner();

    await new DpkgPackageManager(runner).install('libfuse2');

    expect(runner.run.mock.calls).toEqual([
      ['sudo', ['apt-get', 'update', '-qq']],
      ['sudo', ['apt-get', 'install', '-y', 'libfuse2']],
    ]);
  });

  it('stops when the index update fails', async () => {
    const runner = createRunner();
    runner.run.mockRejectedValueOnce(new Error('sudo exited with code 1'));

    await expect(new DpkgPackageManager(runner).install('libfuse2')).rejects.toThrow('sudo exited with code 1');
    expect(runner.run).toHaveBeenCalledTimes(1);
  });
});
