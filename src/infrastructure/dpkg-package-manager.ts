import type { PackageManagerPort } from '../application/ports/package-manager.port';
import type { ProcessRunnerPort } from '../application/ports/process-runner.port';

/**
 * Debian/Ubuntu package manager: queries dpkg, installs through sudo apt-get.
 */
export class DpkgPackageManager implements PackageManagerPort {
  public constructor(private readonly processRunner: ProcessRunnerPort) { }

  public async isInstalled(packageName: string): Promise<boolean> {
    try {
      const { exitCode } = await this.processRunner.capture('dpkg', ['-s', packageName]);
      return exitCode === 0;
    } catch (error) {
      if (isCommandMissing(error)) {
        throw new Error('dpkg not found. Installing packages requires a Debian-based distribution.');
      }
      throw error;
    }
  }

  public async install(packageName: string): Promise<void> {
    await this.processRunner.run('sudo', ['apt-get', 'update', '-qq']);
    await this.processRunner.run('sudo', ['apt-get', 'install', '-y', packageName]);
  }
}

const isCommandMissing = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
