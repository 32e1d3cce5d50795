import type { LauncherIndexPort } from '../application/ports/launcher-index.port';
import type { ProcessRunnerPort } from '../application/ports/process-runner.port';

export class DesktopDatabaseRefresher implements LauncherIndexPort {
  public constructor(private readonly processRunner: ProcessRunnerPort) { }

  public async refresh(descriptorDirectory: string): Promise<void> {
    await this.processRunner.run('update-desktop-database', [descriptorDirectory]);
  }
}
