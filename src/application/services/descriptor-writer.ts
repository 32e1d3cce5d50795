import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { AppConfig } from '../../domain/app-config';
import { toBundle } from '../../domain/bundle';
import { ICON_EXTENSIONS, renderDescriptor } from '../../domain/descriptor';
import { getLogger } from '../../utils/get-logger';
import type { DescriptorStore } from './descriptor-store';

export type WrittenDescriptor = {
  identifier: string;
  descriptorPath: string;
  iconPath: string | null;
};

export class DescriptorWriter {
  private readonly logger = getLogger();

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly descriptorStore: DescriptorStore,
    private readonly config: Pick<AppConfig, 'iconDirectory'>,
  ) { }

  /**
   * Writes the desktop entry for an absolute bundle path, copying a colocated
   * icon into the icon directory when one exists. Write and copy failures are
   * not caught.
   */
  public async write(bundlePath: string): Promise<WrittenDescriptor> {
    const bundle = toBundle(bundlePath);
    const iconSource = await this.findIcon(bundlePath, bundle.fullBaseName);

    let iconPath: string | null = null;
    if (iconSource) {
      await this.fileSystem.ensureDirectory(this.config.iconDirectory);
      iconPath = path.join(this.config.iconDirectory, `${bundle.fullBaseName}.${iconSource.extension}`);
      await this.fileSystem.copyFile(iconSource.path, iconPath);
      this.logger.debug(`Copied icon: ${iconSource.path} -> ${iconPath}`);
    }

    const content = renderDescriptor({
      name: bundle.identifier,
      execPath: bundlePath,
      // Icon names are looked up without their extension
      icon: iconSource ? bundle.fullBaseName : null,
    });
    const descriptorPath = await this.descriptorStore.write(bundle.identifier, content);
    this.logger.info(`✔ Created desktop entry: ${descriptorPath}`);

    return { identifier: bundle.identifier, descriptorPath, iconPath };
  }

  private async findIcon(bundlePath: string, fullBaseName: string) {
    const directory = path.dirname(bundlePath);
    for (const extension of ICON_EXTENSIONS) {
      const candidate = path.join(directory, `${fullBaseName}.${extension}`);
      if (await this.fileSystem.isFile(candidate)) {
        return { path: candidate, extension };
      }
    }
    return null;
  }
}
