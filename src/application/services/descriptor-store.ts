import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { AppConfig } from '../../domain/app-config';
import { descriptorFilename, identifierOfDescriptor } from '../../domain/descriptor';
import type { StoredDescriptor } from '../../domain/descriptor';
import { DescriptorNotFoundError } from '../../domain/errors';

const compareByFilename = (left: StoredDescriptor, right: StoredDescriptor) => {
  if (left.filename < right.filename) return -1;
  if (left.filename > right.filename) return 1;
  return 0;
};

/**
 * Directory of `{prefix}-{identifier}.desktop` files.
 */
export class DescriptorStore {
  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly config: Pick<AppConfig, 'descriptorDirectory' | 'descriptorPrefix'>,
  ) { }

  public get directory() {
    return this.config.descriptorDirectory;
  }

  public pathOf(identifier: string) {
    return path.join(this.directory, descriptorFilename(this.config.descriptorPrefix, identifier));
  }

  public identifierOf(filename: string): string | null {
    return identifierOfDescriptor(filename, this.config.descriptorPrefix);
  }

  public async enumerate(): Promise<StoredDescriptor[]> {
    const entries = await this.fileSystem.listEntries(this.directory);
    const descriptors: StoredDescriptor[] = [];
    for (const entry of entries) {
      if (entry.type !== 'file') {
        continue;
      }
      const identifier = this.identifierOf(entry.name);
      if (identifier !== null) {
        descriptors.push({ filename: entry.name, path: entry.path, identifier });
      }
    }
    return descriptors.sort(compareByFilename);
  }

  /**
   * Creates or overwrites the descriptor and marks it executable.
   */
  public async write(identifier: string, content: string): Promise<string> {
    await this.fileSystem.ensureDirectory(this.directory);
    const target = this.pathOf(identifier);
    await this.fileSystem.writeFile(target, content);
    await this.fileSystem.makeExecutable(target);
    return target;
  }

  /**
   * Exact identifier first, then the first descriptor (sorted) whose
   * identifier starts with the query.
   */
  public async find(query: string): Promise<StoredDescriptor | null> {
    const descriptors = await this.enumerate();
    return (
      descriptors.find((descriptor) => descriptor.identifier === query) ??
      descriptors.find((descriptor) => descriptor.identifier.startsWith(query)) ??
      null
    );
  }

  public async read(query: string): Promise<{ descriptor: StoredDescriptor; content: string }> {
    const descriptor = await this.find(query);
    if (!descriptor) {
      throw new DescriptorNotFoundError(query);
    }
    const content = await this.fileSystem.readFile(descriptor.path);
    return { descriptor, content };
  }

  /**
   * Returns false when there was no such descriptor.
   */
  public async delete(identifier: string): Promise<boolean> {
    return this.fileSystem.removeFile(this.pathOf(identifier));
  }
}
