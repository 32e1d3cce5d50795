import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import type { AppConfig } from '../../domain/app-config';
import { compareByFilename, hasBundleExtension, toBundle } from '../../domain/bundle';
import type { Bundle } from '../../domain/bundle';
import { resolveHome } from '../../utils/load-config';

const GLOB_SYNTAX = /[*?[\]{}]/;

export class BundleStore {
  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly config: Pick<AppConfig, 'bundleDirectory' | 'bundleExtension'>,
    private readonly cwd: string = process.cwd(),
  ) { }

  /**
   * Regular files directly inside the directory whose name ends in the bundle
   * extension (any case), sorted by filename. A missing directory is empty.
   */
  public async enumerate(directory: string = this.config.bundleDirectory): Promise<Bundle[]> {
    const entries = await this.fileSystem.listEntries(directory);
    return entries
      .filter((entry) => entry.type === 'file' && hasBundleExtension(entry.name, this.config.bundleExtension))
      .map((entry) => toBundle(entry.path))
      .sort(compareByFilename);
  }

  /**
   * Turns a user token into bundles.
   *
   * A token with a `/` or the bundle extension is a path: globs are expanded,
   * a literal path is returned as is whether or not it exists. Anything else
   * is a short-name query against the bundle directory (case-insensitive
   * prefix match). No match gives an empty list.
   */
  public async resolve(token: string, directory: string = this.config.bundleDirectory): Promise<Bundle[]> {
    if (this.isPathToken(token)) {
      if (GLOB_SYNTAX.test(token)) {
        const matches = await this.globToken(token);
        return matches.map(toBundle).sort(compareByFilename);
      }
      return [toBundle(path.resolve(this.cwd, resolveHome(token)))];
    }

    const query = token.toLowerCase();
    const bundles = await this.enumerate(directory);
    return bundles.filter((bundle) => bundle.filename.toLowerCase().startsWith(query));
  }

  /**
   * Only the token is a pattern; the working or home directory it is
   * relative to is passed as the glob cwd and matched literally.
   */
  private globToken(token: string) {
    if (token.startsWith('~/')) {
      return this.fileSystem.glob(token.slice(2), resolveHome('~'));
    }
    return this.fileSystem.glob(token, this.cwd);
  }

  private isPathToken(token: string) {
    return token.includes('/') || hasBundleExtension(token, this.config.bundleExtension);
  }
}
