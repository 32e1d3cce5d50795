import { constants as fsConstants, promises as fs } from 'node:fs';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import glob from 'fast-glob';

import type { FileSystemEntry, FileSystemPort } from '../application/ports/file-system.port';

const EXECUTABLE_BITS = 0o111;

const mapEntryType = (entry: Dirent): FileSystemEntry['type'] => {
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isSymbolicLink()) {
    return 'symlink';
  }
  return 'other';
};

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

export class NodeFileSystem implements FileSystemPort {
  public async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  public async isFile(targetPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(targetPath);
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  public async listEntries(targetPath: string): Promise<FileSystemEntry[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(targetPath, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
    return entries.map((entry) => ({
      name: entry.name,
      path: path.join(targetPath, entry.name),
      type: mapEntryType(entry),
    }));
  }

  public async glob(pattern: string, cwd: string): Promise<string[]> {
    const matches = await glob(pattern, { cwd, absolute: true, onlyFiles: true, dot: false });
    return matches.sort();
  }

  public async ensureDirectory(targetPath: string): Promise<void> {
    await fs.mkdir(targetPath, { recursive: true });
  }

  public async readFile(targetPath: string): Promise<string> {
    return fs.readFile(targetPath, 'utf8');
  }

  public async writeFile(targetPath: string, contents: string): Promise<void> {
    await fs.writeFile(targetPath, contents, 'utf8');
  }

  public async copyFile(source: string, destination: string): Promise<void> {
    await fs.copyFile(source, destination);
  }

  public async removeFile(targetPath: string): Promise<boolean> {
    try {
      await fs.unlink(targetPath);
      return true;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  public async isExecutable(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath, fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async makeExecutable(targetPath: string): Promise<void> {
    const stats = await fs.stat(targetPath);
    await fs.chmod(targetPath, (stats.mode & 0o7777) | EXECUTABLE_BITS);
  }
}
