export type FileSystemEntry = {
  name: string;
  path: string;
  type: 'file' | 'directory' | 'symlink' | 'other';
};

export interface FileSystemPort {
  exists(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  /**
   * Immediate children of a directory. A missing directory lists as empty.
   */
  listEntries(path: string): Promise<FileSystemEntry[]>;
  /**
   * Absolute paths of files matching a glob pattern, sorted. Relative
   * patterns are taken from `cwd`, which is never read as glob syntax.
   */
  glob(pattern: string, cwd: string): Promise<string[]>;
  ensureDirectory(path: string): Promise<void>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  /**
   * Removes a file. Returns false when there was nothing to remove.
   */
  removeFile(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
  /**
   * Adds the executable bits for user, group and others, like `chmod +x`.
   */
  makeExecutable(path: string): Promise<void>;
}
