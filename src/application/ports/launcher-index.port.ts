export interface LauncherIndexPort {
  /**
   * Rebuilds the launcher's cache of desktop entries in the given directory.
   */
  refresh(descriptorDirectory: string): Promise<void>;
}
