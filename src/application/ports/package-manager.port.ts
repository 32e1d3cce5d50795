export interface PackageManagerPort {
  isInstalled(packageName: string): Promise<boolean>;
  install(packageName: string): Promise<void>;
}
