import os from 'node:os';
import path from 'node:path';

import { appConfigSchema, defaultAppConfig } from '../domain/app-config';
import type { AppConfig } from '../domain/app-config';
import { ConfigError } from '../domain/errors';

export type ConfigOverrides = Partial<
  Pick<AppConfig, 'bundleDirectory' | 'descriptorDirectory' | 'iconDirectory'>
>;

type Environment = Record<string, string | undefined>;

const ENV_KEYS: Record<keyof AppConfig, string | null> = {
  bundleDirectory: 'APPIMAGE_DIR',
  descriptorDirectory: 'APPIMAGE_DESKTOP_DIR',
  iconDirectory: 'APPIMAGE_ICON_DIR',
  descriptorPrefix: 'APPIMAGE_DESKTOP_PREFIX',
  bundleExtension: null,
  fusePackage: 'APPIMAGE_FUSE_PACKAGE',
};

export const resolveHome = (targetPath: string, homeDir: string = os.homedir()) => {
  if (targetPath === '~') {
    return homeDir;
  }
  if (targetPath.startsWith('~/')) {
    return path.join(homeDir, targetPath.slice(2));
  }
  return targetPath;
};

/**
 * Defaults, then environment, then command-line overrides. Directory values
 * get `~` expanded and are made absolute.
 */
export const loadConfig = (
  overrides: ConfigOverrides = {},
  env: Environment = process.env,
  homeDir: string = os.homedir(),
): AppConfig => {
  const merged: Record<string, string> = { ...defaultAppConfig(homeDir) };

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = envKey ? env[envKey]?.trim() : undefined;
    if (value) {
      merged[field] = value;
    }
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value) {
      merged[field] = value;
    }
  }

  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const config = parsed.data;
  return {
    ...config,
    bundleDirectory: path.resolve(resolveHome(config.bundleDirectory, homeDir)),
    descriptorDirectory: path.resolve(resolveHome(config.descriptorDirectory, homeDir)),
    iconDirectory: path.resolve(resolveHome(config.iconDirectory, homeDir)),
  };
};
