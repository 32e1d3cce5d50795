import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const appConfigSchema = z.object({
  bundleDirectory: z.string().min(1),
  descriptorDirectory: z.string().min(1),
  iconDirectory: z.string().min(1),
  descriptorPrefix: z
    .string()
    .min(1)
    .regex(/^[^/]+$/, 'must not contain a path separator'),
  bundleExtension: z.string().regex(/^\.[^./]+$/, 'must look like ".AppImage"'),
  fusePackage: z.string().min(1),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const defaultAppConfig = (homeDir: string = os.homedir()): AppConfig => ({
  bundleDirectory: path.join(homeDir, 'apps'),
  descriptorDirectory: path.join(homeDir, '.local', 'share', 'applications'),
  iconDirectory: path.join(homeDir, '.local', 'share', 'icons', 'hicolor', '256x256', 'apps'),
  descriptorPrefix: 'appimage',
  bundleExtension: '.AppImage',
  fusePackage: 'libfuse2',
});
