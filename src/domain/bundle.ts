import path from 'node:path';

import { deriveIdentifier, stripExtension } from './identifier';

export type Bundle = {
  path: string;
  filename: string;
  fullBaseName: string;
  identifier: string;
};

export const toBundle = (bundlePath: string): Bundle => {
  const filename = path.basename(bundlePath);
  return {
    path: bundlePath,
    filename,
    fullBaseName: stripExtension(filename),
    identifier: deriveIdentifier(filename),
  };
};

export const hasBundleExtension = (filename: string, extension: string): boolean =>
  filename.toLowerCase().endsWith(extension.toLowerCase());

export const compareByFilename = (left: Bundle, right: Bundle): number => {
  if (left.filename < right.filename) return -1;
  if (left.filename > right.filename) return 1;
  if (left.path < right.path) return -1;
  if (left.path > right.path) return 1;
  return 0;
};
