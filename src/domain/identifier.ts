/**
 * Characters that end a short identifier. Creation, reconciliation and lookup
 * all go through {@link deriveIdentifier}, so this is the only place the rule
 * lives.
 */
export const IDENTIFIER_SEPARATORS = ['-', '_'] as const;

/**
 * Filename without its final extension: `Foo-1.2.AppImage` -> `Foo-1.2`.
 * A name without a dot is returned as is; `.AppImage` strips to `''`.
 */
export const stripExtension = (filename: string): string => {
  const dotIndex = filename.lastIndexOf('.');
  if (dotIndex === -1) {
    return filename;
  }
  return filename.slice(0, dotIndex);
};

/**
 * Canonical short identifier of a bundle filename: the full base name cut at
 * the first separator. `Foo-1.2.AppImage` and `Foo_x86.AppImage` both give
 * `Foo`. A base name starting with a separator yields the empty string.
 */
export const deriveIdentifier = (filename: string): string => {
  const fullBaseName = stripExtension(filename);
  let cut = fullBaseName.length;
  for (const separator of IDENTIFIER_SEPARATORS) {
    const index = fullBaseName.indexOf(separator);
    if (index !== -1 && index < cut) {
      cut = index;
    }
  }
  return fullBaseName.slice(0, cut);
};
