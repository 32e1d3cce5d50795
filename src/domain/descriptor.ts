export const DESCRIPTOR_EXTENSION = '.desktop';

/** Tried in this order; the first colocated match wins. */
export const ICON_EXTENSIONS = ['png', 'svg', 'jpg', 'jpeg'] as const;

export type IconExtension = (typeof ICON_EXTENSIONS)[number];

export type StoredDescriptor = {
  filename: string;
  path: string;
  identifier: string;
};

export type DescriptorFields = {
  name: string;
  execPath: string;
  icon: string | null;
};

export const descriptorFilename = (prefix: string, identifier: string): string =>
  `${prefix}-${identifier}${DESCRIPTOR_EXTENSION}`;

/**
 * Inverse of {@link descriptorFilename}. Returns null for filenames that do
 * not belong to the prefix.
 */
export const identifierOfDescriptor = (filename: string, prefix: string): string | null => {
  const head = `${prefix}-`;
  if (!filename.startsWith(head) || !filename.endsWith(DESCRIPTOR_EXTENSION)) {
    return null;
  }
  if (filename.length < head.length + DESCRIPTOR_EXTENSION.length) {
    return null;
  }
  return filename.slice(head.length, filename.length - DESCRIPTOR_EXTENSION.length);
};

/**
 * Quoted `Exec` argument. `"`, `` ` ``, `$` and `\` are backslash-escaped
 * inside the quotes, then every backslash is doubled for the string-value
 * escaping the desktop-entry format applies first; `%` becomes `%%` so it is
 * not read as a field code.
 */
export const quoteExecArgument = (value: string): string => {
  const quoted = value.replace(/["`$\\]/g, '\\$&').replace(/\\/g, '\\\\').replace(/%/g, '%%');
  return `"${quoted}"`;
};

export const renderDescriptor = ({ name, execPath, icon }: DescriptorFields): string => {
  const iconLine = icon === null ? '# Icon= (no icon found)' : `Icon=${icon}`;
  return [
    '[Desktop Entry]',
    `Name=${name}`,
    `Exec=${quoteExecArgument(execPath)} %U`,
    iconLine,
    'Terminal=false',
    'Type=Application',
    'Categories=Utility;',
    'StartupNotify=true',
    '',
  ].join('\n');
};
