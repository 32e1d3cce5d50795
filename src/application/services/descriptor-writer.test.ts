import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { NodeFileSystem } from '../../infrastructure/node-file-system';
import { DescriptorStore } from './descriptor-store';
import { DescriptorWriter } from './descriptor-writer';

describe('DescriptorWriter', () => {
  let root: string;
  let appsDir: string;
  let desktopDir: string;
  let iconDir: string;
  let writer: DescriptorWriter;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'descriptor-writer-'));
    appsDir = join(root, 'apps');
    desktopDir = join(root, 'applications');
    iconDir = join(root, 'icons');
    mkdirSync(appsDir);
    writeFileSync(join(appsDir, 'Foo-1.2.AppImage'), 'bundle');

    const fileSystem = new NodeFileSystem();
    const store = new DescriptorStore(fileSystem, { descriptorDirectory: desktopDir, descriptorPrefix: 'appimage' });
    writer = new DescriptorWriter(fileSystem, store, { iconDirectory: iconDir });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('writes a descriptor named after the short identifier', async () => {
    const bundlePath = join(appsDir, 'Foo-1.2.AppImage');
    const written = await writer.write(bundlePath);

    expect(written).toEqual({
      identifier: 'Foo',
      descriptorPath: join(desktopDir, 'appimage-Foo.desktop'),
      iconPath: null,
    });
    expect(readFileSync(written.descriptorPath, 'utf8')).toBe(
      [
        '[Desktop Entry]',
        'Name=Foo',
        `Exec="${bundlePath}" %U`,
        '# Icon= (no icon found)',
        'Terminal=false',
        'Type=Application',
        'Categories=Utility;',
        'StartupNotify=true',
        '',
      ].join('\n'),
    );
    expect(existsSync(iconDir)).toBe(false);
  });

  it('copies a colocated icon and references it by base name', async () => {
    writeFileSync(join(appsDir, 'Foo-1.2.png'), 'png-bytes');

    const written = await writer.write(join(appsDir, 'Foo-1.2.AppImage'));

    expect(written.iconPath).toBe(join(iconDir, 'Foo-1.2.png'));
    expect(readFileSync(join(iconDir, 'Foo-1.2.png'), 'utf8')).toBe('png-bytes');
    expect(existsSync(join(appsDir, 'Foo-1.2.png'))).toBe(true);
    expect(readFileSync(written.descriptorPath, 'utf8').split('\n')[3]).toBe('Icon=Foo-1.2');
  });

  it('prefers png over svg over jpg', async () => {
    writeFileSync(join(appsDir, 'Foo-1.2.jpg'), 'jpg');
    writeFileSync(join(appsDir, 'Foo-1.2.svg'), 'svg');

    const first = await writer.write(join(appsDir, 'Foo-1.2.AppImage'));
    expect(first.iconPath).toBe(join(iconDir, 'Foo-1.2.svg'));

    writeFileSync(join(appsDir, 'Foo-1.2.png'), 'png');
    const second = await writer.write(join(appsDir, 'Foo-1.2.AppImage'));
    expect(second.iconPath).toBe(join(iconDir, 'Foo-1.2.png'));
  });

  it('falls back to jpeg', async () => {
    writeFileSync(join(appsDir, 'Foo-1.2.jpeg'), 'jpeg');

    const written = await writer.write(join(appsDir, 'Foo-1.2.AppImage'));
    expect(written.iconPath).toBe(join(iconDir, 'Foo-1.2.jpeg'));
  });

  it('does not pick up icons named after the short identifier only', async () => {
    writeFileSync(join(appsDir, 'Foo.png'), 'png');

    const written = await writer.write(join(appsDir, 'Foo-1.2.AppImage'));
    expect(written.iconPath).toBeNull();
  });

  it('produces identical content when run twice', async () => {
    writeFileSync(join(appsDir, 'Foo-1.2.svg'), 'svg');
    const bundlePath = join(appsDir, 'Foo-1.2.AppImage');

    const first = readFileSync((await writer.write(bundlePath)).descriptorPath, 'utf8');
    const second = readFileSync((await writer.write(bundlePath)).descriptorPath, 'utf8');
    expect(second).toBe(first);
  });

  it('propagates a failing icon copy', async () => {
    writeFileSync(join(appsDir, 'Foo-1.2.png'), 'png');
    writeFileSync(iconDir, 'not a directory');

    await expect(writer.write(join(appsDir, 'Foo-1.2.AppImage'))).rejects.toThrow();
    expect(existsSync(join(desktopDir, 'appimage-Foo.desktop'))).toBe(false);
  });
});
