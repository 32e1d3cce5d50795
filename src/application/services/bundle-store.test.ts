import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { NodeFileSystem } from '../../infrastructure/node-file-system';
import { BundleStore } from './bundle-store';

describe('BundleStore', () => {
  let root: string;
  let appsDir: string;
  let store: BundleStore;

  const touch = (...names: string[]) => {
    for (const name of names) {
      writeFileSync(join(appsDir, name), 'bundle');
    }
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'bundle-store-'));
    appsDir = join(root, 'apps');
    mkdirSync(appsDir);
    store = new BundleStore(new NodeFileSystem(), { bundleDirectory: appsDir, bundleExtension: '.AppImage' }, root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('enumerate', () => {
    it('lists bundle files sorted by filename, any extension case', async () => {
      touch('Zed-1.AppImage', 'Alpha.appimage', 'Middle_2.APPIMAGE', 'notes.txt', 'Foo-1.2.png');
      mkdirSync(join(appsDir, 'Dir.AppImage'));

      const bundles = await store.enumerate();
      expect(bundles.map((bundle) => bundle.filename)).toEqual([
        'Alpha.appimage',
        'Middle_2.APPIMAGE',
        'Zed-1.AppImage',
      ]);
      expect(bundles[2]).toEqual({
        path: join(appsDir, 'Zed-1.AppImage'),
        filename: 'Zed-1.AppImage',
        fullBaseName: 'Zed-1',
        identifier: 'Zed',
      });
    });

    it('does not descend into subdirectories', async () => {
      mkdirSync(join(appsDir, 'nested'));
      writeFileSync(join(appsDir, 'nested', 'Deep.AppImage'), 'bundle');
      touch('Top.AppImage');

      const bundles = await store.enumerate();
      expect(bundles.map((bundle) => bundle.filename)).toEqual(['Top.AppImage']);
    });

    it('treats a missing directory as empty', async () => {
      expect(await store.enumerate(join(root, 'nowhere'))).toEqual([]);
    });

    it('returns the same order on repeated calls', async () => {
      touch('b.AppImage', 'a.AppImage', 'c.AppImage');
      const first = await store.enumerate();
      const second = await store.enumerate();
      expect(second).toEqual(first);
    });
  });

  describe('resolve', () => {
    beforeEach(() => {
      touch('Foo-1.2.AppImage', 'foobar.AppImage', 'Bar-9.AppImage');
    });

    it('matches short names by case-insensitive prefix', async () => {
      const bundles = await store.resolve('FOO');
      expect(bundles.map((bundle) => bundle.filename)).toEqual(['Foo-1.2.AppImage', 'foobar.AppImage']);
    });

    it('returns an empty list when nothing matches', async () => {
      expect(await store.resolve('Baz')).toEqual([]);
    });

    it('keeps a literal path relative to the working directory', async () => {
      const bundles = await store.resolve('apps/Bar-9.AppImage');
      expect(bundles.map((bundle) => bundle.path)).toEqual([join(appsDir, 'Bar-9.AppImage')]);
    });

    it('keeps a literal path even when the file does not exist', async () => {
      const bundles = await store.resolve('Gone-1.AppImage');
      expect(bundles).toEqual([
        { path: join(root, 'Gone-1.AppImage'), filename: 'Gone-1.AppImage', fullBaseName: 'Gone-1', identifier: 'Gone' },
      ]);
    });

    it('expands globs', async () => {
      const bundles = await store.resolve(`${appsDir}/*-*.AppImage`);
      expect(bundles.map((bundle) => bundle.filename)).toEqual(['Bar-9.AppImage', 'Foo-1.2.AppImage']);
    });

    it('expands globs relative to a working directory with glob characters in its name', async () => {
      const oddDir = join(root, 'apps (old)[2]');
      mkdirSync(oddDir);
      writeFileSync(join(oddDir, 'Foo-1.AppImage'), 'bundle');
      const oddStore = new BundleStore(
        new NodeFileSystem(),
        { bundleDirectory: appsDir, bundleExtension: '.AppImage' },
        oddDir,
      );

      const bundles = await oddStore.resolve('./*.AppImage');
      expect(bundles.map((bundle) => bundle.path)).toEqual([join(oddDir, 'Foo-1.AppImage')]);
    });

    it('returns an empty list for a glob without matches', async () => {
      expect(await store.resolve(`${appsDir}/Nothing*.AppImage`)).toEqual([]);
    });
  });
});
