import type { Bundle } from '../domain/bundle';
import { DISPATCH_KIND } from '../domain/dispatch-result';
import type { DispatchResult, ListResult } from '../domain/dispatch-result';

export const HELP_TEXT = `
appimage-desktop

Makes AppImages executable, creates consistent .desktop files for them and
reports which AppImages already have a desktop entry and which are missing one.

Usage:
  appimage-desktop [options] [AppImage …]

Options:
  -s, --show-desktop NAME   Show the .desktop file for the given short name
  -i, --install-libfuse2    Install libfuse2 if it isn't already
  -c, --create-desktop      Create/update .desktop files for the AppImages
                            (default when AppImages are given)
  -l, --list                List AppImages and show which have a .desktop file
  -r, --remove NAME         Remove the .desktop file for the given short name
  -y, --yes                 Do not ask before removing
      --apps-dir PATH       AppImage directory (default ~/apps)
      --desktop-dir PATH    .desktop directory (default ~/.local/share/applications)
      --icon-dir PATH       Icon directory (default ~/.local/share/icons/hicolor/256x256/apps)
  -h, --help                Show this help message and exit

AppImage arguments containing a '/' or ending in .AppImage are paths (globs
allowed); anything else matches AppImages in the AppImage directory whose name
starts with it. Without arguments every AppImage there is processed.

The short name of Foo-1.2.AppImage or Foo_x86.AppImage is Foo; its desktop
file is appimage-Foo.desktop.

Environment:
  APPIMAGE_DIR, APPIMAGE_DESKTOP_DIR, APPIMAGE_ICON_DIR, APPIMAGE_DESKTOP_PREFIX,
  APPIMAGE_FUSE_PACKAGE, LOG_LEVEL

Examples:
  appimage-desktop -i -c ~/apps/*.AppImage
  appimage-desktop -l
  appimage-desktop -s Foo
`;

const bundleLines = (bundles: Bundle[], mark: string) =>
  bundles.length === 0 ? ['  (none)'] : bundles.map((bundle) => `  ${mark} ${bundle.filename}`);

export const renderListReport = ({ report }: ListResult): string => {
  const lines = [
    '=== AppImages with a matching .desktop entry ===',
    ...bundleLines(report.matched, '✔'),
    '',
    '=== AppImages missing a .desktop entry ===',
    ...bundleLines(report.unmatched, '✘'),
  ];

  if (report.orphaned.length > 0) {
    lines.push('', '=== Desktop entries without an AppImage ===');
    lines.push(...report.orphaned.map((descriptor) => `  ? ${descriptor.filename}`));
  }

  if (report.collisions.length > 0) {
    lines.push('', '=== AppImages sharing a short name ===');
    lines.push(
      ...report.collisions.map(
        (collision) => `  ${collision.identifier}: ${collision.bundles.map((bundle) => bundle.filename).join(', ')}`,
      ),
    );
  }

  return `${lines.join('\n')}\n`;
};

/**
 * Text for stdout. Warnings and progress go through the logger instead.
 */
export const renderResult = (result: DispatchResult): string => {
  switch (result.kind) {
    case DISPATCH_KIND.HELP:
    case DISPATCH_KIND.USAGE_ERROR:
      return HELP_TEXT;
    case DISPATCH_KIND.SHOW:
      return result.content ?? '';
    case DISPATCH_KIND.LIST:
      return renderListReport(result);
    case DISPATCH_KIND.REMOVE:
    case DISPATCH_KIND.PROCESS:
      return '';
  }
};
