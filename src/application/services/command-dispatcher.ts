import os from 'node:os';

import type { ConfirmationPort } from '../ports/confirmation.port';
import type { FileSystemPort } from '../ports/file-system.port';
import type { LauncherIndexPort } from '../ports/launcher-index.port';
import type { PackageManagerPort } from '../ports/package-manager.port';
import type { AppConfig } from '../../domain/app-config';
import type { Bundle } from '../../domain/bundle';
import { BUNDLE_OUTCOME, DISPATCH_KIND } from '../../domain/dispatch-result';
import type {
  BundleOutcome,
  DispatchResult,
  ListResult,
  ProcessResult,
  RemoveResult,
  ShowResult,
} from '../../domain/dispatch-result';
import { DescriptorNotFoundError, UsageError } from '../../domain/errors';
import { getLogger } from '../../utils/get-logger';
import { loadConfig } from '../../utils/load-config';
import { parseArgs } from '../../utils/parse-args';
import type { ParsedArgs } from '../../utils/parse-args';
import { BundleStore } from './bundle-store';
import { DescriptorStore } from './descriptor-store';
import { DescriptorWriter } from './descriptor-writer';
import { Reconciler, findCollisions } from './reconciler';

export type DispatcherDependencies = {
  fileSystem: FileSystemPort;
  packageManager: PackageManagerPort;
  launcherIndex: LauncherIndexPort;
  confirmation: ConfirmationPort;
  /** Whether a prompt can be shown before destructive operations. */
  isInteractive: boolean;
  env?: Record<string, string | undefined>;
  homeDir?: string;
  cwd?: string;
};

type Services = {
  config: AppConfig;
  bundleStore: BundleStore;
  descriptorStore: DescriptorStore;
  reconciler: Reconciler;
  writer: DescriptorWriter;
};

/**
 * Selects one operation from the command line and runs it. Operations are
 * tried in order: help, show, install (falls through), list, remove, bundle
 * processing. Fatal filesystem errors are thrown; everything else comes back
 * as a result.
 */
export class CommandDispatcher {
  private readonly logger = getLogger();

  public constructor(private readonly deps: DispatcherDependencies) { }

  public async dispatch(argv: string[]): Promise<DispatchResult> {
    let args: ParsedArgs;
    try {
      args = parseArgs(argv);
      validateNames(args);
    } catch (error) {
      if (error instanceof UsageError) {
        return { kind: DISPATCH_KIND.USAGE_ERROR, exitCode: error.exitCode, warnings: [], message: error.message };
      }
      throw error;
    }

    if (args.help) {
      return { kind: DISPATCH_KIND.HELP, exitCode: 0, warnings: [] };
    }

    const services = this.createServices(args);

    if (args.showName !== null) {
      return this.show(services, args.showName);
    }

    if (args.installFuse) {
      await this.ensurePackage(services.config.fusePackage);
    }

    if (args.list) {
      return this.list(services);
    }

    if (args.removeName !== null) {
      return this.remove(services, args.removeName, args.assumeYes);
    }

    return this.processBundles(services, args);
  }

  private createServices(args: ParsedArgs): Services {
    const homeDir = this.deps.homeDir ?? os.homedir();
    const config = loadConfig(args.overrides, this.deps.env ?? process.env, homeDir);
    const bundleStore = new BundleStore(this.deps.fileSystem, config, this.deps.cwd ?? process.cwd());
    const descriptorStore = new DescriptorStore(this.deps.fileSystem, config);
    return {
      config,
      bundleStore,
      descriptorStore,
      reconciler: new Reconciler(bundleStore, descriptorStore),
      writer: new DescriptorWriter(this.deps.fileSystem, descriptorStore, config),
    };
  }

  private async show({ descriptorStore }: Services, name: string): Promise<ShowResult> {
    try {
      const { content } = await descriptorStore.read(name);
      return { kind: DISPATCH_KIND.SHOW, exitCode: 0, warnings: [], name, content };
    } catch (error) {
      if (error instanceof DescriptorNotFoundError) {
        const warnings: string[] = [];
        this.warn(warnings, `⚠ ${error.message}`);
        return { kind: DISPATCH_KIND.SHOW, exitCode: 1, warnings, name, content: null };
      }
      throw error;
    }
  }

  private async ensurePackage(packageName: string): Promise<void> {
    const { packageManager } = this.deps;
    if (await packageManager.isInstalled(packageName)) {
      this.logger.info(`${packageName} already installed.`);
      return;
    }
    this.logger.info(`Installing ${packageName}...`);
    await packageManager.install(packageName);
    this.logger.info(`${packageName} installed.`);
  }

  private async list({ config, reconciler }: Services): Promise<ListResult> {
    this.logger.info(`Scanning ${config.bundleDirectory} for *${config.bundleExtension} …`);
    this.logger.info(`Scanning ${config.descriptorDirectory} for ${config.descriptorPrefix}-*.desktop …`);
    const report = await reconciler.report();
    return { kind: DISPATCH_KIND.LIST, exitCode: 0, warnings: [], report };
  }

  private async remove(
    { config, descriptorStore }: Services,
    name: string,
    assumeYes: boolean,
  ): Promise<RemoveResult> {
    const warnings: string[] = [];
    const target = descriptorStore.pathOf(name);
    const missing = (): RemoveResult => {
      this.warn(warnings, `⚠ No desktop file called ${target}`);
      return { kind: DISPATCH_KIND.REMOVE, exitCode: 1, warnings, name, removedPath: null, refreshError: null };
    };

    if (!(await this.deps.fileSystem.exists(target))) {
      return missing();
    }

    if (this.deps.isInteractive && !assumeYes) {
      const confirmed = await this.deps.confirmation.confirm(`Remove ${target}?`);
      if (!confirmed) {
        this.warn(warnings, `Kept ${target}`);
        return { kind: DISPATCH_KIND.REMOVE, exitCode: 1, warnings, name, removedPath: null, refreshError: null };
      }
    }

    if (!(await descriptorStore.delete(name))) {
      return missing();
    }
    this.logger.info(`Removed ${target}`);

    const refreshError = await this.refreshLauncher(config.descriptorDirectory);
    return { kind: DISPATCH_KIND.REMOVE, exitCode: 0, warnings, name, removedPath: target, refreshError };
  }

  private async processBundles(services: Services, args: ParsedArgs): Promise<ProcessResult> {
    const { config, bundleStore, writer } = services;
    const { fileSystem } = this.deps;
    const warnings: string[] = [];
    const createDesktop = args.createDesktop || args.tokens.length > 0;

    const targets = await this.resolveTargets(bundleStore, args.tokens, warnings);
    if (targets.length === 0) {
      this.warn(warnings, `⚠ No ${config.bundleExtension} files found to process.`);
      return {
        kind: DISPATCH_KIND.PROCESS,
        exitCode: 1,
        warnings,
        outcomes: [],
        refreshed: false,
        refreshError: null,
      };
    }

    if (createDesktop) {
      await fileSystem.ensureDirectory(config.descriptorDirectory);
      for (const collision of findCollisions(targets)) {
        const names = collision.bundles.map((bundle) => bundle.filename);
        this.warn(
          warnings,
          `⚠ ${names.join(', ')} share the name '${collision.identifier}'; the desktop entry will point at ${names[names.length - 1] ?? ''}`,
        );
      }
    }

    const outcomes: BundleOutcome[] = [];
    for (const bundle of targets) {
      if (!(await fileSystem.isFile(bundle.path))) {
        this.warn(warnings, `⚠ Skipping non-existent file: ${bundle.path}`);
        outcomes.push({ path: bundle.path, status: BUNDLE_OUTCOME.MISSING, madeExecutable: false, descriptorPath: null });
        continue;
      }

      let madeExecutable = false;
      if (await fileSystem.isExecutable(bundle.path)) {
        this.logger.info(`✔ ${bundle.path} already executable`);
      } else {
        await fileSystem.makeExecutable(bundle.path);
        madeExecutable = true;
        this.logger.info(`✔ Made ${bundle.path} executable`);
      }

      const descriptorPath = createDesktop ? (await writer.write(bundle.path)).descriptorPath : null;
      outcomes.push({ path: bundle.path, status: BUNDLE_OUTCOME.PROCESSED, madeExecutable, descriptorPath });
    }

    const written = outcomes.some((outcome) => outcome.descriptorPath !== null);
    let refreshError: string | null = null;
    if (written) {
      this.logger.info('Updating desktop database...');
      refreshError = await this.refreshLauncher(config.descriptorDirectory);
      if (refreshError === null) {
        this.logger.info('✅ Done.');
      }
    }

    const processedCount = outcomes.filter((outcome) => outcome.status === BUNDLE_OUTCOME.PROCESSED).length;
    return {
      kind: DISPATCH_KIND.PROCESS,
      exitCode: processedCount > 0 ? 0 : 1,
      warnings,
      outcomes,
      refreshed: written && refreshError === null,
      refreshError,
    };
  }

  /**
   * Every bundle in the bundle directory when no tokens are given. Otherwise
   * the union of what each token resolves to, first occurrence kept.
   */
  private async resolveTargets(bundleStore: BundleStore, tokens: string[], warnings: string[]): Promise<Bundle[]> {
    if (tokens.length === 0) {
      return bundleStore.enumerate();
    }

    const seen = new Set<string>();
    const targets: Bundle[] = [];
    for (const token of tokens) {
      const matches = await bundleStore.resolve(token);
      if (matches.length === 0) {
        this.warn(warnings, `⚠ No AppImage found for '${token}'`);
        continue;
      }
      for (const bundle of matches) {
        if (!seen.has(bundle.path)) {
          seen.add(bundle.path);
          targets.push(bundle);
        }
      }
    }
    return targets;
  }

  private async refreshLauncher(descriptorDirectory: string): Promise<string | null> {
    try {
      await this.deps.launcherIndex.refresh(descriptorDirectory);
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message }, 'Failed to update the desktop database');
      return message;
    }
  }

  private warn(warnings: string[], message: string) {
    warnings.push(message);
    this.logger.warn(message);
  }
}

const validateNames = (args: ParsedArgs) => {
  for (const [flag, value] of [['--show-desktop', args.showName], ['--remove', args.removeName]] as const) {
    if (value !== null && value.includes('/')) {
      throw new UsageError(`${flag} takes a short name, not a path: ${value}`);
    }
  }
};
