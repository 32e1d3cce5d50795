#!/usr/bin/env node
import { CommandDispatcher } from './application/services/command-dispatcher';
import { DISPATCH_KIND } from './domain/dispatch-result';
import { DesktopDatabaseRefresher } from './infrastructure/desktop-database-refresher';
import { DpkgPackageManager } from './infrastructure/dpkg-package-manager';
import { InquirerConfirmation } from './infrastructure/inquirer-confirmation';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { ProcessRunner } from './infrastructure/process-runner';
import { getLogger } from './utils/get-logger';
import { renderResult } from './utils/render-result';

const logger = getLogger();

const main = async () => {
  const processRunner = new ProcessRunner();
  const dispatcher = new CommandDispatcher({
    fileSystem: new NodeFileSystem(),
    packageManager: new DpkgPackageManager(processRunner),
    launcherIndex: new DesktopDatabaseRefresher(processRunner),
    confirmation: new InquirerConfirmation(),
    isInteractive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  });

  const result = await dispatcher.dispatch(process.argv.slice(2));

  if (result.kind === DISPATCH_KIND.USAGE_ERROR) {
    logger.error(result.message);
  }

  const output = renderResult(result);
  if (output) {
    process.stdout.write(output);
  }
  process.exitCode = result.exitCode;
};

const run = async () => {
  try {
    await main();
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    process.exitCode = 1;
  }
};

void run();
