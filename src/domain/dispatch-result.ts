import type { ValueOf } from '../types/value-of';
import type { ReconcileReport } from './reconcile-report';

export const DISPATCH_KIND = {
  HELP: 'help',
  USAGE_ERROR: 'usage-error',
  SHOW: 'show',
  LIST: 'list',
  REMOVE: 'remove',
  PROCESS: 'process',
} as const;

export type DispatchKind = ValueOf<typeof DISPATCH_KIND>;

export const BUNDLE_OUTCOME = {
  PROCESSED: 'processed',
  MISSING: 'missing',
} as const;

export type BundleOutcomeStatus = ValueOf<typeof BUNDLE_OUTCOME>;

export type BundleOutcome = {
  path: string;
  status: BundleOutcomeStatus;
  madeExecutable: boolean;
  descriptorPath: string | null;
};

type ResultBase = {
  exitCode: number;
  warnings: string[];
};

export type HelpResult = ResultBase & { kind: typeof DISPATCH_KIND.HELP };

export type UsageErrorResult = ResultBase & {
  kind: typeof DISPATCH_KIND.USAGE_ERROR;
  message: string;
};

export type ShowResult = ResultBase & {
  kind: typeof DISPATCH_KIND.SHOW;
  name: string;
  content: string | null;
};

export type ListResult = ResultBase & {
  kind: typeof DISPATCH_KIND.LIST;
  report: ReconcileReport;
};

export type RemoveResult = ResultBase & {
  kind: typeof DISPATCH_KIND.REMOVE;
  name: string;
  removedPath: string | null;
  refreshError: string | null;
};

export type ProcessResult = ResultBase & {
  kind: typeof DISPATCH_KIND.PROCESS;
  outcomes: BundleOutcome[];
  refreshed: boolean;
  refreshError: string | null;
};

export type DispatchResult =
  | HelpResult
  | UsageErrorResult
  | ShowResult
  | ListResult
  | RemoveResult
  | ProcessResult;
