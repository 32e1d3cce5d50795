import type { Bundle } from './bundle';
import type { StoredDescriptor } from './descriptor';

export type Partition = {
  matched: Bundle[];
  unmatched: Bundle[];
};

export type IdentifierCollision = {
  identifier: string;
  bundles: Bundle[];
};

export type ReconcileReport = Partition & {
  /** Descriptors whose identifier no bundle derives. */
  orphaned: StoredDescriptor[];
  /** Identifiers derived by more than one bundle; only one descriptor can exist for each. */
  collisions: IdentifierCollision[];
};
