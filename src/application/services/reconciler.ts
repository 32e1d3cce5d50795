import type { Bundle } from '../../domain/bundle';
import type { IdentifierCollision, Partition, ReconcileReport } from '../../domain/reconcile-report';
import type { BundleStore } from './bundle-store';
import type { DescriptorStore } from './descriptor-store';

/**
 * Splits bundles by whether a descriptor exists for their identifier. Input
 * order is kept in both halves.
 */
export const partitionBundles = (bundles: Bundle[], identifiers: Iterable<string>): Partition => {
  const known = new Set(identifiers);
  const matched: Bundle[] = [];
  const unmatched: Bundle[] = [];
  for (const bundle of bundles) {
    if (known.has(bundle.identifier)) {
      matched.push(bundle);
    } else {
      unmatched.push(bundle);
    }
  }
  return { matched, unmatched };
};

/**
 * Groups bundles sharing an identifier, in order of first appearance.
 */
export const findCollisions = (bundles: Bundle[]): IdentifierCollision[] => {
  const byIdentifier = new Map<string, Bundle[]>();
  for (const bundle of bundles) {
    const group = byIdentifier.get(bundle.identifier) ?? [];
    group.push(bundle);
    byIdentifier.set(bundle.identifier, group);
  }
  return Array.from(byIdentifier.entries())
    .filter(([, group]) => group.length > 1)
    .map(([identifier, group]) => ({ identifier, bundles: group }));
};

export class Reconciler {
  public constructor(
    private readonly bundleStore: BundleStore,
    private readonly descriptorStore: DescriptorStore,
  ) { }

  public async report(): Promise<ReconcileReport> {
    const bundles = await this.bundleStore.enumerate();
    const descriptors = await this.descriptorStore.enumerate();

    const partition = partitionBundles(
      bundles,
      descriptors.map((descriptor) => descriptor.identifier),
    );
    const bundleIdentifiers = new Set(bundles.map((bundle) => bundle.identifier));

    return {
      ...partition,
      orphaned: descriptors.filter((descriptor) => !bundleIdentifiers.has(descriptor.identifier)),
      collisions: findCollisions(bundles),
    };
  }
}
