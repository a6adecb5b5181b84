import type { InspectValue, PackageVersionPair } from '../../types/index.js';
import type { EnvironmentDiscovery } from '../discovery/environment-discovery.js';
import type { PackageResolver } from '../resolver/package-resolver.js';
import type { SessionField } from '../metadata/field-vocabulary.js';

/**
 * Discovery-wide listings that need no bound package. Keyed listings use the
 * runtime label (`3.12`) as key, in ascending runtime order.
 */
export async function sessionField(
  field: SessionField,
  discovery: EnvironmentDiscovery,
  resolver: PackageResolver
): Promise<InspectValue> {
  const runtimes = await discovery.listRuntimes();

  switch (field) {
    case 'installed_runtimes':
      return runtimes.map(runtime => runtime.label);

    case 'runtime_paths':
      return runtimes.map((runtime): PackageVersionPair => [runtime.label, runtime.path]);

    case 'site_packages': {
      const listing: Record<string, string[]> = Object.fromEntries(runtimes.map(runtime => [runtime.label, []]));
      for (const site of await discovery.sitePackageDirs()) {
        listing[site.runtime.label].push(site.path);
      }
      return listing;
    }

    case 'package_paths': {
      const listing: Record<string, string[]> = {};
      for (const runtime of runtimes) {
        listing[runtime.label] = (await discovery.packagesFor(runtime)).map(pkg => pkg.path);
      }
      return listing;
    }

    case 'package_versions': {
      const listing: Record<string, PackageVersionPair[]> = {};
      for (const runtime of runtimes) {
        listing[runtime.label] = await resolver.installedVersions(runtime);
      }
      return listing;
    }
  }
}
