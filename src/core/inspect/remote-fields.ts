import type { InspectValue } from '../../types/index.js';
import type { RemoteCatalog } from '../catalog/remote-catalog.js';

export async function remoteField(field: string, catalog: RemoteCatalog): Promise<InspectValue> {
  switch (field) {
    case 'version_history':
      return catalog.fetchHistory();
    case 'initial_version':
      return catalog.initialVersion();
    case 'latest_version':
      return catalog.latestVersion();
    case 'total_versions':
      return catalog.totalVersions();
    case 'package_url':
      return catalog.packageUrl;
    case 'stats_url':
      return catalog.statsUrl;
    case 'ecosystem_stats':
      return catalog.fetchStatistics();
    default:
      // Every other remote field is a statistic key
      return catalog.statistic(field);
  }
}
