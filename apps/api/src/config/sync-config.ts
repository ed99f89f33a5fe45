import { SearchDimension } from '@gsc-sync/shared-types';
import { environment } from '../environments/environment';

export const SYNC_CONFIG = Symbol('SYNC_CONFIG');

/**
 * Everything a sync run needs to know about its surroundings. Provided under
 * SYNC_CONFIG so each service receives it through its constructor.
 */
export type SyncConfig = {
  databaseUrl: string | undefined;
  google: {
    credentialsPath: string;
    siteUrl: string;
    scopes: string[];
  };
  searchConsole: {
    rowLimit: number;
    dimensions: SearchDimension[];
    searchType: string;
  };
  sync: {
    defaultDaysAgo: number;
  };
};

export function createSyncConfig(): SyncConfig {
  return {
    databaseUrl: environment.databaseUrl,
    google: {
      credentialsPath: environment.google.credentialsPath,
      siteUrl: environment.google.siteUrl,
      scopes: [...environment.google.scopes],
    },
    searchConsole: {
      rowLimit: environment.searchConsole.rowLimit,
      dimensions: [...environment.searchConsole.dimensions],
      searchType: environment.searchConsole.searchType,
    },
    sync: {
      defaultDaysAgo: environment.sync.defaultDaysAgo,
    },
  };
}
