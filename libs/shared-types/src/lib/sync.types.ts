/**
 * Sync trigger types
 */

export type LoadResult = {
  inserted: number;
  updated: number;
  message: string;
};

/**
 * Body of a successful POST /trigger-gsc-sync
 */
export type SyncSuccessResponse = {
  status: 'success';
  message: string;
  date_processed: string;
  rows_found: number;
  inserted: number;
  updated: number;
};

/**
 * Body of a failed POST /trigger-gsc-sync. Counts are only present when the
 * load stage failed; they describe work that was rolled back.
 */
export type SyncErrorResponse = {
  status: 'error';
  message: string;
  inserted?: number;
  updated?: number;
};

export type ServiceStatusResponse = {
  message: string;
};
