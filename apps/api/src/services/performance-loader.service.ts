import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  LoadResult,
  PerformanceRecord,
  SearchAnalyticsRow,
} from '@gsc-sync/shared-types';
import { SYNC_CONFIG, SyncConfig } from '../config/sync-config';
import {
  ConfigurationError,
  StoreError,
  describeError,
} from '../errors/sync.errors';
import {
  STORE_CONNECTION_FACTORY,
  StoreConnection,
  StoreConnectionFactory,
} from './store-connection';

const MISSING_VALUE = 'N/A';
const UNKNOWN_DEVICE = 'UNKNOWN';

// xmax is 0 only on a freshly inserted tuple
export const UPSERT_PERFORMANCE_SQL = `
  INSERT INTO gsc_performance (
    date, site_url, page, query, device, search_type,
    clicks, impressions, ctr, position
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  ON CONFLICT (date, site_url, page, query, device, search_type) DO UPDATE SET
    clicks = EXCLUDED.clicks,
    impressions = EXCLUDED.impressions,
    ctr = EXCLUDED.ctr,
    position = EXCLUDED.position,
    extracted_at = CURRENT_TIMESTAMP
  RETURNING (xmax = 0) AS inserted
`;

@Injectable()
export class PerformanceLoaderService {
  private readonly logger = new Logger(PerformanceLoaderService.name);

  constructor(
    @Inject(SYNC_CONFIG) private readonly config: SyncConfig,
    @Inject(STORE_CONNECTION_FACTORY)
    private readonly connect: StoreConnectionFactory
  ) {}

  /**
   * Upsert rows inside a single transaction. Any failure rolls back every
   * row of this load and throws a StoreError carrying the counts reached.
   */
  async load(rows: SearchAnalyticsRow[], siteUrl: string): Promise<LoadResult> {
    if (rows.length === 0) {
      return { inserted: 0, updated: 0, message: 'No data to load.' };
    }

    const connectionString = this.config.databaseUrl;
    if (!connectionString) {
      throw new ConfigurationError('DATABASE_URL is not configured.');
    }

    let inserted = 0;
    let updated = 0;
    let connection: StoreConnection | undefined;

    try {
      this.logger.log('Connecting to PostgreSQL...');
      connection = await this.connect(connectionString);
      this.logger.log(`Loading ${rows.length} rows...`);

      await connection.query('BEGIN');
      for (const row of rows) {
        const record = this.toRecord(row, siteUrl);
        const result = await connection.query(UPSERT_PERFORMANCE_SQL, [
          record.date,
          record.siteUrl,
          record.page,
          record.query,
          record.device,
          record.searchType,
          record.clicks,
          record.impressions,
          record.ctr,
          record.position,
        ]);

        const outcome = result.rows[0];
        if (outcome?.['inserted'] === true) {
          inserted++;
        } else if (outcome?.['inserted'] === false) {
          updated++;
        }
      }
      await connection.query('COMMIT');

      const message = `Load complete! Inserted: ${inserted}, Updated: ${updated}`;
      this.logger.log(message);
      return { inserted, updated, message };
    } catch (error) {
      const storeError = new StoreError(
        `PostgreSQL error: ${describeError(error)}`,
        inserted,
        updated,
        error
      );
      this.logger.error(storeError.message);
      if (connection) {
        await this.rollback(connection);
      }
      throw storeError;
    } finally {
      if (connection) {
        await this.close(connection);
      }
    }
  }

  /**
   * Normalize an API row into the table's shape
   */
  toRecord(row: SearchAnalyticsRow, siteUrl: string): PerformanceRecord {
    const [date = null, page, query, device] = row.keys;

    return {
      date,
      siteUrl,
      page: page || MISSING_VALUE,
      query: query || MISSING_VALUE,
      device: device ? device.toUpperCase() : UNKNOWN_DEVICE,
      searchType: this.config.searchConsole.searchType,
      clicks: row.clicks,
      impressions: row.impressions,
      ctr: row.ctr,
      position: row.position,
    };
  }

  private async rollback(connection: StoreConnection): Promise<void> {
    try {
      await connection.query('ROLLBACK');
    } catch (error) {
      this.logger.error(`Rollback failed: ${describeError(error)}`);
    }
  }

  private async close(connection: StoreConnection): Promise<void> {
    try {
      await connection.close();
      this.logger.log('PostgreSQL connection closed');
    } catch (error) {
      this.logger.error(`Failed to close PostgreSQL connection: ${describeError(error)}`);
    }
  }
}
