import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SearchAnalyticsRow,
  SyncErrorResponse,
  SyncSuccessResponse,
} from '@gsc-sync/shared-types';
import { SYNC_CONFIG, SyncConfig } from '../config/sync-config';
import { StoreError, describeError } from '../errors/sync.errors';
import {
  SearchAnalyticsClient,
  SearchConsoleAuthService,
} from './search-console-auth.service';
import { SearchConsoleService } from './search-console.service';
import { PerformanceLoaderService } from './performance-loader.service';

export type SyncStage =
  | 'ReceivedRequest'
  | 'Authenticated'
  | 'Fetched'
  | 'Loaded'
  | 'RespondedSuccess'
  | 'RespondedError';

export type SyncRunResult =
  | { ok: true; response: SyncSuccessResponse }
  | { ok: false; response: SyncErrorResponse };

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Runs one authenticate → fetch → load pass for a single day
 */
@Injectable()
export class SyncPipelineService {
  private readonly logger = new Logger(SyncPipelineService.name);

  constructor(
    @Inject(SYNC_CONFIG) private readonly config: SyncConfig,
    private readonly authService: SearchConsoleAuthService,
    private readonly searchConsoleService: SearchConsoleService,
    private readonly loaderService: PerformanceLoaderService
  ) {}

  async run(days?: unknown, today: Date = new Date()): Promise<SyncRunResult> {
    this.enter('ReceivedRequest', 'GSC -> PostgreSQL sync triggered');

    if (!this.config.databaseUrl) {
      return this.fail('DATABASE_URL not configured');
    }

    const daysAgo = SyncPipelineService.parseDaysAgo(
      days,
      this.config.sync.defaultDaysAgo,
      today
    );
    const dateRange = SearchConsoleService.getTargetDateRange(daysAgo, today);
    this.logger.log(
      `Fetching data from ${daysAgo} day(s) ago (${dateRange.startDate})`
    );

    let client: SearchAnalyticsClient;
    try {
      client = await this.authService.authenticate(
        this.config.google.credentialsPath,
        this.config.google.scopes
      );
    } catch (error) {
      return this.fail(`GSC Authentication Failed: ${describeError(error)}`);
    }
    this.enter('Authenticated');

    const siteUrl = this.config.google.siteUrl;
    let rows: SearchAnalyticsRow[];
    try {
      rows = await this.searchConsoleService.fetchPerformanceRows(
        client,
        siteUrl,
        dateRange
      );
    } catch (error) {
      return this.fail(`GSC Fetch Failed: ${describeError(error)}`);
    }
    this.enter('Fetched', `${rows.length} rows`);

    try {
      const result = await this.loaderService.load(rows, siteUrl);
      this.enter('Loaded', result.message);

      this.enter('RespondedSuccess');
      return {
        ok: true,
        response: {
          status: 'success',
          message: result.message,
          date_processed: dateRange.startDate,
          rows_found: rows.length,
          inserted: result.inserted,
          updated: result.updated,
        },
      };
    } catch (error) {
      const counts =
        error instanceof StoreError
          ? { inserted: error.inserted, updated: error.updated }
          : { inserted: 0, updated: 0 };
      return this.fail(
        `PostgreSQL Load Failed: ${describeError(error)}`,
        counts
      );
    }
  }

  /**
   * Integer "days ago" from a query value. Non-integers, and shifts that land
   * outside years 1-9999, fall back.
   */
  static parseDaysAgo(
    raw: unknown,
    fallback: number,
    today: Date = new Date()
  ): number {
    if (typeof raw !== 'string' || !INTEGER_PATTERN.test(raw)) {
      return fallback;
    }
    const daysAgo = parseInt(raw.trim(), 10);
    if (!SearchConsoleService.isSupportedDaysAgo(daysAgo, today)) {
      return fallback;
    }
    return daysAgo;
  }

  private enter(stage: SyncStage, detail?: string): void {
    this.logger.log(detail ? `[${stage}] ${detail}` : `[${stage}]`);
  }

  private fail(
    message: string,
    counts?: { inserted: number; updated: number }
  ): SyncRunResult {
    this.logger.error(`[RespondedError] ${message}`);
    return {
      ok: false,
      response: { status: 'error', message, ...counts },
    };
  }
}
