import { Inject, Injectable, Logger } from '@nestjs/common';
import { DateRange, SearchAnalyticsRow } from '@gsc-sync/shared-types';
import { SYNC_CONFIG, SyncConfig } from '../config/sync-config';
import { ApiError, describeError, isRecord } from '../errors/sync.errors';
import { SearchAnalyticsClient } from './search-console-auth.service';

@Injectable()
export class SearchConsoleService {
  private readonly logger = new Logger(SearchConsoleService.name);

  constructor(@Inject(SYNC_CONFIG) private readonly config: SyncConfig) {}

  /**
   * Fetch every row for the date range, pages concatenated in request order.
   * A failure on any page discards the pages already received.
   */
  async fetchPerformanceRows(
    client: SearchAnalyticsClient,
    siteUrl: string,
    dateRange: DateRange
  ): Promise<SearchAnalyticsRow[]> {
    const allRows: SearchAnalyticsRow[] = [];

    this.logger.log(
      `Fetching GSC data for ${siteUrl} from ${dateRange.startDate} to ${dateRange.endDate}`
    );

    try {
      for await (const page of this.iteratePages(client, siteUrl, dateRange)) {
        allRows.push(...page);
        this.logger.log(
          `Received batch of ${page.length} rows (total: ${allRows.length})`
        );
      }
    } catch (error) {
      const apiError = toApiError(error);
      this.logger.error(apiError.message);
      throw apiError;
    }

    this.logger.log(`GSC fetch complete. Total: ${allRows.length} rows`);
    return allRows;
  }

  /**
   * Lazily request pages, advancing startRow by the page size. Ends on an
   * empty page or one shorter than the page size.
   */
  async *iteratePages(
    client: SearchAnalyticsClient,
    siteUrl: string,
    dateRange: DateRange
  ): AsyncGenerator<SearchAnalyticsRow[], void, undefined> {
    const rowLimit = this.config.searchConsole.rowLimit;
    let startRow = 0;

    while (true) {
      const rows = await client.query(siteUrl, {
        startDate: dateRange.startDate,
        endDate: dateRange.endDate,
        dimensions: this.config.searchConsole.dimensions,
        rowLimit,
        startRow,
      });

      if (rows.length === 0) {
        this.logger.log(`No rows found from row ${startRow}`);
        return;
      }

      yield rows;

      if (rows.length < rowLimit) return;
      startRow += rowLimit;
    }
  }

  /**
   * Single-day range for "N days ago", in local time
   */
  static getTargetDateRange(daysAgo: number, today: Date = new Date()): DateRange {
    const day = formatLocalDate(SearchConsoleService.getTargetDate(daysAgo, today));
    return { startDate: day, endDate: day };
  }

  /**
   * Local midnight of the day N days before `today`. Invalid Date when the
   * shift leaves the Date range.
   */
  static getTargetDate(daysAgo: number, today: Date = new Date()): Date {
    const target = new Date(today.getFullYear(), today.getMonth(), today.getDate());
    // the constructor maps years 0-99 to 1900-1999
    target.setFullYear(today.getFullYear());
    target.setDate(target.getDate() - daysAgo);
    return target;
  }

  /**
   * Whether "N days ago" lands on a date the API can be asked for (years 1-9999)
   */
  static isSupportedDaysAgo(daysAgo: number, today: Date = new Date()): boolean {
    const target = SearchConsoleService.getTargetDate(daysAgo, today);
    if (Number.isNaN(target.getTime())) return false;
    const year = target.getFullYear();
    return year >= 1 && year <= 9999;
  }
}

function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;

  const { status, reason } = extractHttpDetails(error);
  let message = `GSC API error: ${describeError(error)}`;
  if (status !== undefined) {
    message += ` (status: ${status}${reason ? `, reason: ${reason}` : ''})`;
  }
  return new ApiError(message, status, reason, error);
}

function extractHttpDetails(error: unknown): { status?: number; reason?: string } {
  if (!isRecord(error)) return {};

  const rawResponse = error['response'];
  const response: Record<string, unknown> = isRecord(rawResponse) ? rawResponse : {};
  const status = response['status'];
  const statusText = response['statusText'];

  // googleapis attaches the API's error list as `errors`
  const errors = error['errors'];
  const first: unknown = Array.isArray(errors) ? errors[0] : undefined;
  const apiReason = isRecord(first) ? first['reason'] : undefined;

  let reason: string | undefined;
  if (typeof apiReason === 'string') {
    reason = apiReason;
  } else if (typeof statusText === 'string' && statusText) {
    reason = statusText;
  }

  return { status: typeof status === 'number' ? status : undefined, reason };
}
