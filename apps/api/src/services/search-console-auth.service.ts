import { Injectable, Logger } from '@nestjs/common';
import { google, searchconsole_v1 } from 'googleapis';
import {
  SearchAnalyticsQuery,
  SearchAnalyticsRow,
} from '@gsc-sync/shared-types';
import * as fs from 'fs';
import * as path from 'path';
import {
  AuthenticationError,
  CredentialNotFoundError,
  isMissingFileError,
} from '../errors/sync.errors';

/**
 * Authorized handle on the Search Analytics query endpoint
 */
export interface SearchAnalyticsClient {
  query(
    siteUrl: string,
    request: SearchAnalyticsQuery
  ): Promise<SearchAnalyticsRow[]>;
}

class GoogleSearchAnalyticsClient implements SearchAnalyticsClient {
  constructor(private readonly searchConsole: searchconsole_v1.Searchconsole) {}

  async query(
    siteUrl: string,
    request: SearchAnalyticsQuery
  ): Promise<SearchAnalyticsRow[]> {
    const response = await this.searchConsole.searchanalytics.query({
      siteUrl,
      requestBody: {
        startDate: request.startDate,
        endDate: request.endDate,
        dimensions: request.dimensions,
        rowLimit: request.rowLimit,
        startRow: request.startRow,
      },
    });

    const rows = response.data.rows || [];
    return rows.map((row) => ({
      keys: row.keys || [],
      clicks: row.clicks || 0,
      impressions: row.impressions || 0,
      ctr: row.ctr || 0,
      position: row.position || 0,
    }));
  }
}

@Injectable()
export class SearchConsoleAuthService {
  private readonly logger = new Logger(SearchConsoleAuthService.name);

  /**
   * Build an authorized Search Console client from a service-account key file.
   * Single attempt; a missing key file is reported separately from any other
   * failure.
   */
  async authenticate(
    keyPath: string,
    scopes: string[]
  ): Promise<SearchAnalyticsClient> {
    const credentialsPath = path.resolve(process.cwd(), keyPath);
    this.logger.log(`Loading credentials from: ${credentialsPath}`);

    try {
      await fs.promises.access(credentialsPath, fs.constants.R_OK);

      const auth = new google.auth.GoogleAuth({
        keyFile: credentialsPath,
        scopes,
      });
      // Reads the key file now so an unreadable key fails here, not on the first query
      await auth.getClient();

      const searchConsole = google.searchconsole({ version: 'v1', auth });
      this.logger.log('Google Search Console client initialized successfully');
      return new GoogleSearchAnalyticsClient(searchConsole);
    } catch (error) {
      if (isMissingFileError(error)) {
        const notFound = new CredentialNotFoundError(credentialsPath);
        this.logger.error(notFound.message);
        throw notFound;
      }
      const authError = new AuthenticationError(error);
      this.logger.error(authError.message);
      throw authError;
    }
  }
}
