/**
 * Google Search Console Analytics Types
 */

export type SearchDimension = 'date' | 'page' | 'query' | 'device';

export type SearchAnalyticsQuery = {
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  dimensions: SearchDimension[];
  rowLimit: number;
  startRow: number;
};

export type SearchAnalyticsRow = {
  keys: string[]; // Values for each requested dimension, in request order
  clicks: number;
  impressions: number;
  ctr: number;
  position: number;
};

/**
 * Date range, both ends inclusive
 */
export type DateRange = {
  startDate: string;
  endDate: string;
};

/**
 * One row of the gsc_performance table
 */
export type PerformanceRecord = {
  date: string | null; // null only when the API omitted the date key
  siteUrl: string;
  page: string;
  query: string;
  device: string;
  searchType: string;
  clicks: number;
  impressions: number;
  ctr: number;
  position: number;
};
