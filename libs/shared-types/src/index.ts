export * from './lib/search-analytics.types';
export * from './lib/sync.types';
