export const environment = {
  production: process.env['NODE_ENV'] === 'production',
  port: process.env['PORT'] ? parseInt(process.env['PORT'], 10) : 3000,

  // PostgreSQL connection string, required by the trigger
  databaseUrl: process.env['DATABASE_URL'] || undefined,

  // Google Search Console Configuration
  google: {
    credentialsPath:
      process.env['GOOGLE_APPLICATION_CREDENTIALS'] ||
      '/etc/secrets/gsc_service_account.json',
    siteUrl:
      process.env['SEARCH_CONSOLE_SITE_URL'] || 'https://www.example.com/',
    scopes: ['https://www.googleapis.com/auth/webmasters.readonly'],
  },

  // Search Console Query Settings
  searchConsole: {
    rowLimit: 5000, // Rows per page request
    dimensions: ['date', 'page', 'query', 'device'] as const,
    searchType: 'WEB',
  },

  // Sync Settings
  sync: {
    defaultDaysAgo: 2, // GSC data has a 2-day lag
  },
};
