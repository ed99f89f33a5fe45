export * from './search-console-auth.service';
export * from './search-console.service';
export * from './performance-loader.service';
export * from './sync-pipeline.service';
export * from './store-connection';
