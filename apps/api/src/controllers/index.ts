export * from './sync.controller';
