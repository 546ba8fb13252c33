export * from './redis-streams.mock';
