export * from './http-helpers';
export * from './wait';
export * from './fetch-recorder';
