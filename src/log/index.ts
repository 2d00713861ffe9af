export * from './logger';
export * from './diagnostics';
export * from './diagnoser';
