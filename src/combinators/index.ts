export * from './base';
export * from './diagnostics';
export * from './stream';
