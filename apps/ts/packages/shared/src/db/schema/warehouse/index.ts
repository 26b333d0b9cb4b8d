export * from './backend-checkpoints';
export * from './change-log';
export * from './price-series';
export * from './symbol-fetch-state';
export * from './symbols';
export * from './sync-metadata';
