export * from './constants';
export * from './errors';
export * from './matcher';
export * from './providers';
export * from './transfer';
