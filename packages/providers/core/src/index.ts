export * from './config';
export * from './http/backoff';
export * from './http/timeout';
export * from './logger';
export * from './match/oracle';
export * from './match/resolver';
export * from './match/similarity';
export * from './normalize';
