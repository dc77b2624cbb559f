export * from './constants';
export * from './messages';
export * from './difficulty';
export * from './schema';
export * from './framing';
export * from './logger';
export * from './rng';
