export * from './constants';
export * from './messages';
export * from './prng';
export * from './reporter';
export * from './types';
