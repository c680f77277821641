export * from './constants';
export * from './errors';
export * from './frame';
export * from './frameReader';
export * from './checksum';
export * from './diffEngine';
export * from './protocol';
export * from './logger';
export * from './env';
export type * from './types';
