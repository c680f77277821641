export * from './editor';
export * from './workspace';
export * from './socketPath';
export * from './clientSession';
export * from './client';
