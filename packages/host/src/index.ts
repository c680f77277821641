export * from './fileStore';
export * from './shareRegistry';
export * from './hostSession';
export * from './server';
export * from './shellExport';
