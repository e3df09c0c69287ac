export * from './renderer';
export * from './table';
