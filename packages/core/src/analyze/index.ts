export * from './text';
export * from './pool';
export * from './stage';
