export * from './engine';
export * from './stage';
