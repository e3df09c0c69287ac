export * from './parser';
export * from './select';
export * from './stage';
