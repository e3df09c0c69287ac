export * from './content-generator';
export * from './judge';
export * from './quality-checker';
export * from './link-checker';
