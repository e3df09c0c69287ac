export * from './instruction';
export * from './usage';
export * from './stage';
