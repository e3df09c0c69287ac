export const name = '@contentbench/core';

export * from './config/loader';
export * from './registry';
export * from './retry';
export * from './context';
export * from './capabilities';
export * from './store/result-store';
export * from './cost/tracker';
export * from './generate';
export * from './analyze';
export * from './judge';
export * from './scoring';
export * from './qc';
