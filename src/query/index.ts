export * from './grid';
export * from './grid-api';
export * from './grid-manager';
export * from './grid-search';
export * from './grid-serialization';
export * from './line-of-sight';
export * from './path-builder';
export * from './simplify-path';
