export * from './build-context';
export * from './cell-factory';
export * from './connectivity';
export * from './generate-grid-cells';
export * from './occupancy';
