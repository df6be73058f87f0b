export * from './agents/path-follower';
export * from './generators/generate-grid';
export * from './geometry/box-world-probe';
