/**
 * @module gridnav
 */

export type { Box3, Vec2, Vec3 } from 'mathcat';
export * from './generate';
export * as geometry from './geometry';
export * from './probe';
export * from './query';
