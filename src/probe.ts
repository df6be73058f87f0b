import type { Box3, Vec3 } from 'mathcat';
import type { Mover } from './query/grid';

export type ProbeFilter = {
    /** only test static world geometry, ignore other static props */
    worldOnly?: boolean;

    /** only test movers, ignore world geometry */
    moversOnly?: boolean;

    /** when testing movers, only consider movers carrying this tag */
    tag?: string;
};

export type RayProbeResult = {
    /** whether the ray hit anything between its origin and end */
    hit: boolean;

    /** the hit position, or the ray end when nothing was hit */
    position: Vec3;

    /** the surface normal at the hit position */
    normal: Vec3;

    /** whether the ray origin was already inside solid geometry */
    startedSolid: boolean;
};

export type BoxProbeResult = {
    /** whether the swept box hit anything */
    hit: boolean;

    /** where the box origin stopped, the sweep end when nothing was hit */
    endPosition: Vec3;

    /** the surface normal of what was hit */
    normal: Vec3;

    /** whether the box overlapped solid geometry at the start of the sweep */
    startedSolid: boolean;

    /** the mover that was hit, for mover probes */
    occupant: Mover | null;
};

/**
 * The ray and box intersection capability the grid is generated against.
 * Implementations wrap whatever collision engine the host uses.
 */
export type TerrainProbe = {
    /**
     * Casts a ray from origin to end.
     */
    rayProbe: (origin: Vec3, end: Vec3, filter?: ProbeFilter) => RayProbeResult;

    /**
     * Sweeps a box from start to end.
     * @param box the box extents relative to the sweep position
     */
    boxProbe: (box: Box3, start: Vec3, end: Vec3, filter?: ProbeFilter) => BoxProbeResult;
};
