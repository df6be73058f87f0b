import type { Box3, Vec2, Vec3 } from 'mathcat';

export type GridSettings = {
    /** the identifier the grid is registered under */
    identifier: string;

    /** the world space origin of the grid */
    origin: Vec3;

    /** the grid extents, relative to the origin and before rotation */
    bounds: Box3;

    /** rotation of the grid around the up axis, in radians */
    yaw: number;

    /** the width and depth of each cell */
    cellSize: number;

    /** the highest step a mover can walk up or down */
    stepSize: number;

    /** the steepest slope a mover can stand on, in degrees */
    standableAngle: number;

    /** vertical space a mover needs above a cell */
    heightClearance: number;

    /** horizontal space a mover needs around a cell */
    widthClearance: number;

    /** the highest ledge a mover can drop down from */
    maxDropHeight: number;

    /**
     * For grid aligned terrain.
     * Skips step detection and samples corners slightly inside the cell, so use ramps instead of stairs.
     */
    gridPerfect: boolean;

    /** whether probes only hit static world geometry */
    worldOnly: boolean;
};

/**
 * Corner heights of a cell, in grid local axes:
 * 0 = bottom left (-x, -z)
 * 1 = bottom right (-x, +z)
 * 2 = top left (+x, -z)
 * 3 = top right (+x, +z)
 */
export type CellCorners = [number, number, number, number];

export type Pose = {
    position: Vec3;
    yaw: number;
};

/** A handle to something that moves on the grid and can occupy cells */
export type Mover = {
    id: string;
    pose: Pose;
};

export type CellConnection = {
    /** the cell this connection leads to */
    cell: GridCell;

    /** how the connection is traversed, null for walking */
    movementTag: string | null;
};

/** A walkable quad patch of terrain */
export type GridCell = {
    /** integer grid coordinates */
    coordinates: Vec2;

    /** world space center */
    position: Vec3;

    /** sampled corner heights */
    corners: CellCorners;

    /**
     * Tags written by generation passes, occupancy checks and consumers.
     * Occupancy tags are recomputed periodically and may be stale while a search reads them.
     */
    tags: Set<string>;

    /** connections that are not plain neighbours, such as drops and jumps */
    connections: CellConnection[];

    /** the mover currently occupying this cell */
    occupant: Mover | null;

    /** pose of the occupant when it was recorded */
    occupantPose: Pose | null;
};

/** A spatial index of walkable cells, possibly several stacked per coordinate */
export type Grid = {
    identifier: string;

    settings: GridSettings;

    /** map of coordinate hashes to the cells at that coordinate, in insertion order */
    cellStacks: Record<string, GridCell[]>;

    /** step size used for probing, never zero */
    realStepSize: number;

    /** distance corner probes are pulled towards the cell center */
    tolerance: number;
};

export const CellTag = {
    OCCUPIED: 'occupied',
    EDGE: 'edge',
    STEP: 'step',
} as const;

export const MovementTag = {
    DROP: 'drop',
    JUMP: 'jump',
} as const;

export const DEFAULT_GRID_SETTINGS: GridSettings = {
    identifier: 'main',
    origin: [0, 0, 0],
    bounds: [
        [0, -512, 0],
        [512, 512, 512],
    ],
    yaw: 0,
    cellSize: 16,
    stepSize: 12,
    standableAngle: 40,
    heightClearance: 72,
    widthClearance: 24,
    maxDropHeight: 400,
    gridPerfect: false,
    worldOnly: true,
};
