import type { Box3, Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { angleBetween, degreesToRadians, horizontalDistance, rotateYaw, UP } from '../geometry';
import type { ProbeFilter, TerrainProbe } from '../probe';
import { type CellCorners, CellTag, type Grid, type GridCell } from '../query/grid';
import { createCell } from '../query/grid-api';

/** corner offsets in grid local space, in CellCorners order */
const CORNER_DIRECTIONS: Array<[number, number]> = [
    [-1, -1],
    [-1, 1],
    [1, -1],
    [1, 1],
];

/** surfaces steeper than this are treated as vertical risers */
const VERTICAL_ANGLE = 89.9;

const STEP_TOLERANCE = 0.01;

export enum StepTestResult {
    /** the corners are joined by flat ground or a slope */
    NONE = 0,
    /** the corners are joined by a staircase of walkable steps */
    STEPS = 1,
    /** the corners are separated by an obstacle a mover can't walk over */
    UNWALKABLE = 2,
}

const _cornerOffset = vec3.create();
const _cornerCenterDirection = vec3.create();
const _cornerStart = vec3.create();
const _cornerEnd = vec3.create();

/**
 * Samples the ground height at each corner of a cell footprint.
 * Rays are cast down through a band around the candidate height wide enough for the steepest standable slope.
 *
 * @returns the corner hit positions, or null when a ray starts inside geometry or misses the ground
 */
export const sampleCellCorners = (grid: Grid, probe: TerrainProbe, position: Vec3): Vec3[] | null => {
    const { cellSize, standableAngle, yaw } = grid.settings;
    const filter = getGridProbeFilter(grid);

    const maxHeight = Math.max(cellSize * Math.tan(degreesToRadians(standableAngle)), grid.realStepSize);

    const hits: Vec3[] = [];

    for (const [dx, dz] of CORNER_DIRECTIONS) {
        // test a little closer to the center, for grid perfect terrain
        vec3.set(_cornerCenterDirection, dx, 0, dz);
        vec3.normalize(_cornerCenterDirection, _cornerCenterDirection);

        vec3.set(_cornerOffset, (dx * cellSize) / 2, 0, (dz * cellSize) / 2);
        vec3.scaleAndAdd(_cornerOffset, _cornerOffset, _cornerCenterDirection, -grid.tolerance);
        rotateYaw(_cornerOffset, _cornerOffset, yaw);

        vec3.add(_cornerStart, position, _cornerOffset);
        vec3.copy(_cornerEnd, _cornerStart);
        _cornerStart[1] += maxHeight * 2;
        _cornerEnd[1] -= maxHeight * 2;

        const result = probe.rayProbe(_cornerStart, _cornerEnd, filter);

        if (result.startedSolid) return null;
        if (!result.hit) return null;

        hits.push(vec3.clone(result.position));
    }

    return hits;
};

const _stepStart = vec3.create();
const _stepEnd = vec3.create();

/**
 * Sweeps small boxes from a low corner towards a high corner at increasing heights, half a step apart,
 * to tell stairs from slopes and walls.
 *
 * - a sweep that hits a surface flatter than the standable angle means a slope
 * - a sweep that hits a surface between the standable angle and vertical means unwalkable terrain
 * - two sweeps a step apart stopping at the same distance mean a riser taller than a step
 * - otherwise every sweep cleared its riser, so the corners are joined by steps
 */
export const testForStep = (grid: Grid, probe: TerrainProbe, low: Vec3, high: Vec3): StepTestResult => {
    const { stepSize, standableAngle } = grid.settings;
    const realStepSize = grid.realStepSize;
    const heightDifference = high[1] - low[1];

    // no stairs here
    if (heightDifference <= stepSize / 2) return StepTestResult.NONE;

    const maxSteps = Math.max(Math.floor(heightDifference / (realStepSize / 2)) + 1, 3);
    const stepDistances: number[] = [];

    const halfSize = realStepSize / 4;
    const box: Box3 = [
        [-halfSize, -halfSize, -halfSize],
        [halfSize, halfSize, halfSize],
    ];
    const filter = getGridProbeFilter(grid);

    for (let i = 0; i < maxSteps; i++) {
        vec3.copy(_stepStart, low);
        _stepStart[1] += realStepSize / 4 + (realStepSize / 2) * i + STEP_TOLERANCE;

        vec3.copy(_stepEnd, high);
        _stepEnd[1] = _stepStart[1];

        const result = probe.boxProbe(box, _stepStart, _stepEnd, filter);
        const distanceFromStart = horizontalDistance(_stepStart, result.endPosition);

        // the lowest sweep reached the high corner, no stairs here
        if (i === 0 && horizontalDistance(result.endPosition, high) <= STEP_TOLERANCE * 3) {
            return StepTestResult.NONE;
        }

        if (result.hit) {
            const angle = angleBetween(UP, result.normal);

            if (angle > standableAngle && angle < VERTICAL_ANGLE) return StepTestResult.UNWALKABLE;

            // not a step, just a slope
            if (angle < standableAngle) return StepTestResult.NONE;
        }

        if (i >= 2 && Math.abs(distanceFromStart - stepDistances[i - 2]) < STEP_TOLERANCE) {
            return StepTestResult.UNWALKABLE;
        }

        stepDistances.push(distanceFromStart);
    }

    return StepTestResult.STEPS;
};

/**
 * Runs step detection from the lowest and second lowest corners to the highest corner.
 * @returns whether the corners are walkable, and whether they form steps
 */
export const testForSteps = (grid: Grid, probe: TerrainProbe, corners: Vec3[]): { walkable: boolean; steps: boolean } => {
    // grid perfect terrain uses ramps instead of stairs
    if (grid.settings.gridPerfect) return { walkable: true, steps: false };

    const lowestToHighest = [...corners].sort((a, b) => a[1] - b[1]);

    const fromLowest = testForStep(grid, probe, lowestToHighest[0], lowestToHighest[3]);
    if (fromLowest === StepTestResult.UNWALKABLE) return { walkable: false, steps: false };

    const fromMiddle = testForStep(grid, probe, lowestToHighest[1], lowestToHighest[3]);
    if (fromMiddle === StepTestResult.UNWALKABLE) return { walkable: false, steps: false };

    return { walkable: true, steps: fromLowest === StepTestResult.STEPS || fromMiddle === StepTestResult.STEPS };
};

/**
 * Whether every pair of corners is within the standable slope of each other.
 */
export const isWithinStandableSlope = (grid: Grid, corners: Vec3[]): boolean => {
    const maxSlope = Math.tan(degreesToRadians(grid.settings.standableAngle));

    for (let i = 0; i < corners.length; i++) {
        for (let j = i + 1; j < corners.length; j++) {
            const rise = Math.abs(corners[j][1] - corners[i][1]);
            const run = horizontalDistance(corners[i], corners[j]);

            if (rise > run * maxSlope) return false;
        }
    }

    return true;
};

const _clearanceStart = vec3.create();
const _clearanceEnd = vec3.create();

/**
 * Sweeps a box the width of a mover down from head height onto the cell,
 * failing when it comes to rest more than a step above the ground.
 */
export const testForClearance = (grid: Grid, probe: TerrainProbe, position: Vec3, corners: CellCorners): boolean => {
    const { widthClearance, heightClearance, stepSize } = grid.settings;
    const lowest = Math.min(...corners);
    const cellHeight = Math.max(...corners) - lowest;

    const box: Box3 = [
        [-widthClearance / 2, 0, -widthClearance / 2],
        [widthClearance / 2, 1, widthClearance / 2],
    ];

    vec3.copy(_clearanceStart, position);
    _clearanceStart[1] += heightClearance;
    vec3.copy(_clearanceEnd, position);
    _clearanceEnd[1] += stepSize;

    const result = probe.boxProbe(box, _clearanceStart, _clearanceEnd, getGridProbeFilter(grid));

    if (result.startedSolid) return false;

    return result.endPosition[1] - lowest <= grid.realStepSize + cellHeight;
};

/**
 * Samples the terrain around a position and creates a cell if it is walkable.
 * The cell is not added to the grid.
 *
 * @param position the center of the candidate cell, at ground height
 * @returns the new cell, tagged 'step' when it covers stairs, or null if the terrain is not walkable
 */
export const tryCreateCell = (grid: Grid, probe: TerrainProbe, position: Vec3): GridCell | null => {
    const hits = sampleCellCorners(grid, probe, position);
    if (!hits) return null;

    const { walkable, steps } = testForSteps(grid, probe, hits);
    if (!walkable) return null;

    if (!steps && !isWithinStandableSlope(grid, hits)) return null;

    const corners: CellCorners = [hits[0][1], hits[1][1], hits[2][1], hits[3][1]];

    if (!testForClearance(grid, probe, position, corners)) return null;

    return createCell(grid, position, corners, steps ? [CellTag.STEP] : []);
};

export const getGridProbeFilter = (grid: Grid): ProbeFilter => ({ worldOnly: grid.settings.worldOnly });
