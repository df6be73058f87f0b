import type { Box3, Vec2, Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { parabolaHeight, parabolaMaxHeight, rotateYaw, spiralPattern } from '../geometry';
import type { TerrainProbe } from '../probe';
import { CellTag, type Grid, type GridCell, MovementTag } from '../query/grid';
import {
    addConnection,
    addTag,
    getAllCells,
    getCell,
    getCellInArea,
    getCellsWithTag,
    getNeighbours,
    isNeighbour,
} from '../query/grid-api';
import { lineOfSight } from '../query/line-of-sight';
import { getGridProbeFilter } from './cell-factory';

/**
 * Tags every cell with fewer than `maxNeighbourCount` neighbours as an edge.
 * Edges are grid boundaries and ledges, where drops and jumps are looked for.
 */
export const assignEdgeCells = (grid: Grid, maxNeighbourCount = 8): void => {
    for (const cell of getAllCells(grid)) {
        if (getNeighbours(grid, cell).length < maxNeighbourCount) {
            addTag(cell, CellTag.EDGE);
        }
    }
};

const _droppableCoordinates: Vec2 = [0, 0];
const _egressStart = vec3.create();
const _egressEnd = vec3.create();
const _landingEnd = vec3.create();

/**
 * Looks outwards from a cell for the first lower cell a mover could drop down onto.
 *
 * A candidate is skipped when it touches the cell, is further down than `maxHeightDistance`,
 * is low enough to just be a step away, can already be walked to,
 * or when there is no room to walk off the ledge or fall onto it.
 *
 * @param minCellDistance cells this close on both axes are never candidates
 * @param maxCellDistance how many cells away to look
 */
export const getFirstValidDroppable = (
    grid: Grid,
    probe: TerrainProbe,
    cell: GridCell,
    minCellDistance = 1,
    maxCellDistance = 3,
    maxHeightDistance = grid.settings.maxDropHeight,
): GridCell | null => {
    const { widthClearance, heightClearance } = grid.settings;
    const realStepSize = grid.realStepSize;
    const filter = getGridProbeFilter(grid);

    const clearanceBox: Box3 = [
        [-widthClearance / 2, 0, -widthClearance / 2],
        [widthClearance / 2, heightClearance - realStepSize, widthClearance / 2],
    ];

    for (let y = 0; y <= maxCellDistance * 2; y++) {
        const spiralY = spiralPattern(y);

        for (let x = 0; x <= maxCellDistance * 2; x++) {
            const spiralX = spiralPattern(x);

            if (Math.abs(spiralX) <= minCellDistance && Math.abs(spiralY) <= minCellDistance) continue;

            _droppableCoordinates[0] = cell.coordinates[0] + spiralX;
            _droppableCoordinates[1] = cell.coordinates[1] + spiralY;

            const found = getCell(grid, _droppableCoordinates, cell.position[1]);

            if (!found || found === cell) continue;
            if (isNeighbour(cell, found)) continue;

            const verticalDistance = cell.position[1] - found.position[1];
            if (verticalDistance > maxHeightDistance) continue;

            // probably just steps
            const horizontalDistance = Math.hypot(spiralX, spiralY) - 1;
            if (verticalDistance < realStepSize * horizontalDistance) continue;

            if (lineOfSight(grid, cell, found)) continue;

            // walk off the edge
            vec3.copy(_egressStart, cell.position);
            _egressStart[1] += realStepSize;
            vec3.set(_egressEnd, found.position[0], cell.position[1] + realStepSize, found.position[2]);

            if (probe.boxProbe(clearanceBox, _egressStart, _egressEnd, filter).hit) continue;

            // fall down onto the cell
            vec3.copy(_landingEnd, found.position);
            _landingEnd[1] += realStepSize;

            if (probe.boxProbe(clearanceBox, _egressEnd, _landingEnd, filter).hit) continue;

            return found;
        }
    }

    return null;
};

/**
 * Connects every edge cell to the first cell it can drop down onto, with the 'drop' movement tag.
 */
export const assignDroppableCells = (grid: Grid, probe: TerrainProbe): void => {
    for (const cell of getCellsWithTag(grid, CellTag.EDGE)) {
        const droppable = getFirstValidDroppable(grid, probe, cell, 1, 3, grid.settings.maxDropHeight);

        if (droppable) {
            addConnection(cell, droppable, MovementTag.DROP);
        }
    }
};

const _parabolaDirection = vec3.create();
const _parabolaLast = vec3.create();
const _parabolaNext = vec3.create();

/**
 * Follows a jump arc from a position until the mover's clearance box hits something,
 * or until it has fallen `maxDropHeight` below the top of the arc.
 *
 * @param out the position the arc stopped at
 * @param horizontalVelocity the horizontal launch velocity, its vertical component is ignored
 * @param subSteps how many sweeps per cell of horizontal travel
 */
export const traceParabola = (
    out: Vec3,
    grid: Grid,
    probe: TerrainProbe,
    start: Vec3,
    horizontalVelocity: Vec3,
    verticalSpeed: number,
    gravity: number,
    maxDropHeight: number,
    subSteps = 2,
): Vec3 => {
    const { cellSize, widthClearance, heightClearance } = grid.settings;

    vec3.set(_parabolaDirection, horizontalVelocity[0], 0, horizontalVelocity[2]);
    const horizontalSpeed = vec3.length(_parabolaDirection);
    vec3.normalize(_parabolaDirection, _parabolaDirection);

    const minHeight = start[1] + parabolaMaxHeight(verticalSpeed, gravity) - maxDropHeight;

    const clearanceBox: Box3 = [
        [-widthClearance / 2, grid.realStepSize, -widthClearance / 2],
        [widthClearance / 2, heightClearance, widthClearance / 2],
    ];
    const filter = getGridProbeFilter(grid);

    vec3.copy(_parabolaLast, start);

    for (let i = 1; _parabolaLast[1] >= minHeight; i++) {
        const horizontalOffset = (cellSize * i) / subSteps;
        const verticalOffset = parabolaHeight(horizontalOffset, horizontalSpeed, verticalSpeed, gravity);

        vec3.scaleAndAdd(_parabolaNext, start, _parabolaDirection, horizontalOffset);
        _parabolaNext[1] += verticalOffset;

        const result = probe.boxProbe(clearanceBox, _parabolaLast, _parabolaNext, filter);

        if (result.hit) {
            return vec3.copy(out, result.endPosition);
        }

        vec3.copy(_parabolaLast, _parabolaNext);
    }

    return vec3.copy(out, _parabolaLast);
};

export type JumpParams = {
    horizontalSpeed: number;
    verticalSpeed: number;
    gravity: number;
};

const _jumpVelocity = vec3.create();
const _jumpEnd = vec3.create();

/**
 * Traces a jump from a cell in a world space direction and returns the cell it lands on, if any.
 * Landings that can be walked back to from the cell, or that duplicate one of its connections, are rejected.
 */
export const getValidJumpable = (
    grid: Grid,
    probe: TerrainProbe,
    cell: GridCell,
    jump: JumpParams,
    direction: Vec3,
    maxHeightDistance = grid.settings.maxDropHeight,
): GridCell | null => {
    vec3.scale(_jumpVelocity, direction, jump.horizontalSpeed);

    traceParabola(_jumpEnd, grid, probe, cell.position, _jumpVelocity, jump.verticalSpeed, jump.gravity, maxHeightDistance);

    const landing = getCellInArea(grid, _jumpEnd, grid.settings.widthClearance);

    if (!landing) return null;
    if (lineOfSight(grid, landing, cell)) return null;

    for (const connection of cell.connections) {
        if (lineOfSight(grid, landing, connection.cell)) return null;
    }

    return landing;
};

const _sideDirection = vec3.create();

/**
 * Traces jumps from a cell in evenly spaced directions around it and returns the distinct cells they land on.
 * A landing is dropped when it can be walked to from the cell, from an earlier landing, or from a connected cell.
 */
export const getValidJumpables = (
    grid: Grid,
    probe: TerrainProbe,
    cell: GridCell,
    jump: JumpParams,
    sidesToCheck = 8,
    maxHeightDistance = grid.settings.maxDropHeight,
): GridCell[] => {
    const jumpables: GridCell[] = [];

    for (let side = 0; side < sidesToCheck; side++) {
        const angle = ((Math.PI * 2) / sidesToCheck) * side;
        vec3.set(_sideDirection, Math.cos(angle), 0, Math.sin(angle));
        rotateYaw(_sideDirection, _sideDirection, grid.settings.yaw);

        vec3.scale(_jumpVelocity, _sideDirection, jump.horizontalSpeed);

        traceParabola(_jumpEnd, grid, probe, cell.position, _jumpVelocity, jump.verticalSpeed, jump.gravity, maxHeightDistance);

        const landing = getCellInArea(grid, _jumpEnd, grid.settings.widthClearance);

        if (!landing) continue;
        if (lineOfSight(grid, landing, cell)) continue;
        if (jumpables.some((other) => lineOfSight(grid, landing, other))) continue;
        if (cell.connections.some((connection) => lineOfSight(grid, landing, connection.cell))) continue;

        jumpables.push(landing);
    }

    return jumpables;
};

export type AssignJumpableCellsOptions = JumpParams & {
    /** movement tag for the new connections */
    movementTag?: string;

    /** share of edge cells to trace jumps from, 0.1 traces from every tenth edge cell */
    generateFraction?: number;

    /** how many directions to jump in */
    sidesToCheck?: number;
};

const _jumpBackDirection = vec3.create();

/**
 * Connects edge cells to the cells they can jump onto, and those cells back when the return jump works.
 * Tracing is slow on bigger grids, `generateFraction` only traces from a share of the edge cells, spread evenly.
 */
export const assignJumpableCells = (grid: Grid, probe: TerrainProbe, options: AssignJumpableCellsOptions): void => {
    const movementTag = options.movementTag ?? MovementTag.JUMP;
    const generateFraction = options.generateFraction ?? 0.2;
    const sidesToCheck = options.sidesToCheck ?? 8;
    const { maxDropHeight } = grid.settings;

    let totalFraction = 0;

    for (const cell of getCellsWithTag(grid, CellTag.EDGE)) {
        totalFraction += generateFraction;
        if (totalFraction < 1) continue;
        totalFraction -= 1;

        const jumpables = getValidJumpables(grid, probe, cell, options, sidesToCheck, maxDropHeight);

        for (const jumpable of jumpables) {
            addConnection(cell, jumpable, movementTag);
        }

        // check if the jump back onto the cell works
        for (const jumpable of jumpables) {
            vec3.subtract(_jumpBackDirection, cell.position, jumpable.position);
            _jumpBackDirection[1] = 0;
            vec3.normalize(_jumpBackDirection, _jumpBackDirection);

            const jumpBack = getValidJumpable(grid, probe, jumpable, options, _jumpBackDirection, maxDropHeight);

            if (jumpBack) {
                addConnection(jumpable, jumpBack, movementTag);
            }
        }
    }
};
