import type { Box3, Vec2, Vec3 } from 'mathcat';
import { box3, vec3 } from 'mathcat';
import { rotateYaw, spiralPattern } from '../geometry';
import {
    type CellConnection,
    type CellCorners,
    CellTag,
    DEFAULT_GRID_SETTINGS,
    type Grid,
    type GridCell,
    type GridSettings,
    type Mover,
} from './grid';

export type GridParams = Partial<GridSettings>;

export const createGrid = (params: GridParams = {}): Grid => {
    const settings: GridSettings = {
        ...DEFAULT_GRID_SETTINGS,
        ...params,
        origin: vec3.clone(params.origin ?? DEFAULT_GRID_SETTINGS.origin),
        bounds: box3.clone(params.bounds ?? DEFAULT_GRID_SETTINGS.bounds),
    };

    return {
        identifier: settings.identifier,
        settings,
        cellStacks: {},
        realStepSize: settings.gridPerfect ? 0.1 : Math.max(0.1, settings.stepSize),
        tolerance: settings.gridPerfect ? 0.001 : 0,
    };
};

export const getCoordinatesHash = (x: number, y: number): string => {
    return `${x},${y}`;
};

/** the number of cells along the grid's local x and z axes */
export const getGridSize = (out: Vec2, grid: Grid): Vec2 => {
    const { bounds, cellSize } = grid.settings;
    out[0] = Math.floor((bounds[1][0] - bounds[0][0]) / cellSize);
    out[1] = Math.floor((bounds[1][2] - bounds[0][2]) / cellSize);
    return out;
};

const _worldBoundsCorner = vec3.create();

/** world space AABB enclosing the rotated grid bounds */
export const getWorldBounds = (out: Box3, grid: Grid): Box3 => {
    const { bounds, origin, yaw } = grid.settings;

    vec3.set(out[0], Infinity, Infinity, Infinity);
    vec3.set(out[1], -Infinity, -Infinity, -Infinity);

    for (let i = 0; i < 8; i++) {
        vec3.set(
            _worldBoundsCorner,
            bounds[i & 1][0],
            bounds[(i >> 1) & 1][1],
            bounds[(i >> 2) & 1][2],
        );
        rotateYaw(_worldBoundsCorner, _worldBoundsCorner, yaw);
        vec3.add(_worldBoundsCorner, _worldBoundsCorner, origin);
        vec3.min(out[0], out[0], _worldBoundsCorner);
        vec3.max(out[1], out[1], _worldBoundsCorner);
    }

    return out;
};

const _toLocal = vec3.create();

/** converts a world position into the grid's unrotated local space */
export const worldToLocal = (out: Vec3, grid: Grid, position: Vec3): Vec3 => {
    vec3.subtract(_toLocal, position, grid.settings.origin);
    return rotateYaw(out, _toLocal, -grid.settings.yaw);
};

/** converts a grid local direction or offset into world space */
export const localToWorldDirection = (out: Vec3, grid: Grid, direction: Vec3): Vec3 => {
    return rotateYaw(out, direction, grid.settings.yaw);
};

const _positionToCoordinatesLocal = vec3.create();

/** Gets the grid coordinates of a world position */
export const positionToCoordinates = (out: Vec2, grid: Grid, position: Vec3): Vec2 => {
    const { bounds, cellSize } = grid.settings;
    const local = worldToLocal(_positionToCoordinatesLocal, grid, position);

    out[0] = Math.round((local[0] - bounds[0][0] - cellSize / 2) / cellSize) || 0;
    out[1] = Math.round((local[2] - bounds[0][2] - cellSize / 2) / cellSize) || 0;

    return out;
};

const _coordinatesToPositionLocal = vec3.create();

/** Gets the world position of the center of a grid coordinate, at the given height */
export const coordinatesToPosition = (out: Vec3, grid: Grid, coordinates: Vec2, height: number): Vec3 => {
    const { bounds, cellSize, origin, yaw } = grid.settings;

    vec3.set(
        _coordinatesToPositionLocal,
        bounds[0][0] + cellSize / 2 + coordinates[0] * cellSize,
        0,
        bounds[0][2] + cellSize / 2 + coordinates[1] * cellSize,
    );
    rotateYaw(out, _coordinatesToPositionLocal, yaw);
    out[0] += origin[0];
    out[2] += origin[2];
    out[1] = height;

    return out;
};

const _insideBoundsLocal = vec3.create();

export const isInsideBounds = (grid: Grid, position: Vec3): boolean => {
    const { bounds } = grid.settings;
    const local = worldToLocal(_insideBoundsLocal, grid, position);

    return (
        local[0] >= bounds[0][0] &&
        local[0] <= bounds[1][0] &&
        local[1] >= bounds[0][1] &&
        local[1] <= bounds[1][1] &&
        local[2] >= bounds[0][2] &&
        local[2] <= bounds[1][2]
    );
};

/* cells */

export const createCell = (grid: Grid, position: Vec3, corners: CellCorners, tags: Iterable<string> = []): GridCell => {
    return {
        coordinates: positionToCoordinates([0, 0], grid, position),
        position: vec3.clone(position),
        corners,
        tags: new Set(tags),
        connections: [],
        occupant: null,
        occupantPose: null,
    };
};

export const getLowestCorner = (cell: GridCell): number => Math.min(...cell.corners);

export const getHighestCorner = (cell: GridCell): number => Math.max(...cell.corners);

/** height difference between the highest and lowest corner */
export const getCellHeight = (cell: GridCell): number => getHighestCorner(cell) - getLowestCorner(cell);

export const addCell = (grid: Grid, cell: GridCell): void => {
    const hash = getCoordinatesHash(cell.coordinates[0], cell.coordinates[1]);
    const stack = grid.cellStacks[hash];

    if (stack) {
        stack.push(cell);
    } else {
        grid.cellStacks[hash] = [cell];
    }
};

export const removeCell = (grid: Grid, cell: GridCell): boolean => {
    const hash = getCoordinatesHash(cell.coordinates[0], cell.coordinates[1]);
    const stack = grid.cellStacks[hash];
    if (!stack) return false;

    const index = stack.indexOf(cell);
    if (index === -1) return false;

    stack.splice(index, 1);
    if (stack.length === 0) {
        delete grid.cellStacks[hash];
    }

    return true;
};

export const getCellsAt = (grid: Grid, x: number, y: number): GridCell[] => {
    return grid.cellStacks[getCoordinatesHash(x, y)] ?? [];
};

export const getAllCells = (grid: Grid): GridCell[] => {
    const cells: GridCell[] = [];
    for (const hash in grid.cellStacks) {
        for (const cell of grid.cellStacks[hash]) {
            cells.push(cell);
        }
    }
    return cells;
};

export const getCellCount = (grid: Grid): number => {
    let count = 0;
    for (const hash in grid.cellStacks) {
        count += grid.cellStacks[hash].length;
    }
    return count;
};

/**
 * Finds the cell at the given coordinates.
 * Returns the first cell in the stack whose lowest corner, minus the step size, is below the given height.
 * Stacks are searched in insertion order.
 */
export const getCell = (grid: Grid, coordinates: Vec2, height: number): GridCell | null => {
    const stack = grid.cellStacks[getCoordinatesHash(coordinates[0], coordinates[1])];
    if (!stack) return null;

    for (const cell of stack) {
        if (getLowestCorner(cell) - grid.settings.stepSize < height) {
            return cell;
        }
    }

    return null;
};

const _getCellAtPositionCoordinates: Vec2 = [0, 0];
const _getCellAtPositionBounds = box3.create();

/**
 * Finds the cell under a world position.
 * @param onlyBelow whether to ignore cells above the position
 */
export const getCellAtPosition = (grid: Grid, position: Vec3, onlyBelow = true): GridCell | null => {
    positionToCoordinates(_getCellAtPositionCoordinates, grid, position);

    const height = onlyBelow ? position[1] : getWorldBounds(_getCellAtPositionBounds, grid)[1][1];

    return getCell(grid, _getCellAtPositionCoordinates, height);
};

/**
 * Finds the nearest cell to a position, even outside of the grid.
 * This checks every cell, avoid calling it often.
 */
export const getNearestCell = (
    grid: Grid,
    position: Vec3,
    onlyBelow = true,
    unoccupiedOnly = false,
): GridCell | null => {
    let nearest: GridCell | null = null;
    let nearestDistanceSqr = Infinity;

    for (const cell of getAllCells(grid)) {
        if (unoccupiedOnly && isOccupied(cell)) continue;
        if (onlyBelow && getLowestCorner(cell) - grid.settings.stepSize > position[1]) continue;

        const distanceSqr = vec3.squaredDistance(cell.position, position);

        if (distanceSqr < nearestDistanceSqr) {
            nearestDistanceSqr = distanceSqr;
            nearest = cell;
        }
    }

    return nearest;
};

const _getCellInAreaOffset = vec3.create();
const _getCellInAreaPosition = vec3.create();

/**
 * Spirals outwards from a position looking for a cell within the given width.
 * @param withinStepRange only accept cells at most a step below the position
 */
export const getCellInArea = (
    grid: Grid,
    position: Vec3,
    width: number,
    onlyBelow = true,
    withinStepRange = true,
): GridCell | null => {
    const { cellSize } = grid.settings;
    const cellsToCheck = Math.ceil(width / cellSize) * 2;

    for (let y = 0; y <= cellsToCheck; y++) {
        const spiralY = spiralPattern(y);

        for (let x = 0; x <= cellsToCheck; x++) {
            const spiralX = spiralPattern(x);

            vec3.set(_getCellInAreaOffset, spiralX * cellSize, grid.realStepSize, spiralY * cellSize);
            localToWorldDirection(_getCellInAreaOffset, grid, _getCellInAreaOffset);
            vec3.add(_getCellInAreaPosition, position, _getCellInAreaOffset);

            const cell = getCellAtPosition(grid, _getCellInAreaPosition, onlyBelow);
            if (!cell) continue;

            if (withinStepRange && position[1] - cell.position[1] > grid.realStepSize) continue;

            return cell;
        }
    }

    return null;
};

/* tags and occupancy */

export const hasTag = (cell: GridCell, tag: string): boolean => cell.tags.has(tag);

/** whether the cell has every one of the tags */
export const hasAllTags = (cell: GridCell, tags: string[]): boolean => {
    for (const tag of tags) {
        if (!cell.tags.has(tag)) return false;
    }
    return true;
};

/** whether the cell has at least one of the tags */
export const hasAnyTag = (cell: GridCell, tags: string[]): boolean => {
    for (const tag of tags) {
        if (cell.tags.has(tag)) return true;
    }
    return false;
};

export const addTag = (cell: GridCell, tag: string): void => {
    cell.tags.add(tag);
};

export const removeTag = (cell: GridCell, tag: string): void => {
    cell.tags.delete(tag);
};

export const getCellsWithTag = (grid: Grid, tag: string): GridCell[] => {
    return getAllCells(grid).filter((cell) => cell.tags.has(tag));
};

/** cells that have every one of the tags */
export const getCellsWithTags = (grid: Grid, tags: string[]): GridCell[] => {
    return getAllCells(grid).filter((cell) => hasAllTags(cell, tags));
};

/** cells that have at least one of the tags */
export const getCellsWithAnyTag = (grid: Grid, tags: string[]): GridCell[] => {
    return getAllCells(grid).filter((cell) => hasAnyTag(cell, tags));
};

export const isOccupied = (cell: GridCell): boolean => cell.tags.has(CellTag.OCCUPIED);

export const setOccupied = (cell: GridCell, occupied: boolean): void => {
    if (occupied) {
        cell.tags.add(CellTag.OCCUPIED);
    } else {
        cell.tags.delete(CellTag.OCCUPIED);
    }
};

/** records the mover occupying a cell, along with a snapshot of its pose */
export const setOccupant = (cell: GridCell, mover: Mover | null): void => {
    cell.occupant = mover;
    cell.occupantPose = mover ? { position: vec3.clone(mover.pose.position), yaw: mover.pose.yaw } : null;
};

/**
 * Whether a cell is occupied by anyone other than the given path creator.
 * Without a path creator, any occupancy blocks.
 */
export const isBlockedFor = (cell: GridCell, pathCreator: Mover | null): boolean => {
    if (!isOccupied(cell)) return false;
    if (pathCreator === null) return true;

    return cell.occupant !== pathCreator;
};

/* neighbours */

/**
 * Corner index pairs that must line up between a cell and the neighbour at each offset.
 * Keyed by the coordinate offset of the neighbour, each pair is [own corner, neighbour corner].
 */
const NEIGHBOUR_CORNER_PAIRS: Record<string, Array<[number, number]>> = {
    '-1,-1': [[0, 3]],
    '-1,0': [
        [1, 3],
        [0, 2],
    ],
    '-1,1': [[1, 2]],
    '0,-1': [
        [0, 1],
        [2, 3],
    ],
    '0,1': [
        [1, 0],
        [3, 2],
    ],
    '1,-1': [[2, 1]],
    '1,0': [
        [3, 1],
        [2, 0],
    ],
    '1,1': [[3, 0]],
};

const NEIGHBOUR_HEIGHT_TOLERANCE = 0.1;

/**
 * Whether two cells touch: their coordinates are at most one apart on each axis
 * and their shared corners are at the same height.
 * A cell is its own neighbour, a different cell at the same coordinates is not.
 */
export const isNeighbour = (cell: GridCell, other: GridCell): boolean => {
    const dx = other.coordinates[0] - cell.coordinates[0];
    const dy = other.coordinates[1] - cell.coordinates[1];

    if (dx < -1 || dx > 1 || dy < -1 || dy > 1) return false;
    if (cell === other) return true;
    if (dx === 0 && dy === 0) return false;

    const pairs = NEIGHBOUR_CORNER_PAIRS[getCoordinatesHash(dx, dy)];

    for (const [own, theirs] of pairs) {
        if (Math.abs(cell.corners[own] - other.corners[theirs]) >= NEIGHBOUR_HEIGHT_TOLERANCE) {
            return false;
        }
    }

    return true;
};

const _getNeighboursCoordinates: Vec2 = [0, 0];

/**
 * Returns the surrounding cells that are directly connected to a cell.
 * @param ignoreHeight look up neighbours at any height, instead of at the cell's height
 */
export const getNeighbours = (grid: Grid, cell: GridCell, ignoreHeight = false): GridCell[] => {
    const height = ignoreHeight ? Infinity : cell.position[1];
    const neighbours: GridCell[] = [];

    for (let y = -1; y <= 1; y++) {
        for (let x = -1; x <= 1; x++) {
            if (x === 0 && y === 0) continue;

            _getNeighboursCoordinates[0] = cell.coordinates[0] + x;
            _getNeighboursCoordinates[1] = cell.coordinates[1] + y;

            const found = getCell(grid, _getNeighboursCoordinates, height);
            if (!found) continue;

            if (isNeighbour(cell, found)) {
                neighbours.push(found);
            }
        }
    }

    return neighbours;
};

/** Returns plain neighbours, untagged, followed by the cell's extra connections */
export const getNeighboursAndConnections = (grid: Grid, cell: GridCell, ignoreHeight = false): CellConnection[] => {
    const result: CellConnection[] = [];

    for (const neighbour of getNeighbours(grid, cell, ignoreHeight)) {
        result.push({ cell: neighbour, movementTag: null });
    }

    for (const connection of cell.connections) {
        result.push(connection);
    }

    return result;
};

const _neighbourInDirectionLocal = vec3.create();

/** Returns the neighbour of a cell in a world space direction, if the cells touch */
export const getNeighbourInDirection = (grid: Grid, cell: GridCell, direction: Vec3): GridCell | null => {
    const local = rotateYaw(_neighbourInDirectionLocal, direction, -grid.settings.yaw);
    local[1] = 0;
    vec3.normalize(local, local);

    const dx = Math.round(local[0]) || 0;
    const dy = Math.round(local[2]) || 0;

    if (dx === 0 && dy === 0) return null;

    for (const other of getCellsAt(grid, cell.coordinates[0] + dx, cell.coordinates[1] + dy)) {
        if (isNeighbour(cell, other)) {
            return other;
        }
    }

    return null;
};

const _cellInDirectionPosition = vec3.create();

/** Returns the cell a number of cells away from a cell in a world space direction */
export const getCellInDirection = (grid: Grid, cell: GridCell, direction: Vec3, cellCount = 1): GridCell | null => {
    vec3.scaleAndAdd(_cellInDirectionPosition, cell.position, direction, grid.settings.cellSize * cellCount);
    return getCellAtPosition(grid, _cellInDirectionPosition);
};

export const addConnection = (cell: GridCell, other: GridCell, movementTag: string | null = null): void => {
    cell.connections.push({ cell: other, movementTag });
};
