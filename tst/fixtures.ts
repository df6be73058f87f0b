import type { Vec2, Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import {
    addCell,
    coordinatesToPosition,
    createCell,
    createGrid,
    getCell,
    type Grid,
    type GridCell,
    type GridParams,
    type Mover,
    setOccupant,
    setOccupied,
} from '../src';

/** a grid of size x size flat cells at height 0 */
export const createFlatGrid = (size: number, cellSize = 100, params: GridParams = {}): Grid => {
    const grid = createGrid({
        bounds: [
            [0, -100, 0],
            [size * cellSize, 100, size * cellSize],
        ],
        cellSize,
        ...params,
    });

    const position = vec3.create();

    for (let x = 0; x < size; x++) {
        for (let y = 0; y < size; y++) {
            coordinatesToPosition(position, grid, [x, y], 0);
            addCell(grid, createCell(grid, position, [0, 0, 0, 0]));
        }
    }

    return grid;
};

export const cellAt = (grid: Grid, x: number, y: number, height = 0): GridCell => {
    const coordinates: Vec2 = [x, y];
    const cell = getCell(grid, coordinates, height);

    if (!cell) throw new Error(`no cell at ${x},${y}`);

    return cell;
};

export const coordinatesOf = (cells: GridCell[]): Vec2[] => cells.map((cell) => [cell.coordinates[0], cell.coordinates[1]]);

export const createMover = (id: string, position: Vec3 = [0, 0, 0]): Mover => ({
    id,
    pose: { position: vec3.clone(position), yaw: 0 },
});

/** marks a cell occupied, by the mover when given */
export const occupy = (cell: GridCell, mover: Mover | null = null): void => {
    setOccupied(cell, true);
    setOccupant(cell, mover);
};
