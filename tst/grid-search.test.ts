import { vec3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import {
    addConnection,
    createSlicedCellPathQuery,
    FindCellPathResultFlags,
    finalizeSlicedFindCellPath,
    findCellPath,
    findCellPathAsync,
    findCellPathRace,
    initSlicedFindCellPath,
    MovementTag,
    type PathNode,
    removeCell,
    SlicedFindCellPathStatusFlags,
    updateSlicedFindCellPath,
} from '../src';
import { cellAt, coordinatesOf, createFlatGrid, createMover, occupy } from './fixtures';

const getLength = (path: PathNode[]): number => {
    let length = 0;
    for (let i = 1; i < path.length; i++) {
        length += vec3.distance(path[i - 1].cell.position, path[i].cell.position);
    }
    return length;
};

const buildWall = (grid: ReturnType<typeof createFlatGrid>, x: number) => {
    for (let y = 0; y < 5; y++) {
        occupy(cellAt(grid, x, y));
    }
};

describe('findCellPath', () => {
    test('finds the diagonal across an open grid', () => {
        const grid = createFlatGrid(5);
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 4, 4);

        const result = findCellPath(grid, start, target);

        expect(result.success).toBe(true);
        expect(result.flags).toBe(FindCellPathResultFlags.SUCCESS | FindCellPathResultFlags.COMPLETE_PATH);
        expect(coordinatesOf(result.path.map((node) => node.cell))).toEqual([
            [0, 0],
            [1, 1],
            [2, 2],
            [3, 3],
            [4, 4],
        ]);
        expect(result.path.every((node) => node.movementTag === null)).toBe(true);
    });

    test('path length is within a cell of the straight line', () => {
        const grid = createFlatGrid(6);
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 5, 2);

        const result = findCellPath(grid, start, target);

        expect(result.path[0].cell).toBe(start);
        expect(result.path[result.path.length - 1].cell).toBe(target);

        const straight = vec3.distance(start.position, target.position);
        const length = getLength(result.path);

        expect(length).toBeCloseTo(200 * Math.SQRT2 + 300);
        expect(length - straight).toBeLessThanOrEqual(grid.settings.cellSize);
    });

    test('start equal to target', () => {
        const grid = createFlatGrid(3);
        const cell = cellAt(grid, 1, 1);

        const result = findCellPath(grid, cell, cell);

        expect(result.success).toBe(true);
        expect(result.path).toEqual([{ cell, movementTag: null }]);
    });

    test('missing start or target is invalid input', () => {
        const grid = createFlatGrid(3);

        const result = findCellPath(grid, null, cellAt(grid, 1, 1));

        expect(result.success).toBe(false);
        expect(result.flags).toBe(FindCellPathResultFlags.INVALID_INPUT);
        expect(result.path).toEqual([]);
    });

    test('a wall of occupied cells leaves no path', () => {
        const grid = createFlatGrid(5);
        buildWall(grid, 2);

        const result = findCellPath(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4));

        expect(result.success).toBe(false);
        expect(result.flags).toBe(FindCellPathResultFlags.NONE);
        expect(result.path).toEqual([]);
    });

    test('partial paths lead to the closest explored cell', () => {
        const grid = createFlatGrid(5);
        buildWall(grid, 2);

        const result = findCellPath(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { partial: true });

        expect(result.success).toBe(true);
        expect(result.flags).toBe(FindCellPathResultFlags.SUCCESS | FindCellPathResultFlags.PARTIAL_PATH);
        expect(result.path[0].cell).toBe(cellAt(grid, 0, 0));
        expect(result.path[result.path.length - 1].cell).toBe(cellAt(grid, 1, 4));
    });

    test('the path creator can walk through its own cells', () => {
        const grid = createFlatGrid(5);
        const mover = createMover('walker');

        for (let y = 0; y < 5; y++) {
            occupy(cellAt(grid, 2, y), mover);
        }

        const result = findCellPath(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { pathCreator: mover });

        expect(result.success).toBe(true);
        expect(result.path).toHaveLength(5);
    });

    test('maxDistance caps the search', () => {
        const grid = createFlatGrid(5);
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 4, 0);

        expect(findCellPath(grid, start, target, { maxDistance: 250 }).path).toEqual([]);

        const partial = findCellPath(grid, start, target, { maxDistance: 250, partial: true });

        expect(partial.flags & FindCellPathResultFlags.PARTIAL_PATH).toBeTruthy();
        expect(coordinatesOf(partial.path.map((node) => node.cell))).toEqual([
            [0, 0],
            [1, 0],
            [2, 0],
        ]);
    });

    test('reversed paths lead from the target to the start', () => {
        const grid = createFlatGrid(5);

        const result = findCellPath(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { reversed: true });

        expect(result.path[0].cell).toBe(cellAt(grid, 4, 4));
        expect(result.path[result.path.length - 1].cell).toBe(cellAt(grid, 0, 0));
    });

    test('connections are only followed when asked', () => {
        const grid = createFlatGrid(5);

        for (let y = 0; y < 5; y++) {
            removeCell(grid, cellAt(grid, 2, y));
        }

        addConnection(cellAt(grid, 1, 2), cellAt(grid, 3, 2), MovementTag.JUMP);

        const start = cellAt(grid, 0, 2);
        const target = cellAt(grid, 4, 2);

        expect(findCellPath(grid, start, target).success).toBe(false);

        const result = findCellPath(grid, start, target, { includeConnections: true });

        expect(result.success).toBe(true);
        expect(result.path.map((node) => node.movementTag)).toEqual([null, null, 'jump', null]);
        expect(result.path[2].cell).toBe(cellAt(grid, 3, 2));
    });

    test('an aborted signal cancels the search', () => {
        const grid = createFlatGrid(5);
        const controller = new AbortController();
        controller.abort();

        const result = findCellPath(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { signal: controller.signal });

        expect(result.success).toBe(false);
        expect(result.flags).toBe(FindCellPathResultFlags.CANCELLED);
        expect(result.path).toEqual([]);
    });
});

describe('sliced search', () => {
    test('expands a limited number of cells per update', () => {
        const grid = createFlatGrid(5);
        const query = createSlicedCellPathQuery();

        const status = initSlicedFindCellPath(query, cellAt(grid, 0, 0), cellAt(grid, 4, 4));
        expect(status).toBe(SlicedFindCellPathStatusFlags.IN_PROGRESS);

        expect(updateSlicedFindCellPath(grid, query, 1)).toBe(1);
        expect(query.status).toBe(SlicedFindCellPathStatusFlags.IN_PROGRESS);

        let updates = 1;
        while (query.status & SlicedFindCellPathStatusFlags.IN_PROGRESS) {
            updateSlicedFindCellPath(grid, query, 1);
            updates++;
        }

        expect(updates).toBe(5);
        expect(query.status).toBe(SlicedFindCellPathStatusFlags.SUCCESS);

        const result = finalizeSlicedFindCellPath(query);
        expect(result.path).toHaveLength(5);
        expect(query.status).toBe(SlicedFindCellPathStatusFlags.NOT_INITIALIZED);
    });
});

describe('findCellPathAsync', () => {
    test('finds the same path as the synchronous search', async () => {
        const grid = createFlatGrid(5);

        const result = await findCellPathAsync(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), {}, 2);

        expect(result.success).toBe(true);
        expect(result.path).toHaveLength(5);
    });

    test('aborting mid search resolves with an empty result', async () => {
        const grid = createFlatGrid(5);
        const controller = new AbortController();

        const promise = findCellPathAsync(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { signal: controller.signal }, 1);
        controller.abort();

        const result = await promise;

        expect(result.success).toBe(false);
        expect(result.flags).toBe(FindCellPathResultFlags.CANCELLED);
        expect(result.path).toEqual([]);
    });
});

describe('findCellPathRace', () => {
    test('returns a path from start to target', async () => {
        const grid = createFlatGrid(5);
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 4, 4);

        const result = await findCellPathRace(grid, start, target, {}, 1);

        expect(result.success).toBe(true);
        expect(result.path).toHaveLength(5);
        expect(result.path[0].cell).toBe(start);
        expect(result.path[4].cell).toBe(target);
    });

    test('a partial path still begins at the start cell when the target side is walled off', async () => {
        const grid = createFlatGrid(6);
        for (let y = 0; y < 6; y++) {
            occupy(cellAt(grid, 4, y));
        }
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 5, 5);

        const result = await findCellPathRace(grid, start, target, { partial: true }, 1);

        expect(result.flags).toBe(FindCellPathResultFlags.SUCCESS | FindCellPathResultFlags.PARTIAL_PATH);
        expect(result.path[0].cell).toBe(start);
        for (const node of result.path) {
            expect(node.cell.coordinates[0]).toBeLessThan(4);
        }
    });

    test('an aborted signal cancels both searches', async () => {
        const grid = createFlatGrid(5);
        const controller = new AbortController();
        controller.abort();

        const result = await findCellPathRace(grid, cellAt(grid, 0, 0), cellAt(grid, 4, 4), { signal: controller.signal });

        expect(result.flags).toBe(FindCellPathResultFlags.CANCELLED);
    });
});
