import { describe, expect, test } from 'vitest';
import { createPathBuilder, findCellPath, type GridPath, lineOfSight, simplifyPath } from '../src';
import { cellAt, coordinatesOf, createFlatGrid, occupy } from './fixtures';

describe('simplifyPath', () => {
    test('collapses a diagonal into its two ends', () => {
        const grid = createFlatGrid(5);
        const builder = createPathBuilder(grid);
        const start = cellAt(grid, 0, 0);
        const target = cellAt(grid, 4, 4);

        const path: GridPath = { builder, nodes: findCellPath(grid, start, target).path };
        expect(path.nodes).toHaveLength(5);

        simplifyPath(path);

        expect(path.nodes.map((node) => node.cell)).toEqual([start, target]);
    });

    test('keeps the ends and line of sight between every pair around obstacles', () => {
        const grid = createFlatGrid(5);
        occupy(cellAt(grid, 2, 2));
        occupy(cellAt(grid, 2, 3));

        const builder = createPathBuilder(grid);
        const start = cellAt(grid, 0, 4);
        const target = cellAt(grid, 4, 2);

        const path: GridPath = { builder, nodes: findCellPath(grid, start, target).path };
        const length = path.nodes.length;

        simplifyPath(path);

        expect(path.nodes[0].cell).toBe(start);
        expect(path.nodes[path.nodes.length - 1].cell).toBe(target);
        expect(path.nodes.length).toBeLessThan(length);

        for (let i = 1; i < path.nodes.length; i++) {
            expect(lineOfSight(grid, path.nodes[i - 1].cell, path.nodes[i].cell)).toBe(true);
        }
    });

    test('short paths are left alone', () => {
        const grid = createFlatGrid(3);
        const builder = createPathBuilder(grid);

        const path: GridPath = {
            builder,
            nodes: [
                { cell: cellAt(grid, 0, 0), movementTag: null },
                { cell: cellAt(grid, 1, 0), movementTag: null },
            ],
        };

        simplifyPath(path);

        expect(coordinatesOf(path.nodes.map((node) => node.cell))).toEqual([
            [0, 0],
            [1, 0],
        ]);
    });

    test('shortcut waypoints are walked to', () => {
        const grid = createFlatGrid(3);
        const builder = createPathBuilder(grid);

        const path: GridPath = {
            builder,
            nodes: [
                { cell: cellAt(grid, 0, 0), movementTag: null },
                { cell: cellAt(grid, 1, 1), movementTag: null },
                { cell: cellAt(grid, 2, 0), movementTag: 'climb' },
            ],
        };

        simplifyPath(path);

        expect(path.nodes).toEqual([
            { cell: cellAt(grid, 0, 0), movementTag: null },
            { cell: cellAt(grid, 2, 0), movementTag: null },
        ]);
    });

    test('waypoints without line of sight are kept', () => {
        const grid = createFlatGrid(3);
        occupy(cellAt(grid, 1, 0));

        const builder = createPathBuilder(grid);

        const path: GridPath = {
            builder,
            nodes: [
                { cell: cellAt(grid, 0, 0), movementTag: null },
                { cell: cellAt(grid, 1, 1), movementTag: null },
                { cell: cellAt(grid, 2, 0), movementTag: null },
            ],
        };

        simplifyPath(path);

        expect(path.nodes).toHaveLength(3);
    });
});
