import type { Box3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import { addSolid, createBoxWorld, createBoxWorldProbe, generateGrid } from '../blocks';
import { CellTag, getCellCount, getCellsWithTag, MovementTag } from '../src';
import { cellAt } from './fixtures';

const bounds: Box3 = [
    [0, -512, 0],
    [600, 512, 300],
];

const settings = { bounds, cellSize: 100 };

describe('generateGrid', () => {
    test('generates cells, edges and drops', () => {
        const world = createBoxWorld();
        addSolid(world, [-100, -50, -100], [700, 0, 400]);
        addSolid(world, [-100, 0, -100], [201, 300, 400]);

        const { grid, buildContext } = generateGrid(createBoxWorldProbe(world), settings);

        expect(getCellCount(grid)).toBe(15);
        expect(getCellsWithTag(grid, CellTag.EDGE)).toHaveLength(14);
        expect(cellAt(grid, 1, 1, 300).connections.map((connection) => connection.movementTag)).toEqual([MovementTag.DROP]);

        expect(buildContext.times.map((time) => time.name)).toEqual([
            'generate cells',
            'assign edge cells',
            'assign droppable cells',
            'grid generation',
        ]);
        expect(buildContext.logs[buildContext.logs.length - 1]).toEqual({
            type: 'info',
            message: "generated grid 'main' with 15 cells.",
        });
    });

    test('skips drops and adds jumps when asked', () => {
        const world = createBoxWorld();
        addSolid(world, [-100, -50, -100], [201, 0, 400]);
        addSolid(world, [399, -50, -100], [800, 0, 400]);

        const { grid, buildContext } = generateGrid(createBoxWorldProbe(world), settings, {
            drops: false,
            jumps: { horizontalSpeed: 300, verticalSpeed: 300, gravity: 800, generateFraction: 1 },
        });

        expect(cellAt(grid, 1, 1).connections.map((connection) => connection.cell)).toEqual([cellAt(grid, 4, 1)]);
        expect(buildContext.times.map((time) => time.name)).toEqual([
            'generate cells',
            'assign edge cells',
            'assign jumpable cells',
            'grid generation',
        ]);
    });

    test('warns when nothing is walkable', () => {
        const { grid, buildContext } = generateGrid(createBoxWorldProbe(createBoxWorld()), settings);

        expect(getCellCount(grid)).toBe(0);
        expect(buildContext.logs.filter((log) => log.type === 'warning')).toEqual([
            { type: 'warning', message: "generateGridCells: no walkable cells found in grid 'main'." },
        ]);
    });
});
