import { describe, expect, test } from 'vitest';
import {
    closeGrid,
    createGrid,
    createGridManager,
    getGrid,
    getGridSaveKey,
    getMainGrid,
    type Grid,
    openGrid,
    withGrid,
} from '../src';

describe('grid manager', () => {
    test('opens and looks up grids', () => {
        const manager = createGridManager();
        const main = openGrid(manager, createGrid());
        const upstairs = openGrid(manager, createGrid({ identifier: 'upstairs' }));

        expect(getMainGrid(manager)).toBe(main);
        expect(getGrid(manager, 'upstairs')).toBe(upstairs);
        expect(getGrid(manager, 'cellar')).toBeNull();
    });

    test('opening a grid replaces and closes the one with the same identifier', () => {
        const closed: Grid[] = [];
        const manager = createGridManager((grid) => closed.push(grid));

        const first = openGrid(manager, createGrid());
        const second = openGrid(manager, createGrid());

        expect(getMainGrid(manager)).toBe(second);
        expect(closed).toEqual([first]);

        openGrid(manager, second);
        expect(closed).toHaveLength(1);
    });

    test('closing a grid that is not open does nothing', () => {
        const closed: Grid[] = [];
        const manager = createGridManager((grid) => closed.push(grid));
        const grid = createGrid();

        expect(closeGrid(manager, grid)).toBe(false);

        openGrid(manager, grid);

        expect(closeGrid(manager, grid)).toBe(true);
        expect(closeGrid(manager, grid)).toBe(false);
        expect(closed).toEqual([grid]);
        expect(getMainGrid(manager)).toBeNull();
    });

    test('withGrid closes the grid after the callback', async () => {
        const manager = createGridManager();
        const grid = createGrid();

        const result = await withGrid(manager, grid, (opened) => {
            expect(getMainGrid(manager)).toBe(opened);
            return 42;
        });

        expect(result).toBe(42);
        expect(getMainGrid(manager)).toBeNull();
    });

    test('withGrid closes the grid when the callback throws', async () => {
        const manager = createGridManager();

        await expect(
            withGrid(manager, createGrid(), async () => {
                throw new Error('load failed');
            }),
        ).rejects.toThrow('load failed');

        expect(getMainGrid(manager)).toBeNull();
    });

    test('save keys are unique per map and grid', () => {
        expect(getGridSaveKey(createGrid(), 'harbour')).toBe('harbour-main');
        expect(getGridSaveKey(createGrid({ identifier: 'roof' }), 'harbour')).toBe('harbour-roof');
    });
});
