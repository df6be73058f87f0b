import type { Grid } from './grid';

export type GridManager = {
    grids: Map<string, Grid>;
    /** called with every grid that is closed, either explicitly or because another grid replaced it */
    onClose: ((grid: Grid) => void) | null;
};

export const MAIN_GRID_IDENTIFIER = 'main';

export const createGridManager = (onClose: ((grid: Grid) => void) | null = null): GridManager => ({
    grids: new Map(),
    onClose,
});

/**
 * Registers a grid under its identifier.
 * A different grid already registered under the same identifier is closed first.
 */
export const openGrid = (manager: GridManager, grid: Grid): Grid => {
    const existing = manager.grids.get(grid.identifier);

    if (existing && existing !== grid) {
        closeGrid(manager, existing);
    }

    manager.grids.set(grid.identifier, grid);

    return grid;
};

/**
 * Unregisters a grid.
 * @returns whether the grid was registered
 */
export const closeGrid = (manager: GridManager, grid: Grid): boolean => {
    if (manager.grids.get(grid.identifier) !== grid) return false;

    manager.grids.delete(grid.identifier);
    manager.onClose?.(grid);

    return true;
};

export const getGrid = (manager: GridManager, identifier: string): Grid | null => {
    return manager.grids.get(identifier) ?? null;
};

export const getMainGrid = (manager: GridManager): Grid | null => getGrid(manager, MAIN_GRID_IDENTIFIER);

/**
 * Opens a grid for the duration of a callback, closing it again however the callback exits.
 */
export const withGrid = async <T>(manager: GridManager, grid: Grid, fn: (grid: Grid) => T | Promise<T>): Promise<T> => {
    openGrid(manager, grid);

    try {
        return await fn(grid);
    } finally {
        closeGrid(manager, grid);
    }
};

/** key a grid is saved under, unique per map */
export const getGridSaveKey = (grid: Grid, mapIdentifier: string): string => `${mapIdentifier}-${grid.identifier}`;
