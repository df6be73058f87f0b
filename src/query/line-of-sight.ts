import { vec3 } from 'mathcat';
import type { Grid, GridCell, Mover } from './grid';
import { getNeighbourInDirection, isBlockedFor } from './grid-api';

const _lineOfSightDirection = vec3.create();

/**
 * Returns whether there is a direct, unoccupied walk from one cell to another.
 *
 * Steps cell to cell towards the end cell, re-aiming from each visited cell.
 * Fails as soon as a step has no touching neighbour or lands on a cell occupied by someone else.
 * The walk is bounded by the straight line distance in cells.
 *
 * @param pathCreator who the walk is for, cells occupied by this mover are ignored
 */
export const lineOfSight = (grid: Grid, start: GridCell, end: GridCell, pathCreator: Mover | null = null): boolean => {
    if (isBlockedFor(start, pathCreator)) return false;
    if (isBlockedFor(end, pathCreator)) return false;

    if (start === end) return true;

    const maxSteps = Math.ceil(vec3.distance(start.position, end.position) / grid.settings.cellSize);

    let lastCell = start;

    for (let i = 0; i < maxSteps; i++) {
        vec3.subtract(_lineOfSightDirection, end.position, lastCell.position);

        // only cells that touch lastCell are returned, so the walk cannot drift across gaps
        const next = getNeighbourInDirection(grid, lastCell, _lineOfSightDirection);

        if (!next) return false;
        if (next === end) return true;
        if (isBlockedFor(next, pathCreator)) return false;

        lastCell = next;
    }

    return false;
};
