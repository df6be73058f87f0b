import type { Box3 } from 'mathcat';
import { vec3 } from 'mathcat';
import type { TerrainProbe } from '../probe';
import type { Grid, GridCell } from '../query/grid';
import { getAllCells, isOccupied, setOccupant, setOccupied } from '../query/grid-api';

const hasOccupantMoved = (cell: GridCell): boolean => {
    if (!cell.occupant || !cell.occupantPose) return true;

    const { pose } = cell.occupant;

    return !vec3.equals(pose.position, cell.occupantPose.position) || pose.yaw !== cell.occupantPose.yaw;
};

/**
 * Tests whether a mover carrying `tag` stands inside the cell's clearance volume.
 * Cells whose recorded occupant hasn't moved since the last test keep their state without probing.
 */
export const testCellOccupancy = (grid: Grid, probe: TerrainProbe, cell: GridCell, tag: string): boolean => {
    if (!hasOccupantMoved(cell)) return isOccupied(cell);

    const { widthClearance, heightClearance } = grid.settings;

    const box: Box3 = [
        [-widthClearance, 0, -widthClearance],
        [widthClearance, heightClearance, widthClearance],
    ];

    const result = probe.boxProbe(box, cell.position, cell.position, { moversOnly: true, tag });

    setOccupant(cell, result.hit ? result.occupant : null);

    return result.hit;
};

/**
 * Marks every cell occupied or free depending on whether a mover carrying `tag` stands on it.
 * Meant to run periodically, searches running in between may read stale occupancy.
 */
export const checkOccupancy = (grid: Grid, probe: TerrainProbe, tag: string): void => {
    for (const cell of getAllCells(grid)) {
        setOccupied(cell, testCellOccupancy(grid, probe, cell, tag));
    }
};
