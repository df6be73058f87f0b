import type { Vec2 } from 'mathcat';
import { vec3 } from 'mathcat';
import type { TerrainProbe } from '../probe';
import type { Grid } from '../query/grid';
import { addCell, coordinatesToPosition, getGridSize } from '../query/grid-api';
import { BuildContext, type BuildContextState } from './build-context';
import { getGridProbeFilter, tryCreateCell } from './cell-factory';

const _gridSize: Vec2 = [0, 0];
const _columnCoordinates: Vec2 = [0, 0];
const _columnTop = vec3.create();
const _columnBottom = vec3.create();
const _cellPosition = vec3.create();

/**
 * Scans every column of the grid from the top of its bounds down, and tries to create a cell
 * on every floor the column passes through, so bridges and floors above each other get stacked cells.
 *
 * Cells are added top down, so the upper floors come first in each stack.
 */
export const generateGridCells = (ctx: BuildContextState, grid: Grid, probe: TerrainProbe): void => {
    const { bounds, origin } = grid.settings;
    const filter = getGridProbeFilter(grid);

    const top = origin[1] + bounds[1][1];
    const bottom = origin[1] + bounds[0][1];

    getGridSize(_gridSize, grid);

    let created = 0;
    let rejected = 0;

    for (let x = 0; x < _gridSize[0]; x++) {
        for (let y = 0; y < _gridSize[1]; y++) {
            _columnCoordinates[0] = x;
            _columnCoordinates[1] = y;

            coordinatesToPosition(_columnTop, grid, _columnCoordinates, top);
            coordinatesToPosition(_columnBottom, grid, _columnCoordinates, bottom);

            while (_columnTop[1] >= bottom) {
                const result = probe.rayProbe(_columnTop, _columnBottom, filter);

                // inside solid geometry, keep moving down until out of it
                if (result.startedSolid) {
                    _columnTop[1] -= grid.realStepSize;
                    continue;
                }

                if (!result.hit) break;

                vec3.set(_cellPosition, _columnTop[0], result.position[1], _columnTop[2]);

                const cell = tryCreateCell(grid, probe, _cellPosition);

                if (cell) {
                    addCell(grid, cell);
                    created++;
                } else {
                    rejected++;
                }

                _columnTop[1] = result.position[1] - grid.realStepSize;
            }
        }
    }

    BuildContext.log(ctx, `generateGridCells: created ${created} cells, rejected ${rejected} surfaces.`);

    if (created === 0) {
        BuildContext.warn(ctx, `generateGridCells: no walkable cells found in grid '${grid.identifier}'.`);
    }
};
