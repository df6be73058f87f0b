import {
    type AssignJumpableCellsOptions,
    assignDroppableCells,
    assignEdgeCells,
    assignJumpableCells,
    BuildContext,
    type BuildContextState,
    createGrid,
    type Grid,
    type GridParams,
    generateGridCells,
    getCellCount,
    type TerrainProbe,
} from 'gridnav';

export type GenerateGridOptions = {
    /** cells with fewer neighbours than this are tagged as edges */
    maxNeighbourCount: number;

    /** whether to connect ledges to the cells below them */
    drops: boolean;

    /** jump connections to generate, if any */
    jumps: AssignJumpableCellsOptions | null;
};

export const DEFAULT_GENERATE_GRID_OPTIONS: GenerateGridOptions = {
    maxNeighbourCount: 8,
    drops: true,
    jumps: null,
};

export type GenerateGridResult = {
    grid: Grid;
    buildContext: BuildContextState;
};

export function generateGrid(
    probe: TerrainProbe,
    settings: GridParams,
    options: Partial<GenerateGridOptions> = {},
): GenerateGridResult {
    const { maxNeighbourCount, drops, jumps } = { ...DEFAULT_GENERATE_GRID_OPTIONS, ...options };

    /* 1. create build context and grid */

    const ctx = BuildContext.create();

    BuildContext.start(ctx, 'grid generation');

    const grid = createGrid(settings);

    /* 2. sample the terrain into cells */

    BuildContext.start(ctx, 'generate cells');

    generateGridCells(ctx, grid, probe);

    BuildContext.end(ctx, 'generate cells');

    /* 3. tag edges, where drops and jumps start from */

    BuildContext.start(ctx, 'assign edge cells');

    assignEdgeCells(grid, maxNeighbourCount);

    BuildContext.end(ctx, 'assign edge cells');

    /* 4. connect ledges to the cells below */

    if (drops) {
        BuildContext.start(ctx, 'assign droppable cells');

        assignDroppableCells(grid, probe);

        BuildContext.end(ctx, 'assign droppable cells');
    }

    /* 5. connect gaps that can be jumped */

    if (jumps) {
        BuildContext.start(ctx, 'assign jumpable cells');

        assignJumpableCells(grid, probe, jumps);

        BuildContext.end(ctx, 'assign jumpable cells');
    }

    BuildContext.end(ctx, 'grid generation');

    BuildContext.log(ctx, `generated grid '${grid.identifier}' with ${getCellCount(grid)} cells.`);

    return { grid, buildContext: ctx };
}
