import { vec3 } from 'mathcat';
import type { Grid, GridCell, Mover } from './grid';
import { DEFAULT_ITERATIONS_PER_SLICE, FindCellPathResultFlags, findCellPathAsync, type PathNode } from './grid-search';
import { simplifyPath } from './simplify-path';

export type PathBuilderOptions = {
    /** the mover the path is for, cells it occupies are not treated as blocked */
    pathCreator: Mover | null;

    /** return a path to the closest reachable cell when the target can't be reached */
    partial: boolean;

    /** cells further than this along the path from the start are not explored */
    maxDistance: number;

    /** also follow drop, jump and other connections */
    includeConnections: boolean;

    /** how many cells the search expands before yielding */
    iterationsPerSlice: number;

    /** whether to remove waypoints that can be skipped in a straight line */
    simplify: boolean;
};

export const DEFAULT_PATH_BUILDER_OPTIONS: PathBuilderOptions = {
    pathCreator: null,
    partial: false,
    maxDistance: Infinity,
    includeConnections: true,
    iterationsPerSlice: DEFAULT_ITERATIONS_PER_SLICE,
    simplify: true,
};

export type PathBuilder = {
    grid: Grid;
    options: PathBuilderOptions;
};

export type GridPath = {
    /** the builder the path was created with */
    builder: PathBuilder;

    /** waypoints from start to target */
    nodes: PathNode[];
};

export class InvalidPathRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidPathRequestError';
    }
}

export const createPathBuilder = (grid: Grid, options: Partial<PathBuilderOptions> = {}): PathBuilder => ({
    grid,
    options: { ...DEFAULT_PATH_BUILDER_OPTIONS, ...options },
});

export const createEmptyPath = (builder: PathBuilder): GridPath => ({ builder, nodes: [] });

export const isPathEmpty = (path: GridPath): boolean => path.nodes.length === 0;

/** sum of the distances between consecutive waypoints */
export const getPathLength = (path: GridPath): number => {
    let length = 0;

    for (let i = 1; i < path.nodes.length; i++) {
        length += vec3.distance(path.nodes[i - 1].cell.position, path.nodes[i].cell.position);
    }

    return length;
};

/**
 * Finds a path between two cells with the builder's options, then simplifies it.
 *
 * Unreachable targets and cancelled searches resolve with an empty path.
 *
 * @throws InvalidPathRequestError when the start or target cell is missing
 */
export const runPathBuilder = async (
    builder: PathBuilder,
    start: GridCell | null | undefined,
    target: GridCell | null | undefined,
    signal?: AbortSignal,
): Promise<GridPath> => {
    if (!start) throw new InvalidPathRequestError('path start cell is missing');
    if (!target) throw new InvalidPathRequestError('path target cell is missing');

    const { pathCreator, partial, maxDistance, includeConnections, iterationsPerSlice } = builder.options;

    const result = await findCellPathAsync(
        builder.grid,
        start,
        target,
        { pathCreator, partial, maxDistance, includeConnections, signal },
        iterationsPerSlice,
    );

    if (!result.success || result.flags & FindCellPathResultFlags.CANCELLED) {
        return createEmptyPath(builder);
    }

    const path: GridPath = { builder, nodes: result.path };

    if (builder.options.simplify) {
        simplifyPath(path);
    }

    return path;
};
