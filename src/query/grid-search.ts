import { setImmediate } from 'node:timers/promises';
import { vec3 } from 'mathcat';
import type { Grid, GridCell, Mover } from './grid';
import { getNeighbours, getNeighboursAndConnections, isBlockedFor } from './grid-api';

export const NODE_FLAG_OPEN = 0x01;
export const NODE_FLAG_CLOSED = 0x02;

export type SearchNode = {
    /** the cell this node wraps */
    cell: GridCell;
    /** the movement tag of the edge used to reach this node */
    movementTag: string | null;
    /** the cost up to this node */
    cost: number;
    /** the estimated cost from this node to the target */
    heuristic: number;
    /** cost + heuristic */
    total: number;
    /** the node this node was reached from */
    parent: SearchNode | null;
    /** node flags */
    flags: number;
};

export type SearchNodePool = Map<GridCell, SearchNode>;

export type SearchNodeQueue = SearchNode[];

/** moves `node` from slot `i` toward the root until its parent is no more expensive */
export const bubbleUpQueue = (queue: SearchNodeQueue, i: number, node: SearchNode) => {
    let slot = i;

    while (slot > 0) {
        const parentSlot = (slot - 1) >> 1;
        const parent = queue[parentSlot];
        if (parent.total <= node.total) break;

        queue[slot] = parent;
        slot = parentSlot;
    }

    queue[slot] = node;
};

/** moves `node` from slot `i` toward the leaves until both children are at least as expensive */
export const trickleDownQueue = (queue: SearchNodeQueue, i: number, node: SearchNode) => {
    const size = queue.length;
    let slot = i;

    for (;;) {
        const left = slot * 2 + 1;
        if (left >= size) break;

        const right = left + 1;
        const cheapest = right < size && queue[right].total < queue[left].total ? right : left;
        if (node.total <= queue[cheapest].total) break;

        queue[slot] = queue[cheapest];
        slot = cheapest;
    }

    queue[slot] = node;
};

export const pushNodeToQueue = (queue: SearchNodeQueue, node: SearchNode): void => {
    queue.push(node);
    bubbleUpQueue(queue, queue.length - 1, node);
};

export const popNodeFromQueue = (queue: SearchNodeQueue): SearchNode | undefined => {
    const top = queue[0];
    const tail = queue.pop();

    if (tail === undefined || tail === top) {
        return tail;
    }

    trickleDownQueue(queue, 0, tail);

    return top;
};

export const reindexNodeInQueue = (queue: SearchNodeQueue, node: SearchNode): void => {
    const i = queue.indexOf(node);
    if (i !== -1) {
        bubbleUpQueue(queue, i, node);
    }
};

export type FindCellPathOptions = {
    /** cells occupied by this mover are not treated as blocked */
    pathCreator?: Mover | null;

    /** also expand drop, jump and other connections, not just plain neighbours */
    includeConnections?: boolean;

    /** return a path to the closest explored cell when the target cannot be reached */
    partial?: boolean;

    /** cells whose path cost from the start exceeds this are not explored */
    maxDistance?: number;

    /** return the path from target to start, movement tags stay on the nodes they were recorded for */
    reversed?: boolean;

    /** aborting the signal stops the search with an empty result */
    signal?: AbortSignal;
};

export enum FindCellPathResultFlags {
    NONE = 0,
    SUCCESS = 1 << 0,
    COMPLETE_PATH = 1 << 1,
    PARTIAL_PATH = 1 << 2,
    INVALID_INPUT = 1 << 3,
    CANCELLED = 1 << 4,
}

export type PathNode = {
    cell: GridCell;
    /** how the edge into this cell is traversed, null for walking and for the first node */
    movementTag: string | null;
};

export type FindCellPathResult = {
    /** whether the search produced a complete or partial path */
    success: boolean;

    /** the result status flags */
    flags: FindCellPathResultFlags;

    /** the path, starting with the start cell unless reversed */
    path: PathNode[];
};

export enum SlicedFindCellPathStatusFlags {
    NOT_INITIALIZED = 0,
    IN_PROGRESS = 1,
    SUCCESS = 2,
    PARTIAL_RESULT = 4,
    FAILURE = 8,
    INVALID_PARAM = 16,
    CANCELLED = 32,
}

export type SlicedCellPathQuery = {
    status: SlicedFindCellPathStatusFlags;

    // search parameters
    start: GridCell | null;
    target: GridCell | null;
    pathCreator: Mover | null;
    includeConnections: boolean;
    partial: boolean;
    maxDistance: number;
    reversed: boolean;
    signal: AbortSignal | null;

    // search state
    nodes: SearchNodePool;
    openList: SearchNodeQueue;
    lastBestNode: SearchNode | null;
    lastBestNodeCost: number;
};

/**
 * Creates a new sliced path query object with default values.
 * @returns A new sliced path query ready for initialization
 */
export const createSlicedCellPathQuery = (): SlicedCellPathQuery => ({
    status: SlicedFindCellPathStatusFlags.NOT_INITIALIZED,
    start: null,
    target: null,
    pathCreator: null,
    includeConnections: false,
    partial: false,
    maxDistance: Infinity,
    reversed: false,
    signal: null,
    nodes: new Map(),
    openList: [],
    lastBestNode: null,
    lastBestNodeCost: Infinity,
});

/**
 * Initializes a sliced path query.
 * @returns The status of the initialization
 */
export const initSlicedFindCellPath = (
    query: SlicedCellPathQuery,
    start: GridCell | null | undefined,
    target: GridCell | null | undefined,
    options: FindCellPathOptions = {},
): SlicedFindCellPathStatusFlags => {
    // set search parameters
    query.start = start ?? null;
    query.target = target ?? null;
    query.pathCreator = options.pathCreator ?? null;
    query.includeConnections = options.includeConnections ?? false;
    query.partial = options.partial ?? false;
    query.maxDistance = options.maxDistance ?? Infinity;
    query.reversed = options.reversed ?? false;
    query.signal = options.signal ?? null;

    // reset search state
    query.nodes = new Map();
    query.openList = [];
    query.lastBestNode = null;
    query.lastBestNodeCost = Infinity;

    // validate input
    if (!start || !target) {
        query.status = SlicedFindCellPathStatusFlags.FAILURE | SlicedFindCellPathStatusFlags.INVALID_PARAM;
        return query.status;
    }

    const heuristic = vec3.distance(start.position, target.position);

    const startNode: SearchNode = {
        cell: start,
        movementTag: null,
        cost: 0,
        heuristic,
        total: heuristic,
        parent: null,
        flags: NODE_FLAG_OPEN,
    };

    query.nodes.set(start, startNode);
    query.lastBestNode = startNode;
    query.lastBestNodeCost = heuristic;

    // early exit if the start is the target
    if (start === target) {
        startNode.flags = NODE_FLAG_CLOSED;
        query.status = SlicedFindCellPathStatusFlags.SUCCESS;
        return query.status;
    }

    pushNodeToQueue(query.openList, startNode);
    query.status = SlicedFindCellPathStatusFlags.IN_PROGRESS;

    return query.status;
};

/**
 * Updates an in-progress sliced path query.
 * The abort signal is checked before every expansion.
 *
 * @param maxIterations The maximum number of nodes to expand
 * @returns iterations performed
 */
export const updateSlicedFindCellPath = (grid: Grid, query: SlicedCellPathQuery, maxIterations: number): number => {
    let itersDone = 0;

    // check if query is in valid state
    if (!(query.status & SlicedFindCellPathStatusFlags.IN_PROGRESS) || !query.target) {
        return itersDone;
    }

    const target = query.target;

    while (itersDone < maxIterations && query.openList.length > 0) {
        if (query.signal?.aborted) {
            query.status = SlicedFindCellPathStatusFlags.CANCELLED;
            return itersDone;
        }

        itersDone++;

        // remove best node from open list and close it
        const bestNode = popNodeFromQueue(query.openList);
        if (!bestNode) break;

        bestNode.flags &= ~NODE_FLAG_OPEN;
        bestNode.flags |= NODE_FLAG_CLOSED;

        // check if we've reached the goal
        if (bestNode.cell === target) {
            query.lastBestNode = bestNode;
            query.status = SlicedFindCellPathStatusFlags.SUCCESS;
            return itersDone;
        }

        const edges = query.includeConnections
            ? getNeighboursAndConnections(grid, bestNode.cell)
            : getNeighbours(grid, bestNode.cell).map((cell) => ({ cell, movementTag: null }));

        for (const edge of edges) {
            const neighbour = edge.cell;

            if (isBlockedFor(neighbour, query.pathCreator)) continue;

            let neighbourNode = query.nodes.get(neighbour);

            if (neighbourNode && neighbourNode.flags & NODE_FLAG_CLOSED) continue;

            const cost = bestNode.cost + vec3.distance(bestNode.cell.position, neighbour.position);

            if (cost > query.maxDistance) continue;

            // already queued with an equal or cheaper route
            if (neighbourNode && cost >= neighbourNode.cost) continue;

            if (!neighbourNode) {
                neighbourNode = {
                    cell: neighbour,
                    movementTag: null,
                    cost: 0,
                    heuristic: vec3.distance(neighbour.position, target.position),
                    total: 0,
                    parent: null,
                    flags: 0,
                };

                query.nodes.set(neighbour, neighbourNode);
            }

            neighbourNode.cost = cost;
            neighbourNode.total = cost + neighbourNode.heuristic;
            neighbourNode.parent = bestNode;
            neighbourNode.movementTag = edge.movementTag;

            if (neighbourNode.flags & NODE_FLAG_OPEN) {
                reindexNodeInQueue(query.openList, neighbourNode);
            } else {
                neighbourNode.flags |= NODE_FLAG_OPEN;
                pushNodeToQueue(query.openList, neighbourNode);
            }

            // update nearest node to target so far
            if (neighbourNode.heuristic < query.lastBestNodeCost) {
                query.lastBestNode = neighbourNode;
                query.lastBestNodeCost = neighbourNode.heuristic;
            }
        }
    }

    // check if the search is exhausted
    if (query.openList.length === 0) {
        query.status =
            query.partial && query.lastBestNode
                ? SlicedFindCellPathStatusFlags.PARTIAL_RESULT
                : SlicedFindCellPathStatusFlags.FAILURE;
    }

    return itersDone;
};

const retracePath = (node: SearchNode): PathNode[] => {
    const path: PathNode[] = [];
    let current: SearchNode | null = node;

    while (current) {
        path.push({ cell: current.cell, movementTag: current.movementTag });
        current = current.parent;
    }

    path.reverse();

    return path;
};

/**
 * Finalizes and returns the results of a sliced path query.
 * A query that is still in progress is treated as unreachable.
 */
export const finalizeSlicedFindCellPath = (query: SlicedCellPathQuery): FindCellPathResult => {
    const status = query.status;

    // reset query
    query.status = SlicedFindCellPathStatusFlags.NOT_INITIALIZED;

    if (status & SlicedFindCellPathStatusFlags.INVALID_PARAM) {
        return { success: false, flags: FindCellPathResultFlags.INVALID_INPUT, path: [] };
    }

    if (status & SlicedFindCellPathStatusFlags.CANCELLED) {
        return { success: false, flags: FindCellPathResultFlags.CANCELLED, path: [] };
    }

    let path: PathNode[];
    let flags: FindCellPathResultFlags;

    if (status & SlicedFindCellPathStatusFlags.SUCCESS && query.lastBestNode) {
        path = retracePath(query.lastBestNode);
        flags = FindCellPathResultFlags.SUCCESS | FindCellPathResultFlags.COMPLETE_PATH;
    } else if (query.partial && query.lastBestNode) {
        // exhausted, or finalized while still in progress
        path = retracePath(query.lastBestNode);
        flags = FindCellPathResultFlags.SUCCESS | FindCellPathResultFlags.PARTIAL_PATH;
    } else {
        return { success: false, flags: FindCellPathResultFlags.NONE, path: [] };
    }

    if (query.reversed) {
        path.reverse();
    }

    return { success: true, flags, path };
};

/**
 * Find a path between two cells with A*, using the straight line distance between cell centers
 * as both the step cost and the heuristic.
 *
 * When the target cannot be reached the result is empty, unless `partial` is set,
 * in which case the path leads to the explored cell closest to the target.
 *
 * @param grid the grid to search
 * @param start the starting cell
 * @param target the target cell
 * @param options search options
 * @returns The result of the pathfinding operation.
 */
export const findCellPath = (
    grid: Grid,
    start: GridCell | null | undefined,
    target: GridCell | null | undefined,
    options: FindCellPathOptions = {},
): FindCellPathResult => {
    const query = createSlicedCellPathQuery();

    initSlicedFindCellPath(query, start, target, options);

    while (query.status & SlicedFindCellPathStatusFlags.IN_PROGRESS) {
        updateSlicedFindCellPath(grid, query, Number.MAX_SAFE_INTEGER);
    }

    return finalizeSlicedFindCellPath(query);
};

export const DEFAULT_ITERATIONS_PER_SLICE = 256;

/**
 * Runs a search in slices of `iterationsPerSlice` expansions, yielding to the event loop between slices
 * so the caller's loop keeps running while the search is in progress.
 *
 * Aborting `options.signal` resolves with an empty, `CANCELLED` result.
 */
export const findCellPathAsync = async (
    grid: Grid,
    start: GridCell | null | undefined,
    target: GridCell | null | undefined,
    options: FindCellPathOptions = {},
    iterationsPerSlice = DEFAULT_ITERATIONS_PER_SLICE,
): Promise<FindCellPathResult> => {
    const query = createSlicedCellPathQuery();

    initSlicedFindCellPath(query, start, target, options);

    while (query.status & SlicedFindCellPathStatusFlags.IN_PROGRESS) {
        updateSlicedFindCellPath(grid, query, iterationsPerSlice);

        if (query.status & SlicedFindCellPathStatusFlags.IN_PROGRESS) {
            await setImmediate();
        }
    }

    return finalizeSlicedFindCellPath(query);
};

/**
 * Searches from start to target and from target to start at the same time, over plain neighbours only,
 * and returns whichever finishes first, ordered from start to target. The slower search is aborted.
 *
 * The backward search only wins with a complete path. Otherwise the forward result is returned,
 * so partial paths always begin at the start cell.
 */
export const findCellPathRace = async (
    grid: Grid,
    start: GridCell | null | undefined,
    target: GridCell | null | undefined,
    options: Omit<FindCellPathOptions, 'reversed' | 'includeConnections'> = {},
    iterationsPerSlice = DEFAULT_ITERATIONS_PER_SLICE,
): Promise<FindCellPathResult> => {
    const forwardController = new AbortController();
    const backwardController = new AbortController();

    const parentSignal = options.signal;
    const onParentAbort = () => {
        forwardController.abort();
        backwardController.abort();
    };

    if (parentSignal?.aborted) {
        onParentAbort();
    } else {
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    const forward = findCellPathAsync(
        grid,
        start,
        target,
        { ...options, reversed: false, signal: forwardController.signal },
        iterationsPerSlice,
    ).then((result) => {
        backwardController.abort();
        return result;
    });

    // searching from the target, reversed so the path still leads from start to target
    const backward = findCellPathAsync(
        grid,
        target,
        start,
        { ...options, reversed: true, signal: backwardController.signal },
        iterationsPerSlice,
    ).then((result): FindCellPathResult | Promise<FindCellPathResult> => {
        // a partial backward path ends at the target but does not reach the start, so defer to the forward search
        if (!(result.flags & FindCellPathResultFlags.COMPLETE_PATH)) {
            return forward;
        }
        forwardController.abort();
        return result;
    });

    try {
        return await Promise.race([forward, backward]);
    } finally {
        parentSignal?.removeEventListener('abort', onParentAbort);
        await Promise.all([forward, backward]);
    }
};
