import { vec3 } from 'mathcat';
import {
    createEmptyPath,
    getCellAtPosition,
    getNearestCell,
    type Grid,
    type GridCell,
    type GridPath,
    isPathEmpty,
    MovementTag,
    type Mover,
    type PathBuilder,
    runPathBuilder,
} from 'gridnav';

export type PathFollowerOptions = {
    /** seconds between checks for whether the path needs to be traced again */
    retraceInterval: number;

    /** remaining path length above which the mover should run */
    runDistance: number;

    /** distance from the current waypoint, in cells, after which the mover counts as lost */
    strayDistance: number;
};

export const DEFAULT_PATH_FOLLOWER_OPTIONS: PathFollowerOptions = {
    retraceInterval: 0.1,
    runDistance: 200,
    strayDistance: 1.42,
};

export type PathFollower = {
    mover: Mover;
    builder: PathBuilder;
    options: PathFollowerOptions;

    /** the cell the mover is heading to */
    target: GridCell | null;

    /** the path being followed */
    path: GridPath;

    /** index of the waypoint the mover is heading to */
    currentIndex: number;

    /** whether the mover reached its target */
    arrived: boolean;

    /** seconds since the path was last checked */
    timeSinceRetrace: number;

    /** the retrace in progress, if any */
    pendingRetrace: Promise<boolean> | null;

    /** aborts the search in progress */
    abortController: AbortController | null;
};

export const createPathFollower = (
    mover: Mover,
    builder: PathBuilder,
    options: Partial<PathFollowerOptions> = {},
): PathFollower => ({
    mover,
    builder,
    options: { ...DEFAULT_PATH_FOLLOWER_OPTIONS, ...options },
    target: null,
    path: createEmptyPath(builder),
    currentIndex: 0,
    arrived: false,
    timeSinceRetrace: 0,
    pendingRetrace: null,
    abortController: null,
});

const getGrid = (follower: PathFollower): Grid => follower.builder.grid;

/** the cell under the mover, or the nearest one when it is off the grid */
export const getCurrentCell = (follower: PathFollower): GridCell | null => {
    const grid = getGrid(follower);
    const position = follower.mover.pose.position;

    return getCellAtPosition(grid, position) ?? getNearestCell(grid, position);
};

/** the waypoint the mover is heading to */
export const getCurrentWaypoint = (follower: PathFollower): GridCell | null => {
    return follower.path.nodes[follower.currentIndex]?.cell ?? null;
};

/** how the mover should travel to its current waypoint, null for walking */
export const getNextMovementTag = (follower: PathFollower): string | null => {
    return follower.path.nodes[follower.currentIndex]?.movementTag ?? null;
};

/** distance left to travel along the path, from the mover through the remaining waypoints */
export const getRemainingDistance = (follower: PathFollower): number => {
    const nodes = follower.path.nodes;
    const waypoint = getCurrentWaypoint(follower);
    if (!waypoint) return 0;

    let distance = vec3.distance(follower.mover.pose.position, waypoint.position);

    for (let i = follower.currentIndex + 1; i < nodes.length; i++) {
        distance += vec3.distance(nodes[i - 1].cell.position, nodes[i].cell.position);
    }

    return distance;
};

/** whether the mover has a long way to go, and isn't about to drop down a ledge */
export const isRunning = (follower: PathFollower): boolean => {
    if (isPathEmpty(follower.path)) return false;

    return getRemainingDistance(follower) > follower.options.runDistance && getNextMovementTag(follower) !== MovementTag.DROP;
};

/** stops following the current path */
export const stopPathFollower = (follower: PathFollower): void => {
    follower.abortController?.abort();
    follower.abortController = null;
    follower.path = createEmptyPath(follower.builder);
    follower.currentIndex = 0;
};

/**
 * Finds a path from the mover's cell to a target cell and starts following it.
 * @returns false when the target is missing, the mover is already there, or no path was found
 */
export const navigateTo = async (follower: PathFollower, target: GridCell | null): Promise<boolean> => {
    if (!target) return false;

    const start = getCurrentCell(follower);
    if (!start || start === target) return false;

    follower.abortController?.abort();
    const abortController = new AbortController();
    follower.abortController = abortController;

    follower.target = target;
    follower.arrived = false;

    const path = await runPathBuilder(follower.builder, start, target, abortController.signal);

    // superseded by a newer request
    if (follower.abortController !== abortController) return false;

    follower.abortController = null;

    if (isPathEmpty(path)) return false;

    follower.path = path;
    follower.currentIndex = 0;
    follower.timeSinceRetrace = 0;

    return true;
};

const needsRetrace = (follower: PathFollower): boolean => {
    if (!follower.target) return false;

    const nodes = follower.path.nodes;
    const pathTarget = nodes[nodes.length - 1]?.cell;

    if (pathTarget !== follower.target) return true;

    const waypoint = getCurrentWaypoint(follower);
    if (!waypoint) return false;

    const strayDistance = follower.options.strayDistance * getGrid(follower).settings.cellSize;

    return vec3.squaredDistance(follower.mover.pose.position, waypoint.position) > strayDistance * strayDistance;
};

/**
 * Advances the follower along its path.
 *
 * Moves on to the next waypoint once the mover is within half a cell and a step of the current one,
 * and flags arrival at the end of the path.
 * Every `retraceInterval` seconds the path is traced again if the target changed or the mover strayed from it.
 */
export const updatePathFollower = (follower: PathFollower, deltaTime: number): void => {
    if (follower.arrived || !follower.target) return;

    const grid = getGrid(follower);
    const { cellSize, stepSize } = grid.settings;

    follower.timeSinceRetrace += deltaTime;

    if (follower.timeSinceRetrace >= follower.options.retraceInterval) {
        follower.timeSinceRetrace = 0;

        if (!follower.pendingRetrace && needsRetrace(follower)) {
            follower.pendingRetrace = navigateTo(follower, follower.target).finally(() => {
                follower.pendingRetrace = null;
            });
        }
    }

    if (isPathEmpty(follower.path)) return;

    const waypoint = getCurrentWaypoint(follower);
    const tolerance = cellSize / 2 + stepSize;

    if (waypoint && vec3.squaredDistance(follower.mover.pose.position, waypoint.position) <= tolerance * tolerance) {
        follower.currentIndex++;
    }

    const next = getCurrentWaypoint(follower);

    if (!next || getCurrentCell(follower) === follower.target) {
        follower.arrived = true;
        stopPathFollower(follower);
    }
};
