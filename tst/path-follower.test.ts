import { vec3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import {
    createPathFollower,
    getCurrentCell,
    getCurrentWaypoint,
    getNextMovementTag,
    getRemainingDistance,
    isRunning,
    navigateTo,
    stopPathFollower,
    updatePathFollower,
} from '../blocks';
import { createPathBuilder, MovementTag } from '../src';
import { cellAt, coordinatesOf, createFlatGrid, createMover, occupy } from './fixtures';

const setup = (size = 5) => {
    const grid = createFlatGrid(size);
    const mover = createMover('runner', [50, 0, 50]);
    const follower = createPathFollower(mover, createPathBuilder(grid));

    return { grid, mover, follower };
};

describe('navigateTo', () => {
    test('does nothing without a target', async () => {
        const { follower } = setup();

        await expect(navigateTo(follower, null)).resolves.toBe(false);
        expect(follower.target).toBeNull();
    });

    test('does nothing when the mover is already at the target', async () => {
        const { grid, follower } = setup();

        await expect(navigateTo(follower, cellAt(grid, 0, 0))).resolves.toBe(false);
    });

    test('follows a path to the target', async () => {
        const { grid, follower } = setup();

        await expect(navigateTo(follower, cellAt(grid, 4, 4))).resolves.toBe(true);

        expect(getCurrentCell(follower)).toBe(cellAt(grid, 0, 0));
        expect(follower.target).toBe(cellAt(grid, 4, 4));
        expect(coordinatesOf(follower.path.nodes.map((node) => node.cell))).toEqual([
            [0, 0],
            [4, 4],
        ]);
        expect(getCurrentWaypoint(follower)).toBe(cellAt(grid, 0, 0));
    });

    test('fails when the target is unreachable', async () => {
        const { grid, follower } = setup();
        for (let y = 0; y < 5; y++) occupy(cellAt(grid, 2, y));

        await expect(navigateTo(follower, cellAt(grid, 4, 4))).resolves.toBe(false);
        expect(follower.path.nodes).toHaveLength(0);
    });

    test('a newer request supersedes an older one', async () => {
        const { grid, follower } = setup();

        const first = navigateTo(follower, cellAt(grid, 4, 4));
        const second = navigateTo(follower, cellAt(grid, 4, 0));

        await expect(first).resolves.toBe(false);
        await expect(second).resolves.toBe(true);

        expect(follower.target).toBe(cellAt(grid, 4, 0));
        expect(follower.path.nodes[follower.path.nodes.length - 1].cell).toBe(cellAt(grid, 4, 0));
    });
});

describe('updatePathFollower', () => {
    test('advances through waypoints and arrives', async () => {
        const { grid, mover, follower } = setup();

        await navigateTo(follower, cellAt(grid, 4, 4));

        updatePathFollower(follower, 0.016);

        expect(follower.currentIndex).toBe(1);
        expect(getCurrentWaypoint(follower)).toBe(cellAt(grid, 4, 4));
        expect(follower.arrived).toBe(false);

        vec3.set(mover.pose.position, 450, 0, 450);
        updatePathFollower(follower, 0.016);

        expect(follower.arrived).toBe(true);
        expect(follower.path.nodes).toHaveLength(0);
    });

    test('retraces when the target changes', async () => {
        const { grid, follower } = setup();

        await navigateTo(follower, cellAt(grid, 4, 4));

        follower.target = cellAt(grid, 4, 0);
        updatePathFollower(follower, 0.2);

        expect(follower.pendingRetrace).not.toBeNull();
        await expect(follower.pendingRetrace).resolves.toBe(true);

        expect(follower.pendingRetrace).toBeNull();
        expect(coordinatesOf(follower.path.nodes.map((node) => node.cell))).toEqual([
            [0, 0],
            [4, 0],
        ]);
    });

    test('waits for the retrace interval', async () => {
        const { grid, follower } = setup();

        await navigateTo(follower, cellAt(grid, 4, 4));

        follower.target = cellAt(grid, 4, 0);
        updatePathFollower(follower, 0.05);

        expect(follower.pendingRetrace).toBeNull();
        expect(follower.timeSinceRetrace).toBe(0.05);
    });
});

describe('path follower state', () => {
    test('runs while far from the target', async () => {
        const { grid, follower } = setup();

        await navigateTo(follower, cellAt(grid, 4, 4));

        expect(getRemainingDistance(follower)).toBeCloseTo(400 * Math.SQRT2);
        expect(isRunning(follower)).toBe(true);

        stopPathFollower(follower);

        expect(getRemainingDistance(follower)).toBe(0);
        expect(isRunning(follower)).toBe(false);
    });

    test('walks towards a drop', () => {
        const { grid, follower } = setup();

        follower.path = {
            builder: follower.builder,
            nodes: [
                { cell: cellAt(grid, 0, 0), movementTag: null },
                { cell: cellAt(grid, 4, 0), movementTag: MovementTag.DROP },
            ],
        };
        follower.currentIndex = 1;

        expect(getNextMovementTag(follower)).toBe(MovementTag.DROP);
        expect(getRemainingDistance(follower)).toBe(400);
        expect(isRunning(follower)).toBe(false);
    });

    test('walks when close to the target', async () => {
        const { grid, follower } = setup();

        await navigateTo(follower, cellAt(grid, 1, 0));

        expect(getRemainingDistance(follower)).toBe(100);
        expect(isRunning(follower)).toBe(false);
    });
});
