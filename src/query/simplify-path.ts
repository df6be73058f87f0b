import { lineOfSight } from './line-of-sight';
import type { GridPath } from './path-builder';

/**
 * Removes waypoints a mover can skip by walking in a straight line.
 *
 * A window of `segmentSize` waypoints slides along the path, and when the window's first and last
 * waypoints have line of sight everything between them is removed.
 * Repeats for `iterations` passes, or until a pass changes nothing.
 * The first and last waypoints are always kept.
 */
export const simplifyPath = (path: GridPath, segmentSize = 2, iterations = 8): GridPath => {
    const { nodes, builder } = path;
    const { pathCreator } = builder.options;

    for (let iteration = 0; iteration < iterations; iteration++) {
        let changed = false;
        let segmentStart = 0;

        while (nodes.length > 2) {
            const segmentEnd = Math.min(segmentStart + segmentSize, nodes.length - 1);

            if (segmentEnd - segmentStart < 2) break;

            const end = nodes[segmentEnd];

            if (lineOfSight(builder.grid, nodes[segmentStart].cell, end.cell, pathCreator)) {
                nodes.splice(segmentStart + 1, segmentEnd - segmentStart - 1);

                // reached by walking now
                end.movementTag = null;
                changed = true;
            }

            if (nodes.indexOf(end) === nodes.length - 1) break;

            segmentStart++;
        }

        if (!changed) break;
    }

    return path;
};
