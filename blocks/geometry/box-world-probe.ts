import { type Box3, type Vec3, vec3 } from 'mathcat';
import type { BoxProbeResult, Mover, ProbeFilter, RayProbeResult, TerrainProbe } from 'gridnav';

export type BoxWorldSolid = {
    /** world space bounds */
    bounds: Box3;

    /** whether the solid is world geometry, rather than a static prop */
    world: boolean;
};

export type BoxWorldMover = {
    mover: Mover;

    /** bounds relative to the mover's position */
    bounds: Box3;

    tags: string[];
};

/**
 * A world made of axis aligned boxes, with movers that can stand in it.
 */
export type BoxWorld = {
    solids: BoxWorldSolid[];
    movers: BoxWorldMover[];
};

export const createBoxWorld = (): BoxWorld => ({
    solids: [],
    movers: [],
});

export const addSolid = (world: BoxWorld, min: Vec3, max: Vec3, isWorld = true): BoxWorldSolid => {
    const solid: BoxWorldSolid = { bounds: [vec3.clone(min), vec3.clone(max)], world: isWorld };
    world.solids.push(solid);
    return solid;
};

export const addMover = (world: BoxWorld, mover: Mover, bounds: Box3, tags: string[] = []): BoxWorldMover => {
    const entry: BoxWorldMover = { mover, bounds, tags };
    world.movers.push(entry);
    return entry;
};

export const removeMover = (world: BoxWorld, mover: Mover): void => {
    world.movers = world.movers.filter((entry) => entry.mover !== mover);
};

const EPSILON = 1e-8;

type SweepHit = {
    t: number;
    normal: Vec3;
};

/**
 * Intersects the segment from origin to end with a box.
 * Touching a face while moving along it doesn't count as a hit.
 *
 * @returns the entry fraction along the segment and the normal of the face entered, or null
 */
const intersectSegmentBox = (origin: Vec3, end: Vec3, min: Vec3, max: Vec3): SweepHit | null => {
    let tEnter = -Infinity;
    let tExit = Infinity;
    let enterAxis = -1;
    let enterSign = 0;

    for (let axis = 0; axis < 3; axis++) {
        const d = end[axis] - origin[axis];

        if (Math.abs(d) < EPSILON) {
            if (origin[axis] <= min[axis] || origin[axis] >= max[axis]) return null;
            continue;
        }

        let t1 = (min[axis] - origin[axis]) / d;
        let t2 = (max[axis] - origin[axis]) / d;

        if (t1 > t2) {
            const tmp = t1;
            t1 = t2;
            t2 = tmp;
        }

        if (t1 > tEnter) {
            tEnter = t1;
            enterAxis = axis;
            enterSign = d > 0 ? -1 : 1;
        }

        tExit = Math.min(tExit, t2);
    }

    if (enterAxis === -1) return null;
    if (tEnter > tExit || tEnter < 0 || tEnter > 1) return null;

    const normal = vec3.create();
    normal[enterAxis] = enterSign;

    return { t: tEnter, normal };
};

const isStrictlyInside = (point: Vec3, min: Vec3, max: Vec3): boolean => {
    return (
        point[0] > min[0] &&
        point[0] < max[0] &&
        point[1] > min[1] &&
        point[1] < max[1] &&
        point[2] > min[2] &&
        point[2] < max[2]
    );
};

type Target = {
    min: Vec3;
    max: Vec3;
    mover: Mover | null;
};

const getTargets = (world: BoxWorld, filter: ProbeFilter | undefined): Target[] => {
    const targets: Target[] = [];

    if (filter?.moversOnly) {
        for (const entry of world.movers) {
            if (filter.tag !== undefined && !entry.tags.includes(filter.tag)) continue;

            const position = entry.mover.pose.position;
            targets.push({
                min: vec3.add(vec3.create(), position, entry.bounds[0]),
                max: vec3.add(vec3.create(), position, entry.bounds[1]),
                mover: entry.mover,
            });
        }

        return targets;
    }

    for (const solid of world.solids) {
        if (filter?.worldOnly && !solid.world) continue;

        targets.push({ min: solid.bounds[0], max: solid.bounds[1], mover: null });
    }

    return targets;
};

const _sweepMin = vec3.create();
const _sweepMax = vec3.create();

/**
 * Creates a terrain probe over a box world.
 *
 * Static solids are probed by default, and only world solids with `worldOnly`.
 * Movers are only probed with `moversOnly`, optionally narrowed down to those carrying `tag`.
 */
export const createBoxWorldProbe = (world: BoxWorld): TerrainProbe => {
    const rayProbe = (origin: Vec3, end: Vec3, filter?: ProbeFilter): RayProbeResult => {
        let best: SweepHit | null = null;

        for (const target of getTargets(world, filter)) {
            if (isStrictlyInside(origin, target.min, target.max)) {
                return { hit: true, position: vec3.clone(origin), normal: [0, 0, 0], startedSolid: true };
            }

            const hit = intersectSegmentBox(origin, end, target.min, target.max);

            if (hit && (!best || hit.t < best.t)) {
                best = hit;
            }
        }

        if (!best) {
            return { hit: false, position: vec3.clone(end), normal: [0, 0, 0], startedSolid: false };
        }

        return {
            hit: true,
            position: vec3.lerp(vec3.create(), origin, end, best.t),
            normal: best.normal,
            startedSolid: false,
        };
    };

    const boxProbe = (box: Box3, start: Vec3, end: Vec3, filter?: ProbeFilter): BoxProbeResult => {
        let best: SweepHit | null = null;
        let bestMover: Mover | null = null;

        for (const target of getTargets(world, filter)) {
            // sweeping the box against a target is sweeping its origin against the target grown by the box
            vec3.subtract(_sweepMin, target.min, box[1]);
            vec3.subtract(_sweepMax, target.max, box[0]);

            if (isStrictlyInside(start, _sweepMin, _sweepMax)) {
                return {
                    hit: true,
                    endPosition: vec3.clone(start),
                    normal: [0, 0, 0],
                    startedSolid: true,
                    occupant: target.mover,
                };
            }

            const hit = intersectSegmentBox(start, end, _sweepMin, _sweepMax);

            if (hit && (!best || hit.t < best.t)) {
                best = hit;
                bestMover = target.mover;
            }
        }

        if (!best) {
            return { hit: false, endPosition: vec3.clone(end), normal: [0, 0, 0], startedSolid: false, occupant: null };
        }

        return {
            hit: true,
            endPosition: vec3.lerp(vec3.create(), start, end, best.t),
            normal: best.normal,
            startedSolid: false,
            occupant: bestMover,
        };
    };

    return { rayProbe, boxProbe };
};
