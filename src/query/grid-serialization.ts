import { z } from 'zod';
import { type CellCorners, CellTag, type Grid, type GridCell } from './grid';
import { addCell, createGrid, getAllCells } from './grid-api';

const vec2Schema = z.tuple([z.number().int(), z.number().int()]);
const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

const gridSettingsSchema = z.object({
    identifier: z.string().min(1),
    origin: vec3Schema,
    bounds: z.tuple([vec3Schema, vec3Schema]),
    yaw: z.number(),
    cellSize: z.number().positive(),
    stepSize: z.number().min(0),
    standableAngle: z.number().min(0).max(90),
    heightClearance: z.number().min(0),
    widthClearance: z.number().min(0),
    maxDropHeight: z.number().min(0),
    gridPerfect: z.boolean(),
    worldOnly: z.boolean(),
});

const serializedCellSchema = z.object({
    coordinates: vec2Schema,
    position: vec3Schema,
    corners: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    tags: z.array(z.string()),
    connections: z.array(
        z.object({
            /** index of the connected cell in the cells array */
            cell: z.number().int().min(0),
            movementTag: z.string().nullable(),
        }),
    ),
});

export const SERIALIZED_GRID_VERSION = 1;

export const serializedGridSchema = z
    .object({
        version: z.literal(SERIALIZED_GRID_VERSION),
        settings: gridSettingsSchema,
        cells: z.array(serializedCellSchema),
    })
    .superRefine((data, ctx) => {
        data.cells.forEach((cell, cellIndex) => {
            cell.connections.forEach((connection, connectionIndex) => {
                if (connection.cell >= data.cells.length) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `connection to missing cell ${connection.cell}`,
                        path: ['cells', cellIndex, 'connections', connectionIndex, 'cell'],
                    });
                }
            });
        });
    });

export type SerializedGrid = z.infer<typeof serializedGridSchema>;

/**
 * Converts a grid into plain JSON compatible data.
 * Occupancy is runtime state and is not kept.
 */
export const serializeGrid = (grid: Grid): SerializedGrid => {
    const cells = getAllCells(grid);
    const indices = new Map<GridCell, number>();

    cells.forEach((cell, index) => indices.set(cell, index));

    const { settings } = grid;

    return {
        version: SERIALIZED_GRID_VERSION,
        settings: {
            ...settings,
            origin: [settings.origin[0], settings.origin[1], settings.origin[2]],
            bounds: [
                [settings.bounds[0][0], settings.bounds[0][1], settings.bounds[0][2]],
                [settings.bounds[1][0], settings.bounds[1][1], settings.bounds[1][2]],
            ],
        },
        cells: cells.map((cell) => ({
            coordinates: [cell.coordinates[0], cell.coordinates[1]],
            position: [cell.position[0], cell.position[1], cell.position[2]],
            corners: [...cell.corners],
            tags: [...cell.tags].filter((tag) => tag !== CellTag.OCCUPIED),
            connections: cell.connections.flatMap((connection) => {
                const index = indices.get(connection.cell);
                return index === undefined ? [] : [{ cell: index, movementTag: connection.movementTag }];
            }),
        })),
    };
};

/**
 * Rebuilds a grid from serialized data, keeping the order of cells in each stack.
 * @throws ZodError when the data is malformed
 */
export const deserializeGrid = (data: unknown): Grid => {
    const parsed = serializedGridSchema.parse(data);

    const grid = createGrid(parsed.settings);

    const cells: GridCell[] = parsed.cells.map((serialized) => {
        const corners: CellCorners = [...serialized.corners];

        return {
            coordinates: [serialized.coordinates[0], serialized.coordinates[1]],
            position: [serialized.position[0], serialized.position[1], serialized.position[2]],
            corners,
            tags: new Set(serialized.tags),
            connections: [],
            occupant: null,
            occupantPose: null,
        };
    });

    parsed.cells.forEach((serialized, index) => {
        const cell = cells[index];

        for (const connection of serialized.connections) {
            cell.connections.push({ cell: cells[connection.cell], movementTag: connection.movementTag });
        }

        addCell(grid, cell);
    });

    return grid;
};
