/**
 * Labyrinth layout schema (Zod validation) and loader.
 *
 * A layout describes a fully generated labyrinth as plain JSON:
 * `{ xSize, ySize, rooms }` with `rooms[y][x]` holding each Room's exit, walls and contents.
 * Neighbouring Rooms may disagree about a shared wall; the map resolves that at display time.
 */
import { readFileSync } from 'node:fs'
import { z } from 'zod'
import starterLabyrinthData from '../data/starterLabyrinth.json' with { type: 'json' }
import { DIRECTIONS, INHABITANTS, ITEMS } from '../domainModels.js'
import { Labyrinth } from '../labyrinth.js'
import { fail, type MapResult } from '../mapResult.js'
import { Room } from '../room.js'
import { trackMapEvent } from '../telemetry.js'

export const RoomLayoutSchema = z
    .object({
        exit: z.enum(DIRECTIONS).default('none'),
        walls: z.object({
            north: z.boolean(),
            east: z.boolean(),
            south: z.boolean(),
            west: z.boolean()
        }),
        inhabitant: z.enum(INHABITANTS).default('none'),
        item: z.enum(ITEMS).default('none')
    })
    .strict()

export type RoomLayout = z.infer<typeof RoomLayoutSchema>

export const LabyrinthLayoutSchema = z
    .object({
        xSize: z.number().int().positive(),
        ySize: z.number().int().positive(),
        rooms: z.array(z.array(RoomLayoutSchema))
    })
    .strict()
    .superRefine((layout, ctx) => {
        if (layout.rooms.length !== layout.ySize) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['rooms'],
                message: `Expected ${layout.ySize} rows, got ${layout.rooms.length}`
            })
        }
        layout.rooms.forEach((row, y) => {
            if (row.length !== layout.xSize) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['rooms', y],
                    message: `Expected ${layout.xSize} Rooms, got ${row.length}`
                })
            }
        })
        const exits = layout.rooms.flat().filter((room) => room.exit !== 'none').length
        if (exits > 1) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['rooms'],
                message: `A labyrinth has at most one exit, got ${exits}`
            })
        }
    })

export type LabyrinthLayout = z.infer<typeof LabyrinthLayoutSchema>

export interface LoadLabyrinthOptions {
    /** Label reported in telemetry (file path, "inline", ...). */
    source?: string
}

/**
 * Validate raw JSON and build a labyrinth from it.
 * Schema failures return `InvalidArgument` with every issue listed.
 */
export function loadLabyrinth(raw: unknown, opts: LoadLabyrinthOptions = {}): MapResult<Labyrinth> {
    const source = opts.source ?? 'inline'
    const parsed = LabyrinthLayoutSchema.safeParse(raw)
    if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
        trackMapEvent('Labyrinth.Layout.Rejected', { source, issues: parsed.error.issues.length, message })
        return fail('InvalidArgument', `Invalid labyrinth layout: ${message}`)
    }

    const layout = parsed.data
    const labyrinth = Labyrinth.fromGrid(layout.rooms.map((row) => row.map((room) => new Room(room))))
    if (labyrinth.success) {
        trackMapEvent('Labyrinth.Layout.Loaded', { xSize: layout.xSize, ySize: layout.ySize, source })
    }
    return labyrinth
}

/** Bundled 3x2 labyrinth used by the render script and demos. */
export function loadStarterLabyrinth(): MapResult<Labyrinth> {
    return loadLabyrinth(starterLabyrinthData, { source: 'starterLabyrinth.json' })
}

/** Read a layout file (UTF-8 JSON) and build a labyrinth from it. */
export function loadLabyrinthFile(path: string): MapResult<Labyrinth> {
    let raw: unknown
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'))
    } catch (err) {
        return fail('InvalidArgument', `Could not read labyrinth layout ${path}: ${err instanceof Error ? err.message : String(err)}`)
    }
    return loadLabyrinth(raw, { source: path })
}
