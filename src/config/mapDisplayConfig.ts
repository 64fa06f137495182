/**
 * Map Display Configuration
 *
 * Glyphs used to render the map, selected by glyph set and optionally overridden per glyph
 * through environment variables:
 *
 * - `LABYRINTH_MAP_GLYPH_SET`: `ascii` (default) or `blocks`
 * - `LABYRINTH_MAP_GLYPHS`: JSON object of single-character overrides, e.g. `{"exit":"#"}`
 */
import { z } from 'zod'

export interface MapGlyphs {
    /** Walled Border between two vertically adjacent Rooms (or on the north/south edge). */
    wallHorizontal: string
    /** Walled Border between two horizontally adjacent Rooms (or on the west/east edge). */
    wallVertical: string
    /** Walled corner (even,even map position). */
    corner: string
    open: string
    exit: string
    emptyRoom: string
    treasure: string
    minotaur: string
    mirror: string
}

export type GlyphSetName = 'ascii' | 'blocks'

export const GLYPH_SETS: Readonly<Record<GlyphSetName, MapGlyphs>> = {
    ascii: {
        wallHorizontal: '-',
        wallVertical: '|',
        corner: '+',
        open: ' ',
        exit: 'E',
        emptyRoom: ' ',
        treasure: '$',
        minotaur: 'M',
        mirror: 'O'
    },
    blocks: {
        wallHorizontal: '█',
        wallVertical: '█',
        corner: '█',
        open: ' ',
        exit: '░',
        emptyRoom: ' ',
        treasure: '◆',
        minotaur: 'Ⓜ',
        mirror: '◎'
    }
} as const

const GlyphSetNameSchema = z.enum(['ascii', 'blocks'])

const GlyphSchema = z.string().refine((value) => [...value].length === 1, { message: 'Glyph must be a single character' })

export const MapGlyphOverridesSchema = z
    .object({
        wallHorizontal: GlyphSchema,
        wallVertical: GlyphSchema,
        corner: GlyphSchema,
        open: GlyphSchema,
        exit: GlyphSchema,
        emptyRoom: GlyphSchema,
        treasure: GlyphSchema,
        minotaur: GlyphSchema,
        mirror: GlyphSchema
    })
    .partial()
    .strict()

export type MapGlyphOverrides = z.infer<typeof MapGlyphOverridesSchema>

export interface MapDisplayConfig {
    glyphSet: GlyphSetName
    glyphs: MapGlyphs
}

/**
 * Ensure every classification a reader must tell apart has its own glyph:
 * exit / open / each wall glyph for Borders, and empty / treasure / each inhabitant for Rooms.
 * Walls may share one glyph with each other.
 *
 * @throws Error when two classifications collide
 */
export function validateGlyphs(glyphs: MapGlyphs): void {
    const walls = new Set([glyphs.wallHorizontal, glyphs.wallVertical, glyphs.corner])
    if (glyphs.exit === glyphs.open) {
        throw new Error('Map display configuration error: exit and open glyphs must differ')
    }
    if (walls.has(glyphs.exit) || walls.has(glyphs.open)) {
        throw new Error('Map display configuration error: wall glyphs must differ from exit and open glyphs')
    }
    const roomGlyphs = [glyphs.emptyRoom, glyphs.treasure, glyphs.minotaur, glyphs.mirror]
    if (new Set(roomGlyphs).size !== roomGlyphs.length) {
        throw new Error('Map display configuration error: empty, treasure and inhabitant glyphs must all differ')
    }
}

export function resolveGlyphs(glyphSet: GlyphSetName, overrides: MapGlyphOverrides = {}): MapGlyphs {
    const glyphs: MapGlyphs = { ...GLYPH_SETS[glyphSet], ...overrides }
    validateGlyphs(glyphs)
    return glyphs
}

function parseGlyphSet(value: string | undefined): GlyphSetName {
    if (value === undefined || value === '') return 'ascii'
    const parsed = GlyphSetNameSchema.safeParse(value)
    if (!parsed.success) {
        throw new Error(`Invalid value for LABYRINTH_MAP_GLYPH_SET: ${value}`)
    }
    return parsed.data
}

function parseGlyphOverrides(value: string | undefined): MapGlyphOverrides {
    if (value === undefined || value === '') return {}
    let raw: unknown
    try {
        raw = JSON.parse(value)
    } catch (err) {
        throw new Error(`Invalid JSON for LABYRINTH_MAP_GLYPHS: ${err instanceof Error ? err.message : String(err)}`)
    }
    const parsed = MapGlyphOverridesSchema.safeParse(raw)
    if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
        throw new Error(`Invalid value for LABYRINTH_MAP_GLYPHS: ${detail}`)
    }
    return parsed.data
}

/**
 * Load configuration from environment variables with fallback to defaults
 */
export function loadMapDisplayConfig(env: NodeJS.ProcessEnv = process.env): MapDisplayConfig {
    const glyphSet = parseGlyphSet(env.LABYRINTH_MAP_GLYPH_SET)
    const overrides = parseGlyphOverrides(env.LABYRINTH_MAP_GLYPHS)
    return { glyphSet, glyphs: resolveGlyphs(glyphSet, overrides) }
}

let configInstance: MapDisplayConfig | null = null

/**
 * Get map display configuration singleton
 * Loads from environment variables on first call, returns cached instance on subsequent calls
 *
 * @throws Error if configuration is invalid
 */
export function getMapDisplayConfig(): MapDisplayConfig {
    if (configInstance === null) {
        configInstance = loadMapDisplayConfig()
    }
    return configInstance
}

export function __resetMapDisplayConfigForTests(): void {
    configInstance = null
}
