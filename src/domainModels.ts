/**
 * Core domain vocabulary for the labyrinth and its map.
 *
 * Enumerations are closed string unions derived from a canonical `as const` list, which the
 * layout schema validates against.
 *
 * Orientation: north is towards decreasing `y`, east towards increasing `x`.
 */

// --- Direction ---------------------------------------------------------------

/** Compass directions plus the `none` sentinel ("no direction", never a valid query argument). */
export const DIRECTIONS = ['north', 'east', 'south', 'west', 'none'] as const

export type Direction = (typeof DIRECTIONS)[number]

export type CardinalDirection = Exclude<Direction, 'none'>

/** Cardinal directions in clockwise order starting at north. */
export const CARDINAL_DIRECTIONS: readonly CardinalDirection[] = ['north', 'east', 'south', 'west'] as const

/** Unit step in grid space for each cardinal direction. */
export const DIRECTION_OFFSETS: Readonly<Record<CardinalDirection, { readonly dx: number; readonly dy: number }>> = {
    north: { dx: 0, dy: -1 },
    east: { dx: 1, dy: 0 },
    south: { dx: 0, dy: 1 },
    west: { dx: -1, dy: 0 }
} as const

// --- Room contents -----------------------------------------------------------

export const INHABITANTS = ['none', 'minotaur', 'mirror'] as const

export type Inhabitant = (typeof INHABITANTS)[number]

/** Only `treasure` shows on the map. */
export const ITEMS = ['none', 'treasure', 'bullet'] as const

export type Item = (typeof ITEMS)[number]

// --- Border classification ---------------------------------------------------

/**
 * Classification of one side of a Room.
 *
 * - `exit`: the labyrinth's single designated way out
 * - `room`: open to the neighbouring Room
 * - `wall`: solid
 */
export type RoomBorder = 'exit' | 'room' | 'wall'

/** Wall flag per cardinal direction (`true` = solid). */
export type WallFlags = Record<CardinalDirection, boolean>

export function closedWalls(): WallFlags {
    return { north: true, east: true, south: true, west: true }
}
