/**
 * Grid coordinates shared by labyrinth space and map space.
 *
 * Labyrinth space holds Rooms only (`xSize × ySize`). Map space doubles it and
 * interleaves Border cells: Room `(x, y)` sits at `(2x+1, 2y+1)`, and every position
 * with at least one even component is a Border (or corner) cell.
 */

import { DIRECTION_OFFSETS, type CardinalDirection } from './domainModels.js'
import { fail, ok, type MapResult } from './mapResult.js'

export interface Coordinate {
    readonly x: number
    readonly y: number
}

export interface GridDimensions {
    readonly xSize: number
    readonly ySize: number
}

export function coordinate(x: number, y: number): Coordinate {
    return Object.freeze({ x, y })
}

export function formatCoordinate(c: Coordinate): string {
    return `(${c.x}, ${c.y})`
}

export function isWithinBounds(c: Coordinate, dims: GridDimensions): boolean {
    return Number.isInteger(c.x) && Number.isInteger(c.y) && c.x >= 0 && c.y >= 0 && c.x < dims.xSize && c.y < dims.ySize
}

export function stepCoordinate(c: Coordinate, direction: CardinalDirection): Coordinate {
    const { dx, dy } = DIRECTION_OFFSETS[direction]
    return coordinate(c.x + dx, c.y + dy)
}

/** Map grid size covering every Room plus the Borders between and around them. */
export function mapDimensionsFor(dims: GridDimensions): GridDimensions {
    return { xSize: 2 * dims.xSize + 1, ySize: 2 * dims.ySize + 1 }
}

/** Room cells occupy odd,odd map positions. */
export function isRoomPosition(c: Coordinate): boolean {
    return c.x % 2 === 1 && c.y % 2 === 1
}

/**
 * Labyrinth coordinate → map coordinate of the same Room.
 * Fails with `InvalidArgument` when `c` lies outside the labyrinth.
 */
export function labyrinthToMap(c: Coordinate, labyrinthDims: GridDimensions): MapResult<Coordinate> {
    if (!isWithinBounds(c, labyrinthDims)) {
        return fail(
            'InvalidArgument',
            `labyrinthToMap() was given ${formatCoordinate(c)}, outside the ${labyrinthDims.xSize}x${labyrinthDims.ySize} labyrinth`
        )
    }
    return ok(coordinate(2 * c.x + 1, 2 * c.y + 1))
}

/**
 * Map coordinate of a Room → labyrinth coordinate. Exact inverse of `labyrinthToMap`.
 *
 * Fails with `OutOfBounds` outside the map grid and `ShapeMismatch` on a Border position.
 */
export function mapToLabyrinth(c: Coordinate, labyrinthDims: GridDimensions): MapResult<Coordinate> {
    const mapDims = mapDimensionsFor(labyrinthDims)
    if (!isWithinBounds(c, mapDims)) {
        return fail('OutOfBounds', `mapToLabyrinth() was given ${formatCoordinate(c)}, outside the ${mapDims.xSize}x${mapDims.ySize} map`)
    }
    if (!isRoomPosition(c)) {
        return fail('ShapeMismatch', `mapToLabyrinth() was given ${formatCoordinate(c)}, which designates a Border rather than a Room`)
    }
    return ok(coordinate((c.x - 1) / 2, (c.y - 1) / 2))
}
