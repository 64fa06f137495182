/**
 * Map cell variant.
 *
 * A map position is either a Border (boundary between two Rooms, corner between four, or a
 * segment of the outer wall) or a Room. Each shape has its own operations; calling an operation
 * of the other shape returns `ShapeMismatch`, never a silent default.
 *
 * Borders start fully walled with no exit so the outer boundary needs no special case.
 */

import { closedWalls, type Direction, type Inhabitant, type WallFlags } from '../domainModels.js'
import { fail, ok, type MapResult } from '../mapResult.js'

export interface BorderCell {
    kind: 'border'
    walls: WallFlags
    exit: boolean
}

export interface RoomCell {
    kind: 'room'
    inhabitant: Inhabitant
    treasure: boolean
}

export type LabyrinthMapCell = BorderCell | RoomCell

export type CellKind = LabyrinthMapCell['kind']

export function createBorderCell(): BorderCell {
    return { kind: 'border', walls: closedWalls(), exit: false }
}

export function createRoomCell(): RoomCell {
    return { kind: 'room', inhabitant: 'none', treasure: false }
}

/** Capability probe: call before any shape-specific operation. */
export function isRoomCell(cell: LabyrinthMapCell): cell is RoomCell {
    return cell.kind === 'room'
}

export function isBorderCell(cell: LabyrinthMapCell): cell is BorderCell {
    return cell.kind === 'border'
}

function wrongShape<T = never>(operation: string, cell: LabyrinthMapCell): MapResult<T> {
    const [actual, expected] = cell.kind === 'room' ? ['Room', 'Border'] : ['Border', 'Room']
    return fail(
        'ShapeMismatch',
        `A ${actual} cell was asked to ${operation}(), which is a ${expected}-only operation. ` +
            'Consider using isRoomCell() to check whether the cell is a Border or a Room.'
    )
}

// --- Border-only -------------------------------------------------------------

export function isWall(cell: LabyrinthMapCell, direction: Direction): MapResult<boolean> {
    if (!isBorderCell(cell)) return wrongShape('isWall', cell)
    if (direction === 'none') return fail('InvalidArgument', 'isWall() was given the direction none')
    return ok(cell.walls[direction])
}

/** Idempotent: removing an already removed wall is allowed. */
export function removeWall(cell: LabyrinthMapCell, direction: Direction): MapResult<void> {
    if (!isBorderCell(cell)) return wrongShape('removeWall', cell)
    if (direction === 'none') return fail('InvalidArgument', 'removeWall() was given the direction none')
    cell.walls[direction] = false
    return ok(undefined)
}

export function isExit(cell: LabyrinthMapCell): MapResult<boolean> {
    if (!isBorderCell(cell)) return wrongShape('isExit', cell)
    return ok(cell.exit)
}

export function setExit(cell: LabyrinthMapCell, exit: boolean): MapResult<void> {
    if (!isBorderCell(cell)) return wrongShape('setExit', cell)
    cell.exit = exit
    return ok(undefined)
}

// --- Room-only ---------------------------------------------------------------

/** Returns the inhabitant (`none` when empty). */
export function hasInhabitant(cell: LabyrinthMapCell): MapResult<Inhabitant> {
    if (!isRoomCell(cell)) return wrongShape('hasInhabitant', cell)
    return ok(cell.inhabitant)
}

export function setInhabitant(cell: LabyrinthMapCell, inhabitant: Inhabitant): MapResult<void> {
    if (!isRoomCell(cell)) return wrongShape('setInhabitant', cell)
    cell.inhabitant = inhabitant
    return ok(undefined)
}

export function hasTreasure(cell: LabyrinthMapCell): MapResult<boolean> {
    if (!isRoomCell(cell)) return wrongShape('hasTreasure', cell)
    return ok(cell.treasure)
}

export function setTreasure(cell: LabyrinthMapCell, treasure: boolean): MapResult<void> {
    if (!isRoomCell(cell)) return wrongShape('setTreasure', cell)
    cell.treasure = treasure
    return ok(undefined)
}

// --- Derived border state ----------------------------------------------------

/**
 * Display state of a Border, ranked `exit > open > wall`.
 * A Border is open as soon as any neighbouring Room has removed one of its walls.
 */
export type BorderState = 'exit' | 'open' | 'wall'

export function borderState(cell: BorderCell): BorderState {
    if (cell.exit) return 'exit'
    if (!cell.walls.north || !cell.walls.east || !cell.walls.south || !cell.walls.west) return 'open'
    return 'wall'
}

export function cloneCell(cell: LabyrinthMapCell): LabyrinthMapCell {
    return cell.kind === 'room' ? { ...cell } : { ...cell, walls: { ...cell.walls } }
}
