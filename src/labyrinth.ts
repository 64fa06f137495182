import { coordinate, formatCoordinate, isWithinBounds, type Coordinate, type GridDimensions } from './coordinate.js'
import { fail, ok, type MapResult } from './mapResult.js'
import { Room } from './room.js'

/**
 * Narrow read-only contract the map consumes, independent of how the labyrinth
 * stores or generates its Rooms.
 */
export interface LabyrinthView {
    readonly dimensions: GridDimensions
    /** Bounded lookup; `InvalidArgument` outside the labyrinth. */
    roomAt(c: Coordinate): MapResult<Room>
    /** Every valid Room coordinate. */
    roomCoordinates(): Iterable<Coordinate>
}

/**
 * In-memory labyrinth. Rooms are stored row-major (`y` first, then `x`).
 * Built once from a fully populated grid; afterwards only inhabitants and items move.
 */
export class Labyrinth implements LabyrinthView {
    readonly dimensions: GridDimensions
    private readonly rooms: Room[]

    private constructor(dimensions: GridDimensions, rooms: Room[]) {
        this.dimensions = dimensions
        this.rooms = rooms
    }

    /**
     * @param grid - Rooms indexed `grid[y][x]`; every row must have the same, non-zero length.
     */
    static fromGrid(grid: Room[][]): MapResult<Labyrinth> {
        const ySize = grid.length
        const xSize = ySize > 0 ? grid[0].length : 0
        if (ySize === 0 || xSize === 0) {
            return fail('InvalidArgument', 'A labyrinth needs at least one Room')
        }
        const ragged = grid.findIndex((row) => row.length !== xSize)
        if (ragged !== -1) {
            return fail('InvalidArgument', `Row ${ragged} has ${grid[ragged].length} Rooms, expected ${xSize}`)
        }
        return ok(new Labyrinth({ xSize, ySize }, grid.flat()))
    }

    roomAt(c: Coordinate): MapResult<Room> {
        if (!isWithinBounds(c, this.dimensions)) {
            return fail(
                'InvalidArgument',
                `roomAt() was given ${formatCoordinate(c)}, outside the ${this.dimensions.xSize}x${this.dimensions.ySize} labyrinth`
            )
        }
        return ok(this.rooms[c.y * this.dimensions.xSize + c.x])
    }

    *roomCoordinates(): IterableIterator<Coordinate> {
        for (let y = 0; y < this.dimensions.ySize; y++) {
            for (let x = 0; x < this.dimensions.xSize; x++) {
                yield coordinate(x, y)
            }
        }
    }

    /** Coordinate of the exit Room, if the labyrinth has one. */
    findExitRoom(): Coordinate | undefined {
        for (const c of this.roomCoordinates()) {
            const room = this.rooms[c.y * this.dimensions.xSize + c.x]
            if (room.getExit() !== 'none') return c
        }
        return undefined
    }

    /**
     * Move the inhabitant of `from` into `to`, leaving `from` empty. Whatever stood in `to` is replaced.
     * Fails before mutating when either coordinate is outside the labyrinth.
     */
    moveInhabitant(from: Coordinate, to: Coordinate): MapResult<void> {
        const source = this.roomAt(from)
        if (!source.success) return source
        const target = this.roomAt(to)
        if (!target.success) return target
        const inhabitant = source.value.getInhabitant()
        source.value.setInhabitant('none')
        target.value.setInhabitant(inhabitant)
        return ok(undefined)
    }

    /** Same contract as `moveInhabitant`, for the item. */
    moveItem(from: Coordinate, to: Coordinate): MapResult<void> {
        const source = this.roomAt(from)
        if (!source.success) return source
        const target = this.roomAt(to)
        if (!target.success) return target
        const item = source.value.getItem()
        source.value.setItem('none')
        target.value.setItem(item)
        return ok(undefined)
    }
}
