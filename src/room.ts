import { type Direction, type Inhabitant, type Item, type RoomBorder, type WallFlags } from './domainModels.js'
import { fail, ok, type MapResult } from './mapResult.js'

export interface RoomOptions {
    inhabitant?: Inhabitant
    item?: Item
    /** Side holding the labyrinth exit; `none` (default) when this is not the exit room. */
    exit?: Direction
    /** Omitted walls default to solid. */
    walls?: Partial<WallFlags>
}

/**
 * Atomic labyrinth cell. Exit and walls are fixed at construction (maze generation);
 * only the inhabitant and item move afterwards.
 */
export class Room {
    private inhabitant: Inhabitant
    private item: Item
    private readonly exit: Direction
    private readonly walls: Readonly<WallFlags>

    constructor(options: RoomOptions = {}) {
        this.inhabitant = options.inhabitant ?? 'none'
        this.item = options.item ?? 'none'
        this.exit = options.exit ?? 'none'
        this.walls = {
            north: options.walls?.north ?? true,
            east: options.walls?.east ?? true,
            south: options.walls?.south ?? true,
            west: options.walls?.west ?? true
        }
    }

    getInhabitant(): Inhabitant {
        return this.inhabitant
    }

    setInhabitant(inhabitant: Inhabitant): void {
        this.inhabitant = inhabitant
    }

    getItem(): Item {
        return this.item
    }

    setItem(item: Item): void {
        this.item = item
    }

    getExit(): Direction {
        return this.exit
    }

    /**
     * Classify one side of the Room. The exit is checked first, so the exit side
     * reports `exit` whatever its wall flag says.
     *
     * Fails with `InvalidArgument` for `none`.
     */
    directionCheck(direction: Direction): MapResult<RoomBorder> {
        if (direction === 'none') {
            return fail('InvalidArgument', 'directionCheck() was given the direction none')
        }
        if (direction === this.exit) {
            return ok('exit')
        }
        return ok(this.walls[direction] ? 'wall' : 'room')
    }
}
