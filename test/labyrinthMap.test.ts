import assert from 'node:assert/strict'
import test from 'node:test'
import { GLYPH_SETS } from '../src/config/mapDisplayConfig.js'
import { coordinate, type Coordinate } from '../src/coordinate.js'
import { Labyrinth, type LabyrinthView } from '../src/labyrinth.js'
import { LabyrinthMap } from '../src/map/labyrinthMap.js'
import { borderState, isBorderCell, isExit, isWall, setExit, type LabyrinthMapCell } from '../src/map/mapCell.js'
import { fail, type MapResult } from '../src/mapResult.js'
import { Room } from '../src/room.js'
import type { EventPayloadMap, MapTelemetry } from '../src/telemetry.js'
import type { MapEventName } from '../src/telemetryEvents.js'

class RecordingTelemetry implements MapTelemetry {
    readonly events: { name: MapEventName; properties: unknown }[] = []
    trackMapEvent<E extends MapEventName>(name: E, properties: EventPayloadMap[E]): void {
        this.events.push({ name, properties })
    }
}

function unwrap<T>(result: MapResult<T>): T {
    assert.ok(result.success, result.success ? undefined : result.error.message)
    return result.value
}

function buildLabyrinth(grid: Room[][]): Labyrinth {
    return unwrap(Labyrinth.fromGrid(grid))
}

function buildMap(labyrinth: LabyrinthView, telemetry = new RecordingTelemetry()): LabyrinthMap {
    const { xSize, ySize } = labyrinth.dimensions
    return unwrap(LabyrinthMap.create(labyrinth, xSize, ySize, { glyphs: GLYPH_SETS.ascii, telemetry }))
}

function borderAt(map: LabyrinthMap, x: number, y: number) {
    const cell = unwrap(map.cellAt(coordinate(x, y)))
    assert.ok(isBorderCell(cell), `expected a border at (${x}, ${y})`)
    return cell
}

/** Same rooms, enumerated in reverse order. */
function reversed(labyrinth: Labyrinth): LabyrinthView {
    return {
        dimensions: labyrinth.dimensions,
        roomAt: (c: Coordinate) => labyrinth.roomAt(c),
        roomCoordinates: () => [...labyrinth.roomCoordinates()].reverse()
    }
}

// 3x2 labyrinth: exit north of (0,0), minotaur at (2,0), treasure at (0,1), mirror at (1,1), bullet at (2,1)
function starterGrid(): Room[][] {
    return [
        [
            new Room({ exit: 'north', walls: { north: true, east: false, south: true, west: true } }),
            new Room({ walls: { north: true, east: true, south: false, west: false } }),
            new Room({ walls: { north: true, east: true, south: false, west: true }, inhabitant: 'minotaur' })
        ],
        [
            new Room({ walls: { north: true, east: false, south: true, west: true }, item: 'treasure' }),
            new Room({ walls: { north: false, east: false, south: true, west: false }, inhabitant: 'mirror' }),
            new Room({ walls: { north: false, east: true, south: true, west: false }, item: 'bullet' })
        ]
    ]
}

const STARTER_LINES = ['+E+-+-+', '|   |M|', '+-+ + +', '|$ O  |', '+-+-+-+']

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------
test('create: absent labyrinth is InvalidArgument', () => {
    assert.deepEqual(LabyrinthMap.create(undefined, 1, 1), {
        success: false,
        error: { code: 'InvalidArgument', message: 'LabyrinthMap was given no labyrinth' }
    })
    assert.equal(LabyrinthMap.create(null, 1, 1).success, false)
})

test('create: dimensions must be positive integers matching the labyrinth', () => {
    const labyrinth = buildLabyrinth(starterGrid())
    assert.deepEqual(LabyrinthMap.create(labyrinth, 0, 2), {
        success: false,
        error: { code: 'InvalidArgument', message: 'LabyrinthMap dimensions must be positive integers, got 0x2' }
    })
    assert.deepEqual(LabyrinthMap.create(labyrinth, 2, 3), {
        success: false,
        error: { code: 'InvalidArgument', message: 'LabyrinthMap dimensions 2x3 do not match the 3x2 labyrinth' }
    })
})

test('create: colliding glyphs are InvalidArgument', () => {
    const labyrinth = buildLabyrinth([[new Room({ exit: 'north' })]])
    const glyphs = { ...GLYPH_SETS.ascii, exit: '#', wallHorizontal: '#', wallVertical: '#', corner: '#' }
    assert.deepEqual(LabyrinthMap.create(labyrinth, 1, 1, { glyphs, telemetry: new RecordingTelemetry() }), {
        success: false,
        error: { code: 'InvalidArgument', message: 'Map display configuration error: wall glyphs must differ from exit and open glyphs' }
    })
})

test('cellAt: returned cell is a copy', () => {
    const map = buildMap(buildLabyrinth([[new Room({ exit: 'north' })]]))
    const south = unwrap(map.cellAt(coordinate(1, 2)))
    assert.deepEqual(setExit(south, true), { success: true, value: undefined })
    assert.equal(borderState(south), 'exit')

    unwrap(map.update())
    assert.equal(borderState(borderAt(map, 1, 2)), 'wall')
    assert.deepEqual(unwrap(map.render()), ['+E+', '| |', '+-+'])
})

test('create: grid covers every room and border', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    assert.deepEqual(map.mapDimensions, { xSize: 7, ySize: 5 })
    const cells = map.cellsSnapshot()
    assert.equal(cells.length, 35)
    assert.equal(cells.filter((cell) => cell.kind === 'room').length, 6)
    assert.ok(cells.every((cell) => cell.kind === 'room' || borderState(cell) === 'wall'))
})

// ---------------------------------------------------------------------------
// Coordinate helpers
// ---------------------------------------------------------------------------
test('isRoom: parity inside the map, OutOfBounds outside', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    assert.deepEqual(map.isRoom(coordinate(1, 1)), { success: true, value: true })
    assert.deepEqual(map.isRoom(coordinate(2, 1)), { success: true, value: false })
    assert.deepEqual(map.isRoom(coordinate(0, 5)), {
        success: false,
        error: { code: 'OutOfBounds', message: 'isRoom() was given (0, 5), outside the 7x5 map' }
    })
    assert.ok(!map.withinBoundsOfMap(coordinate(-1, 0)))
})

test('labyrinthToMap / mapToLabyrinth round trip through the map', () => {
    const labyrinth = buildLabyrinth(starterGrid())
    const map = buildMap(labyrinth)
    for (const c of labyrinth.roomCoordinates()) {
        const mapped = unwrap(map.labyrinthToMap(c))
        assert.deepEqual(unwrap(map.mapToLabyrinth(mapped)), c)
    }
})

// ---------------------------------------------------------------------------
// update
// ---------------------------------------------------------------------------
test('update: 1x1 labyrinth with a north exit', () => {
    const telemetry = new RecordingTelemetry()
    const map = buildMap(buildLabyrinth([[new Room({ exit: 'north' })]]), telemetry)

    assert.deepEqual(unwrap(map.update()), { roomsVisited: 1, openBorders: 0, exitBorders: 1 })

    assert.deepEqual(isExit(borderAt(map, 1, 0)), { success: true, value: true })
    assert.deepEqual(isWall(borderAt(map, 1, 0), 'north'), { success: true, value: false })
    assert.equal(borderState(borderAt(map, 1, 0)), 'exit')
    assert.equal(borderState(borderAt(map, 2, 1)), 'wall')
    assert.equal(borderState(borderAt(map, 1, 2)), 'wall')
    assert.equal(borderState(borderAt(map, 0, 1)), 'wall')

    assert.deepEqual(unwrap(map.render()), ['+E+', '| |', '+-+'])
    assert.deepEqual(telemetry.events, [
        { name: 'Map.Update.Completed', properties: { roomsVisited: 1, openBorders: 0, exitBorders: 1 } }
    ])
})

test('update: disagreeing neighbours leave the shared border open', () => {
    const west = new Room({ walls: { north: true, east: true, south: true, west: true } })
    const east = new Room({ walls: { north: true, east: true, south: true, west: false } })
    const labyrinth = buildLabyrinth([[west, east]])

    assert.deepEqual(west.directionCheck('east'), { success: true, value: 'wall' })
    assert.deepEqual(east.directionCheck('west'), { success: true, value: 'room' })

    for (const view of [labyrinth, reversed(labyrinth)]) {
        const map = buildMap(view)
        unwrap(map.update())
        assert.equal(borderState(borderAt(map, 2, 1)), 'open')
        assert.deepEqual(unwrap(map.render()), ['+-+-+', '|   |', '+-+-+'])
    }
})

test('update: starter labyrinth renders every classification', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    assert.deepEqual(unwrap(map.update()), { roomsVisited: 6, openBorders: 5, exitBorders: 1 })
    assert.deepEqual(unwrap(map.render()), STARTER_LINES)
})

test('update: idempotent', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    unwrap(map.update())
    const first: LabyrinthMapCell[] = map.cellsSnapshot()
    unwrap(map.update())
    assert.deepEqual(map.cellsSnapshot(), first)
    assert.deepEqual(unwrap(map.render()), STARTER_LINES)
})

test('update: processing order does not change the grid', () => {
    const labyrinth = buildLabyrinth(starterGrid())
    const forward = buildMap(labyrinth)
    const backward = buildMap(reversed(labyrinth))
    unwrap(forward.update())
    unwrap(backward.update())
    assert.deepEqual(backward.cellsSnapshot(), forward.cellsSnapshot())
})

test('update: reflects inhabitant and item movement', () => {
    const labyrinth = buildLabyrinth(starterGrid())
    const map = buildMap(labyrinth)
    unwrap(map.update())

    unwrap(labyrinth.moveInhabitant(coordinate(2, 0), coordinate(1, 0)))
    unwrap(labyrinth.moveItem(coordinate(0, 1), coordinate(2, 1)))
    unwrap(map.update())

    assert.deepEqual(unwrap(map.render()), ['+E+-+-+', '|  M| |', '+-+ + +', '|  O $|', '+-+-+-+'])
})

test('update: failed lookup leaves the map untouched and reports the failure', () => {
    const labyrinth = buildLabyrinth(starterGrid())
    const broken: LabyrinthView = {
        dimensions: labyrinth.dimensions,
        roomAt: (c: Coordinate) => (c.x === 2 && c.y === 1 ? fail('InvalidArgument', 'room missing') : labyrinth.roomAt(c)),
        roomCoordinates: () => labyrinth.roomCoordinates()
    }
    const telemetry = new RecordingTelemetry()
    const map = buildMap(broken, telemetry)
    const before = map.cellsSnapshot()

    assert.deepEqual(map.update(), { success: false, error: { code: 'InvalidArgument', message: 'room missing' } })
    assert.deepEqual(map.cellsSnapshot(), before)
    assert.deepEqual(telemetry.events, [
        { name: 'Map.Operation.Failed', properties: { operation: 'update', code: 'InvalidArgument', message: 'room missing' } }
    ])
})

// ---------------------------------------------------------------------------
// display
// ---------------------------------------------------------------------------
test('displayBorder: OutOfBounds outside the map, ShapeMismatch on a room', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    assert.deepEqual(map.displayBorder(coordinate(7, 0)), {
        success: false,
        error: { code: 'OutOfBounds', message: 'displayBorder() was given (7, 0), outside the 7x5 map' }
    })
    assert.deepEqual(map.displayBorder(coordinate(1, 1)), {
        success: false,
        error: { code: 'ShapeMismatch', message: 'displayBorder() was given (1, 1), which designates a Room' }
    })
})

test('displayBorder: corner, horizontal and vertical walls', () => {
    const map = buildMap(buildLabyrinth(starterGrid()))
    unwrap(map.update())
    assert.deepEqual(map.displayBorder(coordinate(0, 0)), { success: true, value: '+' })
    assert.deepEqual(map.displayBorder(coordinate(3, 0)), { success: true, value: '-' })
    assert.deepEqual(map.displayBorder(coordinate(4, 1)), { success: true, value: '|' })
    assert.deepEqual(map.displayBorder(coordinate(2, 1)), { success: true, value: ' ' })
    assert.deepEqual(map.displayBorder(coordinate(1, 0)), { success: true, value: 'E' })
})

test('display: writes each row in order and reports the render', () => {
    const telemetry = new RecordingTelemetry()
    const map = buildMap(buildLabyrinth(starterGrid()), telemetry)
    unwrap(map.update())

    const written: string[] = []
    assert.deepEqual(map.display((line) => written.push(line)), { success: true, value: undefined })
    assert.deepEqual(written, STARTER_LINES)
    assert.deepEqual(telemetry.events[telemetry.events.length - 1], {
        name: 'Map.Display.Rendered',
        properties: { rows: 5, columns: 7 }
    })
})

test('display: blocks glyph set', () => {
    const labyrinth = buildLabyrinth([[new Room({ exit: 'north' })]])
    const map = unwrap(LabyrinthMap.create(labyrinth, 1, 1, { glyphs: GLYPH_SETS.blocks, telemetry: new RecordingTelemetry() }))
    unwrap(map.update())
    assert.deepEqual(unwrap(map.render()), ['█░█', '█ █', '███'])
})
