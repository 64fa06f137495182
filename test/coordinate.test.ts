import assert from 'node:assert/strict'
import test from 'node:test'
import {
    coordinate,
    formatCoordinate,
    isRoomPosition,
    isWithinBounds,
    labyrinthToMap,
    mapDimensionsFor,
    mapToLabyrinth,
    stepCoordinate
} from '../src/coordinate.js'

const dims = { xSize: 3, ySize: 2 }

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------
test('coordinate: frozen value', () => {
    const c = coordinate(2, 5)
    assert.ok(Object.isFrozen(c))
    assert.deepEqual(c, { x: 2, y: 5 })
})

test('formatCoordinate: parenthesised pair', () => {
    assert.equal(formatCoordinate(coordinate(3, 0)), '(3, 0)')
})

test('stepCoordinate: north decreases y, east increases x', () => {
    const c = coordinate(1, 1)
    assert.deepEqual(stepCoordinate(c, 'north'), { x: 1, y: 0 })
    assert.deepEqual(stepCoordinate(c, 'east'), { x: 2, y: 1 })
    assert.deepEqual(stepCoordinate(c, 'south'), { x: 1, y: 2 })
    assert.deepEqual(stepCoordinate(c, 'west'), { x: 0, y: 1 })
})

test('isWithinBounds: edges, negatives and fractions', () => {
    assert.ok(isWithinBounds(coordinate(0, 0), dims))
    assert.ok(isWithinBounds(coordinate(2, 1), dims))
    assert.ok(!isWithinBounds(coordinate(3, 0), dims))
    assert.ok(!isWithinBounds(coordinate(0, 2), dims))
    assert.ok(!isWithinBounds(coordinate(-1, 0), dims))
    assert.ok(!isWithinBounds(coordinate(0.5, 0), dims))
})

test('mapDimensionsFor: doubled plus one border', () => {
    assert.deepEqual(mapDimensionsFor(dims), { xSize: 7, ySize: 5 })
    assert.deepEqual(mapDimensionsFor({ xSize: 1, ySize: 1 }), { xSize: 3, ySize: 3 })
})

test('isRoomPosition: only odd,odd', () => {
    assert.ok(isRoomPosition(coordinate(1, 1)))
    assert.ok(isRoomPosition(coordinate(5, 3)))
    assert.ok(!isRoomPosition(coordinate(0, 1)))
    assert.ok(!isRoomPosition(coordinate(1, 2)))
    assert.ok(!isRoomPosition(coordinate(2, 2)))
})

// ---------------------------------------------------------------------------
// Transforms
// ---------------------------------------------------------------------------
test('labyrinthToMap: scale and offset', () => {
    assert.deepEqual(labyrinthToMap(coordinate(0, 0), dims), { success: true, value: { x: 1, y: 1 } })
    assert.deepEqual(labyrinthToMap(coordinate(2, 1), dims), { success: true, value: { x: 5, y: 3 } })
})

test('labyrinthToMap: outside the labyrinth is InvalidArgument', () => {
    const result = labyrinthToMap(coordinate(3, 0), dims)
    assert.deepEqual(result, {
        success: false,
        error: { code: 'InvalidArgument', message: 'labyrinthToMap() was given (3, 0), outside the 3x2 labyrinth' }
    })
})

test('mapToLabyrinth: exact inverse for every in-bounds room', () => {
    for (let y = 0; y < dims.ySize; y++) {
        for (let x = 0; x < dims.xSize; x++) {
            const forward = labyrinthToMap(coordinate(x, y), dims)
            assert.ok(forward.success)
            assert.deepEqual(mapToLabyrinth(forward.value, dims), { success: true, value: { x, y } })
        }
    }
})

test('mapToLabyrinth: outside the map is OutOfBounds', () => {
    const result = mapToLabyrinth(coordinate(7, 1), dims)
    assert.equal(result.success, false)
    if (!result.success) {
        assert.equal(result.error.code, 'OutOfBounds')
        assert.equal(result.error.message, 'mapToLabyrinth() was given (7, 1), outside the 7x5 map')
    }
})

test('mapToLabyrinth: border positions are ShapeMismatch', () => {
    for (const c of [coordinate(0, 0), coordinate(2, 1), coordinate(1, 2), coordinate(6, 4)]) {
        const result = mapToLabyrinth(c, dims)
        assert.equal(result.success, false)
        if (!result.success) assert.equal(result.error.code, 'ShapeMismatch')
    }
})
