/**
 * LabyrinthMap: display grid mirroring a labyrinth.
 *
 * The map owns a flat arena of `(2·xSize+1) × (2·ySize+1)` cells addressed row-major
 * (`y · mapXSize + x`). Room cells sit at odd,odd positions; every other position is a Border.
 * The labyrinth is borrowed and must outlive the map.
 *
 * `update()` folds each Room's `directionCheck` into the Border next to it. Writes only ever
 * open a Border (`exit > open > wall`), so two Rooms describing the same Border can be
 * processed in any order, and re-running `update()` changes nothing.
 */

import { getMapDisplayConfig, validateGlyphs, type MapGlyphs } from '../config/mapDisplayConfig.js'
import {
    coordinate,
    formatCoordinate,
    isRoomPosition,
    isWithinBounds,
    labyrinthToMap,
    mapDimensionsFor,
    mapToLabyrinth,
    stepCoordinate,
    type Coordinate,
    type GridDimensions
} from '../coordinate.js'
import { CARDINAL_DIRECTIONS, type CardinalDirection, type RoomBorder } from '../domainModels.js'
import type { LabyrinthView } from '../labyrinth.js'
import { fail, ok, type MapError, type MapResult } from '../mapResult.js'
import { defaultMapTelemetry, type MapTelemetry } from '../telemetry.js'
import {
    borderState,
    cloneCell,
    createBorderCell,
    createRoomCell,
    isRoomCell,
    removeWall,
    setExit,
    setInhabitant,
    setTreasure,
    type LabyrinthMapCell,
    type RoomCell
} from './mapCell.js'

export interface LabyrinthMapOptions {
    /** Defaults to the glyphs of `getMapDisplayConfig()`. */
    glyphs?: MapGlyphs
    telemetry?: MapTelemetry
}

export interface MapUpdateSummary {
    roomsVisited: number
    openBorders: number
    exitBorders: number
}

export type LineWriter = (line: string) => void

interface RoomSnapshot {
    mapCoordinate: Coordinate
    borders: Record<CardinalDirection, RoomBorder>
    inhabitant: RoomCell['inhabitant']
    treasure: boolean
}

export class LabyrinthMap {
    readonly dimensions: GridDimensions
    readonly mapDimensions: GridDimensions
    private readonly labyrinth: LabyrinthView
    private readonly cells: LabyrinthMapCell[]
    private readonly glyphs: MapGlyphs
    private readonly telemetry: MapTelemetry

    private constructor(labyrinth: LabyrinthView, dimensions: GridDimensions, options: LabyrinthMapOptions) {
        this.labyrinth = labyrinth
        this.dimensions = dimensions
        this.mapDimensions = mapDimensionsFor(dimensions)
        this.glyphs = options.glyphs ?? getMapDisplayConfig().glyphs
        this.telemetry = options.telemetry ?? defaultMapTelemetry
        this.cells = []
        for (let y = 0; y < this.mapDimensions.ySize; y++) {
            for (let x = 0; x < this.mapDimensions.xSize; x++) {
                this.cells.push(isRoomPosition(coordinate(x, y)) ? createRoomCell() : createBorderCell())
            }
        }
    }

    /**
     * Fails with `InvalidArgument` when the labyrinth is absent, the dimensions are not
     * positive integers matching the labyrinth's own, or `options.glyphs` collide.
     */
    static create(
        labyrinth: LabyrinthView | null | undefined,
        xSize: number,
        ySize: number,
        options: LabyrinthMapOptions = {}
    ): MapResult<LabyrinthMap> {
        if (!labyrinth) {
            return fail('InvalidArgument', 'LabyrinthMap was given no labyrinth')
        }
        if (!Number.isInteger(xSize) || !Number.isInteger(ySize) || xSize < 1 || ySize < 1) {
            return fail('InvalidArgument', `LabyrinthMap dimensions must be positive integers, got ${xSize}x${ySize}`)
        }
        const { dimensions } = labyrinth
        if (dimensions.xSize !== xSize || dimensions.ySize !== ySize) {
            return fail(
                'InvalidArgument',
                `LabyrinthMap dimensions ${xSize}x${ySize} do not match the ${dimensions.xSize}x${dimensions.ySize} labyrinth`
            )
        }
        if (options.glyphs) {
            try {
                validateGlyphs(options.glyphs)
            } catch (err) {
                return fail('InvalidArgument', err instanceof Error ? err.message : String(err))
            }
        }
        return ok(new LabyrinthMap(labyrinth, { xSize, ySize }, options))
    }

    // --- Coordinate helpers --------------------------------------------------

    withinBoundsOfMap(c: Coordinate): boolean {
        return isWithinBounds(c, this.mapDimensions)
    }

    /** `OutOfBounds` outside the map. */
    isRoom(c: Coordinate): MapResult<boolean> {
        if (!this.withinBoundsOfMap(c)) return this.outOfMap('isRoom', c)
        return ok(isRoomPosition(c))
    }

    /** Copy of the cell at `c`; the arena itself is only written by `update()`. */
    cellAt(c: Coordinate): MapResult<LabyrinthMapCell> {
        if (!this.withinBoundsOfMap(c)) return this.outOfMap('cellAt', c)
        return ok(cloneCell(this.cells[this.indexOf(c)]))
    }

    labyrinthToMap(c: Coordinate): MapResult<Coordinate> {
        return labyrinthToMap(c, this.dimensions)
    }

    mapToLabyrinth(c: Coordinate): MapResult<Coordinate> {
        return mapToLabyrinth(c, this.dimensions)
    }

    /** Deep copy of the arena, row-major. */
    cellsSnapshot(): LabyrinthMapCell[] {
        return this.cells.map(cloneCell)
    }

    // --- Synchronization -----------------------------------------------------

    /**
     * Synchronize the map from the labyrinth.
     *
     * Every Room is read and classified before any cell is written, so a failed lookup
     * leaves the map untouched.
     */
    update(): MapResult<MapUpdateSummary> {
        const snapshots: RoomSnapshot[] = []
        for (const c of this.labyrinth.roomCoordinates()) {
            const snapshot = this.readRoom(c)
            if (!snapshot.success) return this.report('update', snapshot)
            snapshots.push(snapshot.value)
        }

        for (const snapshot of snapshots) {
            const applied = this.applyRoom(snapshot)
            if (!applied.success) return this.report('update', applied)
        }

        const summary = { roomsVisited: snapshots.length, ...this.countBorders() }
        this.telemetry.trackMapEvent('Map.Update.Completed', summary)
        return ok(summary)
    }

    private readRoom(c: Coordinate): MapResult<RoomSnapshot> {
        const mapCoordinate = this.labyrinthToMap(c)
        if (!mapCoordinate.success) return mapCoordinate
        const room = this.labyrinth.roomAt(c)
        if (!room.success) return room

        const north = room.value.directionCheck('north')
        if (!north.success) return north
        const east = room.value.directionCheck('east')
        if (!east.success) return east
        const south = room.value.directionCheck('south')
        if (!south.success) return south
        const west = room.value.directionCheck('west')
        if (!west.success) return west

        return ok({
            mapCoordinate: mapCoordinate.value,
            borders: { north: north.value, east: east.value, south: south.value, west: west.value },
            inhabitant: room.value.getInhabitant(),
            treasure: room.value.getItem() === 'treasure'
        })
    }

    private applyRoom(snapshot: RoomSnapshot): MapResult<void> {
        const cell = this.cells[this.indexOf(snapshot.mapCoordinate)]
        const inhabitant = setInhabitant(cell, snapshot.inhabitant)
        if (!inhabitant.success) return inhabitant
        const treasure = setTreasure(cell, snapshot.treasure)
        if (!treasure.success) return treasure

        for (const direction of CARDINAL_DIRECTIONS) {
            const border = this.cells[this.indexOf(stepCoordinate(snapshot.mapCoordinate, direction))]
            switch (snapshot.borders[direction]) {
                case 'exit': {
                    const exit = setExit(border, true)
                    if (!exit.success) return exit
                    const opened = removeWall(border, direction)
                    if (!opened.success) return opened
                    break
                }
                case 'room': {
                    const opened = removeWall(border, direction)
                    if (!opened.success) return opened
                    break
                }
                case 'wall':
                    // Never re-close a Border another Room has opened.
                    break
            }
        }
        return ok(undefined)
    }

    private countBorders(): { openBorders: number; exitBorders: number } {
        let openBorders = 0
        let exitBorders = 0
        for (const cell of this.cells) {
            if (isRoomCell(cell)) continue
            const state = borderState(cell)
            if (state === 'open') openBorders++
            if (state === 'exit') exitBorders++
        }
        return { openBorders, exitBorders }
    }

    // --- Rendering -----------------------------------------------------------

    /**
     * Glyph for one Border position.
     * Fails with `OutOfBounds` outside the map and `ShapeMismatch` on a Room position.
     */
    displayBorder(c: Coordinate): MapResult<string> {
        if (!this.withinBoundsOfMap(c)) return this.outOfMap('displayBorder', c)
        const cell = this.cells[this.indexOf(c)]
        if (isRoomCell(cell)) {
            return fail('ShapeMismatch', `displayBorder() was given ${formatCoordinate(c)}, which designates a Room`)
        }
        switch (borderState(cell)) {
            case 'exit':
                return ok(this.glyphs.exit)
            case 'open':
                return ok(this.glyphs.open)
            case 'wall':
                if (c.x % 2 === 0 && c.y % 2 === 0) return ok(this.glyphs.corner)
                return ok(c.y % 2 === 0 ? this.glyphs.wallHorizontal : this.glyphs.wallVertical)
        }
    }

    private displayRoom(cell: RoomCell): string {
        switch (cell.inhabitant) {
            case 'minotaur':
                return this.glyphs.minotaur
            case 'mirror':
                return this.glyphs.mirror
            case 'none':
                return cell.treasure ? this.glyphs.treasure : this.glyphs.emptyRoom
        }
    }

    /** One string per map row, top to bottom. */
    render(): MapResult<string[]> {
        const lines: string[] = []
        for (let y = 0; y < this.mapDimensions.ySize; y++) {
            let line = ''
            for (let x = 0; x < this.mapDimensions.xSize; x++) {
                const c = coordinate(x, y)
                const cell = this.cells[this.indexOf(c)]
                if (isRoomCell(cell)) {
                    line += this.displayRoom(cell)
                    continue
                }
                const glyph = this.displayBorder(c)
                if (!glyph.success) return this.report('render', glyph)
                line += glyph.value
            }
            lines.push(line)
        }
        return ok(lines)
    }

    /** Write the rendered map line by line (default: console). */
    display(write: LineWriter = (line) => console.log(line)): MapResult<void> {
        const lines = this.render()
        if (!lines.success) return lines
        for (const line of lines.value) {
            write(line)
        }
        this.telemetry.trackMapEvent('Map.Display.Rendered', { rows: this.mapDimensions.ySize, columns: this.mapDimensions.xSize })
        return ok(undefined)
    }

    // --- Internals -----------------------------------------------------------

    private indexOf(c: Coordinate): number {
        return c.y * this.mapDimensions.xSize + c.x
    }

    private outOfMap<T = never>(operation: string, c: Coordinate): MapResult<T> {
        return fail(
            'OutOfBounds',
            `${operation}() was given ${formatCoordinate(c)}, outside the ${this.mapDimensions.xSize}x${this.mapDimensions.ySize} map`
        )
    }

    private report(operation: string, result: { success: false; error: MapError }): { success: false; error: MapError } {
        this.telemetry.trackMapEvent('Map.Operation.Failed', { operation, ...result.error })
        return result
    }
}
