#!/usr/bin/env tsx
/**
 * Render a labyrinth layout as a text map.
 *
 * Usage: tsx scripts/renderLabyrinth.ts [layout.json]
 *
 * Loads the layout (default: the bundled starter labyrinth), builds its map, synchronizes it
 * and prints it. Any failure exits with code 1.
 */
import { unwrapResult } from '../src/exceptions/index.js'
import { LabyrinthMap } from '../src/map/index.js'
import { loadLabyrinthFile, loadStarterLabyrinth } from '../src/seeding/labyrinthLayout.js'

function main(): void {
    const layoutPath = process.argv[2]
    const labyrinth = unwrapResult(layoutPath ? loadLabyrinthFile(layoutPath) : loadStarterLabyrinth(), 'load layout')
    const { xSize, ySize } = labyrinth.dimensions
    const map = unwrapResult(LabyrinthMap.create(labyrinth, xSize, ySize), 'create map')
    unwrapResult(map.update(), 'update map')
    unwrapResult(map.display(), 'display map')
}

try {
    main()
} catch (err) {
    console.error('renderLabyrinth FAILED:', err instanceof Error ? err.message : String(err))
    process.exit(1)
}
