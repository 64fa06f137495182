// Root barrel. Grouped re-exports delegate to per-directory barrels to keep exports close to implementation.

export * from './config/mapDisplayConfig.js'
export * from './coordinate.js'
export * from './domainModels.js'
export * from './exceptions/index.js'
export * from './labyrinth.js'
export * from './map/index.js'
export * from './mapResult.js'
export * from './room.js'
export * from './seeding/labyrinthLayout.js'
export * from './telemetry.js'
export * from './telemetryEvents.js'
