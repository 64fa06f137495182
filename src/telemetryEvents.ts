// Canonical telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: all event names must be referenced from this registry.

export const MAP_EVENT_NAMES = [
    // Map synchronization & rendering
    'Map.Update.Completed', // roomsVisited, openBorders, exitBorders
    'Map.Display.Rendered', // rows, columns
    'Map.Operation.Failed', // operation, code, message
    // Labyrinth collaborator
    'Labyrinth.Layout.Loaded',
    'Labyrinth.Layout.Rejected',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid'
] as const

export type MapEventName = (typeof MAP_EVENT_NAMES)[number]

export function isMapEventName(name: string): name is MapEventName {
    return (MAP_EVENT_NAMES as readonly string[]).includes(name)
}

export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
