/**
 * Error values for the map core.
 *
 * Every failing operation returns `{ success: false, error }` instead of throwing, so callers
 * handle each failure code explicitly. Checks always run before any mutation.
 */

/**
 * - `InvalidArgument`: `none` passed as a direction, absent labyrinth handle, or a
 *   labyrinth coordinate outside the labyrinth
 * - `OutOfBounds`: a map coordinate outside the map grid
 * - `ShapeMismatch`: an operation invoked on a cell of the other shape
 */
export type MapErrorCode = 'InvalidArgument' | 'OutOfBounds' | 'ShapeMismatch'

export interface MapError {
    code: MapErrorCode
    message: string
}

export type MapResult<T> = { success: true; value: T } | { success: false; error: MapError }

export function ok<T>(value: T): MapResult<T> {
    return { success: true, value }
}

export function fail<T = never>(code: MapErrorCode, message: string): MapResult<T> {
    return { success: false, error: { code, message } }
}
