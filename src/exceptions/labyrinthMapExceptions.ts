/**
 * Exceptions for callers that prefer to abort on a map failure.
 *
 * The core never throws these itself; it returns `MapResult` values. Driving code
 * (scripts, game loop) converts a failed result with `unwrapResult`.
 */

import type { MapError, MapErrorCode, MapResult } from '../mapResult.js'

/**
 * Base class for all map-related exceptions.
 */
export abstract class LabyrinthMapException extends Error {
    constructor(
        message: string,
        public readonly code: MapErrorCode
    ) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * `none` direction, missing labyrinth handle, or a labyrinth coordinate outside the labyrinth.
 */
export class InvalidArgumentException extends LabyrinthMapException {
    constructor(message: string) {
        super(message, 'InvalidArgument')
    }
}

/**
 * Map coordinate outside the map grid.
 */
export class OutOfBoundsException extends LabyrinthMapException {
    constructor(message: string) {
        super(message, 'OutOfBounds')
    }
}

/**
 * Border-only operation on a Room cell, Room-only operation on a Border cell,
 * or a transform/render on a coordinate of the wrong shape.
 */
export class ShapeMismatchException extends LabyrinthMapException {
    constructor(message: string) {
        super(message, 'ShapeMismatch')
    }
}

/**
 * Translate an error value to its exception.
 * @param context - Prefix added to the message (e.g. the operation name)
 */
export function toLabyrinthMapException(error: MapError, context?: string): LabyrinthMapException {
    const message = context ? `${context}: ${error.message}` : error.message
    switch (error.code) {
        case 'InvalidArgument':
            return new InvalidArgumentException(message)
        case 'OutOfBounds':
            return new OutOfBoundsException(message)
        case 'ShapeMismatch':
            return new ShapeMismatchException(message)
    }
}

/** Return the value of a successful result or throw the matching exception. */
export function unwrapResult<T>(result: MapResult<T>, context?: string): T {
    if (!result.success) {
        throw toLabyrinthMapException(result.error, context)
    }
    return result.value
}
