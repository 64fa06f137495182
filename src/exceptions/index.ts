/**
 * Exceptions wrapping map error values.
 */

export {
    LabyrinthMapException,
    InvalidArgumentException,
    OutOfBoundsException,
    ShapeMismatchException,
    toLabyrinthMapException,
    unwrapResult
} from './labyrinthMapExceptions.js'
