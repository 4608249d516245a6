/**
 * Error taxonomy. All of these are recoverable by the caller and are
 * thrown synchronously from the operation that detected them.
 */

export type TreeErrorCode =
    | 'STRUCTURAL'
    | 'NO_SELECTION'
    | 'EMPTY_CLIPBOARD'
    | 'ROOT_IMMUTABLE'
    | 'INCOMPATIBLE_FORMAT'
    | 'SAVE';

export class TreeError extends Error {
    readonly code: TreeErrorCode;

    constructor(code: TreeErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** An edit would break a tree invariant. */
export class StructuralError extends TreeError {
    constructor(message: string) {
        super('STRUCTURAL', message);
    }
}

export class NoSelectionError extends TreeError {
    constructor(message = 'No selection') {
        super('NO_SELECTION', message);
    }
}

export class EmptyClipboardError extends TreeError {
    constructor(message = 'Clipboard is empty') {
        super('EMPTY_CLIPBOARD', message);
    }
}

/** The root cannot be reordered among siblings it does not have. */
export class RootImmutableError extends TreeError {
    constructor(message = 'Cannot move the root') {
        super('ROOT_IMMUTABLE', message);
    }
}

export class IncompatibleFormatError extends TreeError {
    /** Lowest version able to read the file, when the file is too new. */
    readonly requiredVersion: string | null;

    constructor(message: string, requiredVersion: string | null = null, options?: { cause?: unknown }) {
        super('INCOMPATIBLE_FORMAT', message, options);
        this.requiredVersion = requiredVersion;
    }
}

/** Save was requested with no path and no remembered path. */
export class SaveError extends TreeError {
    constructor(message = 'No save path') {
        super('SAVE', message);
    }
}

export function isTreeError(value: unknown): value is TreeError {
    return value instanceof TreeError;
}
