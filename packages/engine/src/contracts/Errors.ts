/**
 * @fileoverview Publishing Errors
 *
 * Error taxonomy for the publishing pipeline.
 *
 * Per-document errors (missing field, malformed front matter, invalid route)
 * exclude one document and are collected into the build report. Build-level
 * errors (scan failure, route collision, emitter failure) abort the build.
 *
 * @module @plume/engine/contracts/Errors
 */

/**
 * Machine-readable error codes.
 */
export type PublishingErrorCode =
    | "SCAN_FAILED"
    | "MISSING_FIELD"
    | "MALFORMED_FRONT_MATTER"
    | "INVALID_ROUTE"
    | "ROUTE_COLLISION"
    | "EMITTER_FAILED"
    | "BUILD_FAILED";

/**
 * Base class for every pipeline error.
 */
export abstract class PublishingError extends Error {
    abstract readonly code: PublishingErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Content root missing, not a directory, or unreadable.
 */
export class ScanError extends PublishingError {
    readonly code = "SCAN_FAILED";

    constructor(readonly root: string, reason: string, options?: { cause?: unknown }) {
        super(`Cannot scan content root ${root}: ${reason}`, options);
    }
}

/**
 * Base class for errors that exclude a single document.
 */
export abstract class DocumentError extends PublishingError {
    constructor(readonly sourcePath: string, message: string, options?: { cause?: unknown }) {
        super(`${sourcePath}: ${message}`, options);
    }
}

/**
 * A required front-matter field is absent or blank.
 */
export class MissingFieldError extends DocumentError {
    readonly code = "MISSING_FIELD";

    constructor(sourcePath: string, readonly field: string) {
        super(sourcePath, `missing required field "${field}"`);
    }
}

/**
 * The front-matter block cannot be decoded.
 */
export class MalformedFrontMatterError extends DocumentError {
    readonly code = "MALFORMED_FRONT_MATTER";

    constructor(sourcePath: string, readonly reason: string, options?: { cause?: unknown }) {
        super(sourcePath, `malformed front matter: ${reason}`, options);
    }
}

/**
 * A path segment uses the placeholder syntax incorrectly.
 */
export class InvalidRouteError extends DocumentError {
    readonly code = "INVALID_ROUTE";

    constructor(sourcePath: string, readonly segment: string, readonly reason: string) {
        super(sourcePath, `invalid route segment "${segment}": ${reason}`);
    }
}

/**
 * Two or more documents resolve to the same route.
 */
export class RouteCollisionError extends PublishingError {
    readonly code = "ROUTE_COLLISION";

    constructor(readonly route: string, readonly sourcePaths: readonly string[]) {
        super(`Route ${route} is claimed by ${sourcePaths.join(", ")}`);
    }
}

/**
 * An artifact emitter threw.
 */
export class EmitterError extends PublishingError {
    readonly code = "EMITTER_FAILED";

    constructor(readonly emitterId: string, options?: { cause?: unknown }) {
        super(`Emitter ${emitterId} failed: ${describeError(options?.cause)}`, options);
    }
}

/**
 * Fatal build failure carrying every error collected during the build.
 */
export class BuildFailedError extends PublishingError {
    readonly code = "BUILD_FAILED";

    constructor(readonly errors: readonly PublishingError[]) {
        super(`Build failed with ${errors.length} error${errors.length === 1 ? "" : "s"}`);
    }
}

/**
 * Type guard for per-document errors.
 */
export function isDocumentError(error: unknown): error is DocumentError {
    return error instanceof DocumentError;
}

/**
 * Message text of an unknown thrown value.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
