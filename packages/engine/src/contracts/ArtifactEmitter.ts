/**
 * Artifact Emitter Contract
 *
 * Emitters turn an assembled site into output files. The engine runs every
 * registered emitter after assembly; the caller decides where artifacts are
 * written.
 *
 * Design principles:
 * - Pure: emitters return artifacts, they do not write files
 * - Independent: emitters do not see each other's output
 * - Fatal: an emitter that throws fails the build
 */

import type { Site } from "./Site.js";
import type { Logger } from "./Logger.js";

/**
 * An output file.
 */
export interface Artifact {
    /** Output path relative to the publish directory, e.g. "sitemap.xml" */
    readonly path: string;

    /** MIME type of the content */
    readonly contentType: string;

    /** File content */
    readonly content: string;
}

/**
 * Context provided to emitters.
 */
export interface EmitterContext {
    /** Logger scoped to the emitter */
    readonly logger: Logger;

    /** Build trace ID */
    readonly traceId: string;
}

/**
 * Artifact Emitter interface.
 *
 * @example
 * ```typescript
 * const routesEmitter: ArtifactEmitter = {
 *     id: "routes",
 *     emit(site) {
 *         return [{
 *             path       : "routes.txt",
 *             contentType: "text/plain",
 *             content    : site.published.map((doc) => doc.route.path).join("\n"),
 *         }];
 *     },
 * };
 * ```
 */
export interface ArtifactEmitter {
    /**
     * Unique identifier for this emitter.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Produce artifacts for an assembled site.
     *
     * @param site - The assembled site (read-only)
     * @param context - Logger and trace ID
     * @returns Artifacts to write
     */
    emit(site: Site, context: EmitterContext): Promise<readonly Artifact[]> | readonly Artifact[];
}

/**
 * Type guard to check if an object is an ArtifactEmitter.
 *
 * @param obj - The object to check
 * @returns True if the object implements ArtifactEmitter
 */
export function isArtifactEmitter(obj: unknown): obj is ArtifactEmitter {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "emit" in obj &&
        typeof obj.emit === "function"
    );
}
