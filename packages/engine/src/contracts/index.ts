/**
 * @fileoverview Contract barrel exports
 *
 * Types and interfaces shared by every stage of a build.
 *
 * @module @plume/engine/contracts
 */

// Build configuration
export type { BuildConfig, BuildConfigInput } from "./BuildConfig.js";
export {
    DEFAULT_EXTENSIONS,
    normalizeExtension,
    resolveBuildConfig,
} from "./BuildConfig.js";

// Documents and routes
export type { Document, DocumentMetadata } from "./Document.js";
export {
    createDocument,
    getLastModified,
    getPublishTime,
} from "./Document.js";
export type {
    CatchAllParamSegment,
    LiteralSegment,
    Route,
    RouteSegment,
    SingleParamSegment,
} from "./Route.js";
export { createRoute, formatSegment } from "./Route.js";

// Assembled site
export type {
    ExcludedDocument,
    ExclusionReason,
    FeedEntry,
    SectionListing,
    Site,
    SitemapEntry,
    TaxonomyListing,
    TaxonomyName,
} from "./Site.js";

// Content source contract
export type { ContentFile, ContentSource } from "./ContentSource.js";

// Artifact emitter contract
export type { Artifact, ArtifactEmitter, EmitterContext } from "./ArtifactEmitter.js";
export { isArtifactEmitter } from "./ArtifactEmitter.js";

// Errors
export type { PublishingErrorCode } from "./Errors.js";
export {
    BuildFailedError,
    DocumentError,
    EmitterError,
    InvalidRouteError,
    MalformedFrontMatterError,
    MissingFieldError,
    PublishingError,
    RouteCollisionError,
    ScanError,
    describeError,
    isDocumentError,
} from "./Errors.js";

// Logging
export type { Logger } from "./Logger.js";
export { consoleLogger, createScopedLogger, silentLogger } from "./Logger.js";

// EventBus contract
export type {
    BuildEventType,
    EventBus,
    EventFilter,
    EventHandler,
    EventPayload,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
