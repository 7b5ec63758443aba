/**
 * @fileoverview Plume Engine
 *
 * Markdown-directory publishing core.
 *
 * The engine provides:
 * - Lazy, deterministic content scanning
 * - YAML/JSON front-matter parsing with per-document error isolation
 * - Route resolution with index collapse and parameterized segments
 * - Site assembly (published subset, ordering, listings, sitemap, feed)
 * - Artifact emitters for sitemap.xml, index.xml, robots.txt and manifest.json
 *
 * @module @plume/engine
 * @example
 * ```typescript
 * import { PublishingEngine } from "@plume/engine";
 *
 * const engine = new PublishingEngine();
 * const result = await engine.build({
 *     contentDir: "./content",
 *     baseUrl   : "https://example.org/",
 *     title     : "My Blog",
 * });
 *
 * result.site.published.map((doc) => doc.route.path);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Pipeline stages
// ============================================================================

export {
    FileSystemContentSource,
    hasDocumentExtension,
    scanContent,
} from "./scanner/FileSystemContentSource.js";
export {
    extractSummary,
    parseDateValue,
    parseFrontMatter,
    splitFrontMatter,
    type FrontMatterBlock,
    type ParsedContent,
} from "./parser/FrontMatterParser.js";
export {
    parseSegment,
    resolveRoute,
    routeToPermalink,
    type ResolveRouteOptions,
} from "./routing/RouteResolver.js";
export {
    assembleSite,
    compareDocuments,
    detectListingCollisions,
    detectRouteCollisions,
    getExclusionReason,
    slugifyTerm,
} from "./assembler/SiteAssembler.js";

// ============================================================================
// Emitters
// ============================================================================

export * from "./emitters/index.js";
export { EmitterLoader, collectEmitters, type EmitterLoaderConfig } from "./plugins/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    PublishingEngine,
    type BuildResult,
    type BuildStats,
    type DocumentFailure,
    type EngineConfig,
} from "./engine/index.js";
