/**
 * @fileoverview PublishingEngine
 *
 * The orchestration engine for a build.
 *
 * Pipeline flow:
 * 1. Scan the content source (lazy)
 * 2. Parse and resolve documents on a pool of workers
 * 3. Barrier: wait for every worker
 * 4. Assemble the site
 * 5. Run every artifact emitter
 *
 * Per-document failures are collected and reported; scan failures, route
 * collisions and emitter failures abort the build with BuildFailedError.
 *
 * @module @plume/engine/engine/PublishingEngine
 */

import { resolveBuildConfig, type BuildConfig, type BuildConfigInput } from "../contracts/BuildConfig.js";
import type { ContentFile, ContentSource } from "../contracts/ContentSource.js";
import { createDocument, type Document } from "../contracts/Document.js";
import {
    BuildFailedError,
    EmitterError,
    PublishingError,
    ScanError,
    describeError,
    isDocumentError,
    type DocumentError,
} from "../contracts/Errors.js";
import type { Artifact, ArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import { isArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { consoleLogger, createScopedLogger, type Logger } from "../contracts/Logger.js";
import type { Site } from "../contracts/Site.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { FileSystemContentSource } from "../scanner/FileSystemContentSource.js";
import { parseFrontMatter } from "../parser/FrontMatterParser.js";
import { resolveRoute } from "../routing/RouteResolver.js";
import { assembleSite } from "../assembler/SiteAssembler.js";
import { createDefaultEmitters } from "../emitters/index.js";

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Content source (default: FileSystemContentSource) */
    readonly source?: ContentSource;

    /** Artifact emitters (default: sitemap, feed, robots.txt, manifest) */
    readonly emitters?: readonly ArtifactEmitter[];

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: Logger;
}

/**
 * A document left out of the build because of a per-document error.
 */
export interface DocumentFailure {
    readonly sourcePath: string;
    readonly error: DocumentError;
}

/**
 * Counters for a finished build.
 */
export interface BuildStats {
    readonly scanned: number;
    readonly parsed: number;
    readonly failed: number;
    readonly published: number;
    readonly excluded: number;
    readonly artifacts: number;
    readonly durationMs: number;
}

/**
 * Result of a successful build.
 */
export interface BuildResult {
    readonly traceId: string;
    readonly site: Site;
    readonly artifacts: readonly Artifact[];

    /** Per-document failures, ordered by source path */
    readonly failures: readonly DocumentFailure[];

    readonly stats: BuildStats;
}

/**
 * Documents loaded by the worker pool.
 */
interface LoadedDocuments {
    readonly scanned: number;
    readonly documents: Document[];
    readonly failures: DocumentFailure[];

    /** Scan and read errors: the walk's own error first, then by source path */
    readonly fatal: PublishingError[];
}

const DESCRIPTION_RANGE = { min: 150, max: 160 } as const;

/**
 * Generate a unique trace ID for a build.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `bld_${timestamp}_${random}`;
}

function bySourcePath(a: { sourcePath: string }, b: { sourcePath: string }): number {
    if (a.sourcePath < b.sourcePath) return -1;
    if (a.sourcePath > b.sourcePath) return 1;
    return 0;
}

/**
 * PublishingEngine - The build orchestrator.
 *
 * @example
 * ```typescript
 * const engine = new PublishingEngine();
 *
 * engine.eventBus.subscribe("document:failed", (event) => {
 *     console.warn("Skipped:", event.data);
 * });
 *
 * const result = await engine.build({
 *     contentDir: "./content",
 *     baseUrl   : "https://example.org/",
 *     title     : "My Blog",
 * });
 *
 * for (const artifact of result.artifacts) {
 *     await writeFile(join("public", artifact.path), artifact.content);
 * }
 * ```
 */
export class PublishingEngine {
    private readonly source: ContentSource;
    private readonly logger: Logger;
    private readonly emitters: Map<string, ArtifactEmitter> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        this.logger = config.logger ?? consoleLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.source = config.source ?? new FileSystemContentSource();

        for (const emitter of config.emitters ?? createDefaultEmitters()) {
            this.registerEmitter(emitter);
        }
    }

    /**
     * Register an artifact emitter.
     *
     * @throws Error if the object is not an emitter or its ID is taken
     */
    registerEmitter(emitter: ArtifactEmitter): void {
        if (!isArtifactEmitter(emitter)) {
            throw new Error("Not an artifact emitter");
        }
        if (this.emitters.has(emitter.id)) {
            throw new Error(`Emitter already registered: ${emitter.id}`);
        }

        this.emitters.set(emitter.id, emitter);
        this.logger.debug("Emitter registered", { emitterId: emitter.id });
    }

    /**
     * Unregister an artifact emitter.
     */
    unregisterEmitter(emitterId: string): void {
        if (this.emitters.delete(emitterId)) {
            this.logger.debug("Emitter unregistered", { emitterId });
        }
    }

    /**
     * IDs of the registered emitters, in registration order.
     */
    get emitterIds(): string[] {
        return [...this.emitters.keys()];
    }

    /**
     * Run a build.
     *
     * @param input - Build configuration
     * @returns Assembled site, artifacts and the per-document failure report
     * @throws BuildFailedError with every collected error on a fatal failure
     */
    async build(input: BuildConfigInput): Promise<BuildResult> {
        const config = resolveBuildConfig(input);
        const traceId = generateTraceId();
        const startTime = Date.now();

        this.emit(createEvent("build:starting", {
            contentDir : config.contentDir,
            preview    : config.preview,
            concurrency: config.concurrency,
        }, traceId));
        this.logger.info("Build starting", { contentDir: config.contentDir, preview: config.preview, traceId });

        let loaded: LoadedDocuments;
        try {
            loaded = await this.loadDocuments(config, traceId);
        }
        catch (error) {
            throw this.fail(error, [], traceId);
        }

        const { documents, failures, fatal } = loaded;
        if (fatal.length > 0) {
            throw this.fail(new BuildFailedError(fatal), failures, traceId);
        }

        this.emit(createEvent("build:scanned", {
            scanned: loaded.scanned,
            parsed : documents.length,
            failed : failures.length,
        }, traceId));

        let site: Site;
        try {
            site = assembleSite(documents, config);
        }
        catch (error) {
            throw this.fail(error, failures, traceId);
        }

        this.emit(createEvent("build:assembled", {
            published : site.published.length,
            excluded  : site.excluded.length,
            taxonomies: site.taxonomies.length,
        }, traceId));

        const artifacts = await this.runEmitters(site, failures, traceId);

        const stats: BuildStats = {
            scanned   : loaded.scanned,
            parsed    : documents.length,
            failed    : failures.length,
            published : site.published.length,
            excluded  : site.excluded.length,
            artifacts : artifacts.length,
            durationMs: Date.now() - startTime,
        };

        this.emit(createEvent("build:completed", { ...stats }, traceId));
        this.logger.info("Build completed", { ...stats, traceId });

        return { traceId, site, artifacts, failures, stats };
    }

    /**
     * Parse and resolve one scanned file.
     *
     * @throws DocumentError if the file cannot become a document
     * @throws ScanError if the file cannot be read
     */
    async processFile(file: ContentFile, config: BuildConfig): Promise<Document> {
        let raw: string;
        try {
            raw = await this.source.read(file);
        }
        catch (error) {
            throw new ScanError(config.contentDir, `cannot read ${file.sourcePath}: ${describeError(error)}`, { cause: error });
        }

        const parsed = parseFrontMatter(raw, file.sourcePath);
        const route = resolveRoute(file.sourcePath);

        return createDocument({
            sourcePath: file.sourcePath,
            metadata  : parsed.metadata,
            body      : parsed.body,
            ...(parsed.summary !== undefined ? { summary: parsed.summary } : {}),
            route,
        });
    }

    /**
     * Pull files from the scan with `concurrency` workers.
     *
     * Workers share the scan iterator and append-only collections. A file that
     * cannot be read is recorded and the pull goes on; an error from the walk
     * itself ends it. Results are sorted by source path once every worker is done.
     */
    private async loadDocuments(config: BuildConfig, traceId: string): Promise<LoadedDocuments> {
        const iterator = this.source.scan(config)[Symbol.asyncIterator]();
        const documents: Document[] = [];
        const failures: DocumentFailure[] = [];
        const fatal: Array<{ sourcePath: string; error: PublishingError }> = [];
        let scanned = 0;
        let stopped = false;

        const worker = async (): Promise<void> => {
            while (!stopped) {
                let next: IteratorResult<ContentFile>;
                try {
                    next = await iterator.next();
                }
                catch (error) {
                    stopped = true;
                    if (!(error instanceof PublishingError)) {
                        throw error;
                    }
                    fatal.push({ sourcePath: "", error });
                    return;
                }
                if (next.done) {
                    return;
                }
                scanned++;

                const file = next.value;
                try {
                    const document = await this.processFile(file, config);
                    documents.push(document);
                    this.checkDescription(document);
                    this.emit(createEvent("document:parsed", {
                        sourcePath: file.sourcePath,
                        route     : document.route.path,
                        draft     : document.metadata.draft,
                    }, traceId));
                }
                catch (error) {
                    if (isDocumentError(error)) {
                        this.recordFailure(failures, file, error, traceId);
                    }
                    else if (error instanceof PublishingError) {
                        fatal.push({ sourcePath: file.sourcePath, error });
                    }
                    else {
                        stopped = true;
                        throw error;
                    }
                }
            }
        };

        await Promise.all(Array.from({ length: config.concurrency }, () => worker()));

        documents.sort(bySourcePath);
        failures.sort(bySourcePath);
        fatal.sort(bySourcePath);

        return { scanned, documents, failures, fatal: fatal.map((entry) => entry.error) };
    }

    private recordFailure(failures: DocumentFailure[], file: ContentFile, error: DocumentError, traceId: string): void {
        failures.push({ sourcePath: file.sourcePath, error });
        this.emit(createEvent("document:failed", {
            sourcePath: file.sourcePath,
            code      : error.code,
            error     : error.message,
        }, traceId));
        this.logger.warn("Document skipped", {
            sourcePath: file.sourcePath,
            code      : error.code,
            error     : error.message,
        });
    }

    /**
     * Run every emitter; any failure fails the build after all have run.
     */
    private async runEmitters(
        site: Site,
        failures: readonly DocumentFailure[],
        traceId: string
    ): Promise<Artifact[]> {
        const artifacts: Artifact[] = [];
        const owners = new Map<string, string>();
        const errors: EmitterError[] = [];

        for (const emitter of this.emitters.values()) {
            try {
                const emitted = await emitter.emit(site, {
                    logger: createScopedLogger(this.logger, emitter.id),
                    traceId,
                });

                for (const artifact of emitted) {
                    const owner = owners.get(artifact.path);
                    if (owner !== undefined) {
                        throw new Error(`artifact ${artifact.path} already emitted by ${owner}`);
                    }
                    owners.set(artifact.path, emitter.id);
                    artifacts.push(artifact);

                    this.emit(createEvent("artifact:emitted", {
                        emitterId: emitter.id,
                        path     : artifact.path,
                        bytes    : Buffer.byteLength(artifact.content),
                    }, traceId));
                }
            }
            catch (error) {
                errors.push(new EmitterError(emitter.id, { cause: error }));
            }
        }

        if (errors.length > 0) {
            throw this.fail(new BuildFailedError(errors), failures, traceId);
        }

        return artifacts;
    }

    /**
     * Log a description outside the recommended length.
     */
    private checkDescription(document: Document): void {
        const length = document.metadata.description?.length;
        if (length !== undefined && (length < DESCRIPTION_RANGE.min || length > DESCRIPTION_RANGE.max)) {
            this.logger.debug("Description length outside recommended range", {
                sourcePath: document.sourcePath,
                length,
                ...DESCRIPTION_RANGE,
            });
        }
    }

    /**
     * Turn a fatal error into a BuildFailedError carrying every error of the build.
     * Errors that are not pipeline errors are returned unchanged.
     */
    private fail(error: unknown, failures: readonly DocumentFailure[], traceId: string): unknown {
        if (!(error instanceof PublishingError)) {
            this.emit(createEvent("build:failed", { errors: [{ code: "UNEXPECTED", message: describeError(error) }] }, traceId));
            this.logger.error("Build crashed", { error: describeError(error), traceId });
            return error;
        }

        const fatal = error instanceof BuildFailedError ? error.errors : [error];
        const all = new BuildFailedError([...fatal, ...failures.map((failure) => failure.error)]);

        this.emit(createEvent("build:failed", {
            errors: all.errors.map((item) => ({ code: item.code, message: item.message })),
        }, traceId));
        this.logger.error("Build failed", {
            errors: all.errors.length,
            traceId,
        });

        return all;
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
