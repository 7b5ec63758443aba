/**
 * @fileoverview Build Configuration
 *
 * Site-wide settings threaded explicitly through scan, parse, resolve and
 * assemble. Nothing in the pipeline reads configuration from global state.
 *
 * @module @plume/engine/contracts/BuildConfig
 */

/**
 * Extensions treated as documents when none are configured.
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [".md", ".markdown", ".mdx"];

/**
 * Build configuration as supplied by callers.
 */
export interface BuildConfigInput {
    /** Root of the content tree */
    readonly contentDir: string;

    /** Absolute site URL, e.g. "https://example.org/" */
    readonly baseUrl: string;

    /** Site title, used by the feed channel */
    readonly title: string;

    /** Site description, used by the feed channel */
    readonly description?: string;

    /** Language code, e.g. "en-us" */
    readonly languageCode?: string;

    /** Include drafts (preview build) */
    readonly preview?: boolean;

    /** Include documents dated after `now` (default: true) */
    readonly buildFuture?: boolean;

    /** Include documents past their expiry date (default: true) */
    readonly buildExpired?: boolean;

    /** Document extension allow-list */
    readonly extensions?: readonly string[];

    /** Append "/" to permalinks (default: true) */
    readonly trailingSlash?: boolean;

    /** Maximum feed entries, 0 or less for no limit (default: 0) */
    readonly feedLimit?: number;

    /** Parse/resolve worker count (default: 8) */
    readonly concurrency?: number;

    /** Reference time for the future/expiry window, when enabled (default: build start) */
    readonly now?: Date;

    /** Opaque values for the templating layer */
    readonly params?: Readonly<Record<string, unknown>>;
}

/**
 * Build configuration with defaults applied.
 */
export interface BuildConfig extends Required<Omit<BuildConfigInput, "description" | "languageCode">> {
    readonly description?: string;
    readonly languageCode?: string;
}

/**
 * Lowercase an extension and give it a leading dot ("MD" → ".md").
 */
export function normalizeExtension(ext: string): string {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Apply defaults to a configuration input.
 *
 * @param input - Caller-supplied configuration
 * @returns Configuration with every optional setting filled in
 */
export function resolveBuildConfig(input: BuildConfigInput): BuildConfig {
    return {
        ...input,
        preview      : input.preview ?? false,
        buildFuture  : input.buildFuture ?? true,
        buildExpired : input.buildExpired ?? true,
        extensions   : (input.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension),
        trailingSlash: input.trailingSlash ?? true,
        feedLimit    : input.feedLimit ?? 0,
        concurrency  : Math.max(1, Math.floor(input.concurrency ?? 8)),
        now          : input.now ?? new Date(),
        params       : input.params ?? {},
    };
}
