/**
 * ContentSource Contract
 *
 * Content sources are passive: the engine pulls candidate files from a
 * source during a build and asks it for each file's raw text.
 *
 * Design principles:
 * - Lazy: scan() yields files one at a time
 * - Restartable: every scan() call starts a fresh walk
 * - Fatal on a missing root: scan() throws ScanError
 */

import type { BuildConfig } from "./BuildConfig.js";

/**
 * A candidate document discovered by a scan.
 */
export interface ContentFile {
    /** Location the source can read the file from */
    readonly absolutePath: string;

    /** POSIX path relative to the content root, e.g. "posts/a.md" */
    readonly sourcePath: string;
}

/**
 * ContentSource interface.
 *
 * @example
 * ```typescript
 * const source: ContentSource = new FileSystemContentSource();
 *
 * for await (const file of source.scan(config)) {
 *     const raw = await source.read(file);
 *     console.log(file.sourcePath, raw.length);
 * }
 * ```
 */
export interface ContentSource {
    /** Unique identifier for this source */
    readonly id: string;

    /**
     * Walk the content tree configured in `config.contentDir`.
     *
     * @throws ScanError if the root is missing or unreadable
     */
    scan(config: BuildConfig): AsyncIterable<ContentFile>;

    /**
     * Read a scanned file's raw text.
     */
    read(file: ContentFile): Promise<string>;
}
