/**
 * @fileoverview File System Content Source
 *
 * Walks a content directory and yields every file whose extension is on the
 * allow-list. Images, theme assets and hidden entries are skipped.
 *
 * The walk is lazy and restartable: each scan() call opens the tree again
 * and directory entries are visited in code-unit order, so two scans of an
 * unchanged tree yield the same sequence.
 *
 * @module @plume/engine/scanner/FileSystemContentSource
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import type { BuildConfig } from "../contracts/BuildConfig.js";
import type { ContentFile, ContentSource } from "../contracts/ContentSource.js";
import { ScanError, describeError } from "../contracts/Errors.js";

/**
 * Check whether a file name has an allowed document extension.
 *
 * @param fileName - File name or path
 * @param extensions - Normalized extensions (lowercase, leading dot)
 */
export function hasDocumentExtension(fileName: string, extensions: readonly string[]): boolean {
    return extensions.includes(extname(fileName).toLowerCase());
}

/**
 * Compare strings by UTF-16 code units.
 */
function byCodeUnit(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Content source backed by the local file system.
 *
 * @example
 * ```typescript
 * const source = new FileSystemContentSource();
 * const config = resolveBuildConfig({ contentDir: "./content", baseUrl: "https://example.org/", title: "Blog" });
 *
 * for await (const file of source.scan(config)) {
 *     console.log(file.sourcePath); // "posts/a.md"
 * }
 * ```
 */
export class FileSystemContentSource implements ContentSource {
    readonly id = "filesystem";

    async *scan(config: BuildConfig): AsyncGenerator<ContentFile> {
        const root = config.contentDir;

        try {
            const rootStat = await stat(root);
            if (!rootStat.isDirectory()) {
                throw new ScanError(root, "not a directory");
            }
        }
        catch (error) {
            if (error instanceof ScanError) {
                throw error;
            }
            throw new ScanError(root, describeError(error), { cause: error });
        }

        yield* this.walk(root, root, [], config.extensions);
    }

    async read(file: ContentFile): Promise<string> {
        return readFile(file.absolutePath, "utf-8");
    }

    private async *walk(
        root: string,
        dir: string,
        relativeSegments: readonly string[],
        extensions: readonly string[]
    ): AsyncGenerator<ContentFile> {
        const entries = await this.readEntries(root, dir);
        entries.sort((a, b) => byCodeUnit(a.name, b.name));

        for (const entry of entries) {
            if (entry.name.startsWith(".")) {
                continue;
            }

            const segments = [...relativeSegments, entry.name];
            const absolutePath = join(dir, entry.name);

            if (entry.isDirectory()) {
                yield* this.walk(root, absolutePath, segments, extensions);
            }
            else if (entry.isFile() && hasDocumentExtension(entry.name, extensions)) {
                yield {
                    absolutePath,
                    sourcePath: segments.join("/"),
                };
            }
        }
    }

    private async readEntries(root: string, dir: string) {
        try {
            return await readdir(dir, { withFileTypes: true });
        }
        catch (error) {
            throw new ScanError(root, `cannot read ${dir}: ${describeError(error)}`, { cause: error });
        }
    }
}

/**
 * Scan a content tree on the local file system.
 *
 * @param config - Build configuration (contentDir and extensions are used)
 * @returns Lazy sequence of candidate documents
 * @throws ScanError when iterated if the root is missing or unreadable
 */
export function scanContent(config: BuildConfig): AsyncIterable<ContentFile> {
    return new FileSystemContentSource().scan(config);
}
