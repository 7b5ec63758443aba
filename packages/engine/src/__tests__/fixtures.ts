/**
 * Shared builders for engine tests.
 */

import { vi, type Mock } from "vitest";
import { resolveBuildConfig, type BuildConfig, type BuildConfigInput } from "../contracts/BuildConfig.js";
import type { ContentFile, ContentSource } from "../contracts/ContentSource.js";
import { createDocument, type Document, type DocumentMetadata } from "../contracts/Document.js";
import type { Logger } from "../contracts/Logger.js";
import { resolveRoute } from "../routing/RouteResolver.js";

export const NOW = new Date("2024-06-01T00:00:00.000Z");

/**
 * Build configuration with a fixed clock.
 */
export function makeConfig(overrides: Partial<BuildConfigInput> = {}): BuildConfig {
    return resolveBuildConfig({
        contentDir: "/content",
        baseUrl   : "https://example.org/",
        title     : "Test Site",
        now       : NOW,
        ...overrides,
    });
}

/**
 * Document with its route resolved from the source path.
 */
export function makeDocument(
    sourcePath: string,
    metadata: Partial<DocumentMetadata> = {},
    summary?: string
): Document {
    return createDocument({
        sourcePath,
        metadata: {
            title     : `Title of ${sourcePath}`,
            draft     : false,
            tags      : [],
            categories: [],
            authors   : [],
            extra     : {},
            ...metadata,
        },
        body : "",
        ...(summary !== undefined ? { summary } : {}),
        route: resolveRoute(sourcePath),
    });
}

export function utc(date: string): Date {
    return new Date(`${date}T00:00:00.000Z`);
}

/**
 * Logger whose methods are spies.
 */
export interface MockLogger extends Logger {
    debug: Mock;
    info: Mock;
    warn: Mock;
    error: Mock;
}

export function createMockLogger(): MockLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Content source over an in-memory map of source path to raw text.
 */
export class MemoryContentSource implements ContentSource {
    readonly id = "memory";

    constructor(private readonly files: Record<string, string>) {}

    async *scan(_config: BuildConfig): AsyncGenerator<ContentFile> {
        for (const sourcePath of Object.keys(this.files).sort()) {
            yield { absolutePath: `/memory/${sourcePath}`, sourcePath };
        }
    }

    async read(file: ContentFile): Promise<string> {
        const content = this.files[file.sourcePath];
        if (content === undefined) {
            throw new Error(`no such file: ${file.sourcePath}`);
        }
        return content;
    }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}
