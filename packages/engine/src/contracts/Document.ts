/**
 * Document Contract
 *
 * The base shape of every content unit that flows through the publishing
 * pipeline: a blog post or a standalone page.
 *
 * Documents are immutable once created. The scanner fixes the source path,
 * the parser fills in metadata and body, the resolver derives the route.
 */

import type { Route } from "./Route.js";

/**
 * Front-matter fields the pipeline understands.
 */
export interface DocumentMetadata {
    /** Page title (required) */
    readonly title: string;

    /** Short description, 150-160 characters recommended for SEO */
    readonly description?: string;

    /** Publish date */
    readonly date?: Date;

    /** Last-modified date */
    readonly lastmod?: Date;

    /** Date after which the document is no longer published */
    readonly expiryDate?: Date;

    /** Draft documents only appear in preview builds */
    readonly draft: boolean;

    /** Tags, duplicates removed, first spelling kept */
    readonly tags: readonly string[];

    /** Categories, duplicates removed, first spelling kept */
    readonly categories: readonly string[];

    /** Authors in declared order */
    readonly authors: readonly string[];

    /** Unrecognized front-matter keys, kept as decoded */
    readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * Document
 *
 * @example
 * ```typescript
 * const doc: Document = {
 *     sourcePath: "posts/nuxt-content.md",
 *     metadata  : { title: "Nuxt Content", draft: false, tags: ["nuxt"], categories: [], authors: [], extra: {} },
 *     body      : "# Nuxt Content\n...",
 *     route     : resolveRoute("posts/nuxt-content.md"),
 * };
 * ```
 */
export interface Document {
    /** POSIX path relative to the content root */
    readonly sourcePath: string;

    /** Decoded front matter */
    readonly metadata: DocumentMetadata;

    /** Raw text after the front-matter block */
    readonly body: string;

    /** Text before the `<!--more-->` divider, if the body has one */
    readonly summary?: string;

    /** Canonical output route */
    readonly route: Route;
}

/**
 * Factory function to create a Document.
 */
export function createDocument(data: Document): Document {
    return {
        sourcePath: data.sourcePath,
        metadata  : data.metadata,
        body      : data.body,
        ...(data.summary !== undefined ? { summary: data.summary } : {}),
        route     : data.route,
    };
}

/**
 * Publish date used for ordering; undated documents sort last.
 */
export function getPublishTime(document: Document): number {
    return document.metadata.date?.getTime() ?? Number.NEGATIVE_INFINITY;
}

/**
 * Date reported to sitemaps: lastmod, falling back to the publish date.
 */
export function getLastModified(document: Document): Date | undefined {
    return document.metadata.lastmod ?? document.metadata.date;
}
