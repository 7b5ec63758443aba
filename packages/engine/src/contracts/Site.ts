/**
 * @fileoverview Site Contract
 *
 * The assembled site: the published, ordered document set and the
 * aggregates derived from it. Produced by the assembler, consumed by
 * artifact emitters and the external templating layer.
 *
 * @module @plume/engine/contracts/Site
 */

import type { BuildConfig } from "./BuildConfig.js";
import type { Document } from "./Document.js";

/**
 * Taxonomies the assembler groups documents by.
 */
export type TaxonomyName = "tags" | "categories";

/**
 * All documents sharing one taxonomy term.
 */
export interface TaxonomyListing {
    readonly taxonomy: TaxonomyName;

    /** Term as first spelled in the published order */
    readonly term: string;

    /** URL form of the term */
    readonly slug: string;

    /** Listing route, e.g. "/tags/vue.js" */
    readonly route: string;

    /** Matching documents in published order */
    readonly documents: readonly Document[];
}

/**
 * All documents under one top-level directory.
 */
export interface SectionListing {
    /** Directory name, e.g. "posts" */
    readonly section: string;

    /** Listing route, e.g. "/posts" */
    readonly route: string;

    /** Document whose route is the section route, if any */
    readonly index: Document | null;

    /** Documents inside the section in published order, index excluded */
    readonly documents: readonly Document[];
}

/**
 * One sitemap URL.
 */
export interface SitemapEntry {
    readonly route: string;
    readonly loc: string;
    readonly lastmod?: Date;
}

/**
 * One syndication feed item.
 */
export interface FeedEntry {
    readonly route: string;
    readonly link: string;
    readonly title: string;
    readonly description?: string;
    readonly date?: Date;
}

/**
 * Why a parsed document was left out of the published subset.
 */
export type ExclusionReason = "draft" | "future" | "expired";

/**
 * A parsed document the current build does not publish.
 */
export interface ExcludedDocument {
    readonly sourcePath: string;
    readonly reason: ExclusionReason;
}

/**
 * Assembled site.
 */
export interface Site {
    readonly config: BuildConfig;

    /** Document at route "/", kept apart from the dated ordering */
    readonly home: Document | null;

    /** Published documents other than home, newest first */
    readonly pages: readonly Document[];

    /** Home (if any) followed by pages */
    readonly published: readonly Document[];

    /** Parsed documents left out of this build */
    readonly excluded: readonly ExcludedDocument[];

    readonly taxonomies: readonly TaxonomyListing[];
    readonly sections: readonly SectionListing[];
    readonly sitemap: readonly SitemapEntry[];
    readonly feed: readonly FeedEntry[];
}
