/**
 * @fileoverview Site Assembler
 *
 * Turns the full set of parsed documents into a Site:
 * 1. Reject route collisions between documents (fatal)
 * 2. Select the published subset (drafts, future and expired documents out)
 * 3. Order it: home first, then newest first, ties by source path descending
 * 4. Build taxonomy and section listings, sitemap and feed entries
 * 5. Reject taxonomy listings whose route a document already claims (fatal)
 *
 * Assembly is a barrier: it needs every document of the build at once.
 *
 * @module @plume/engine/assembler/SiteAssembler
 */

import type { BuildConfig } from "../contracts/BuildConfig.js";
import { getLastModified, getPublishTime, type Document } from "../contracts/Document.js";
import { BuildFailedError, RouteCollisionError } from "../contracts/Errors.js";
import type {
    ExcludedDocument,
    ExclusionReason,
    FeedEntry,
    SectionListing,
    Site,
    SitemapEntry,
    TaxonomyListing,
    TaxonomyName,
} from "../contracts/Site.js";
import { routeToPermalink } from "../routing/RouteResolver.js";

const TAXONOMIES: readonly TaxonomyName[] = ["tags", "categories"];

function byCodeUnit(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Published ordering: newest first, undated last, ties broken by
 * descending source path.
 */
export function compareDocuments(a: Document, b: Document): number {
    const timeA = getPublishTime(a);
    const timeB = getPublishTime(b);

    if (timeA !== timeB) {
        return timeA > timeB ? -1 : 1;
    }
    return byCodeUnit(b.sourcePath, a.sourcePath);
}

/**
 * URL form of a taxonomy term: "Nuxt 3" → "nuxt-3", "Vue.js" → "vue.js".
 */
export function slugifyTerm(term: string): string {
    return term
        .trim()
        .toLowerCase()
        .replace(/\s+/g, "-")
        .replace(/[^\p{L}\p{N}._-]/gu, "")
        .replace(/-+/g, "-")
        .replace(/^-|-$/g, "");
}

/**
 * Find every route claimed by more than one document.
 *
 * @param documents - All parsed documents, drafts included
 * @returns One error per colliding route, ordered by route
 */
export function detectRouteCollisions(documents: readonly Document[]): RouteCollisionError[] {
    const claims = new Map<string, string[]>();

    for (const document of documents) {
        const paths = claims.get(document.route.path) ?? [];
        paths.push(document.sourcePath);
        claims.set(document.route.path, paths);
    }

    return [...claims.entries()]
        .filter(([, paths]) => paths.length > 1)
        .sort(([a], [b]) => byCodeUnit(a, b))
        .map(([route, paths]) => new RouteCollisionError(route, [...paths].sort(byCodeUnit)));
}

/**
 * Find every taxonomy listing whose route is also a document's route.
 *
 * Section listings are exempt: a section's `_index` document is its listing.
 */
export function detectListingCollisions(
    documents: readonly Document[],
    taxonomies: readonly TaxonomyListing[]
): RouteCollisionError[] {
    const owners = new Map<string, string[]>();
    for (const document of documents) {
        owners.set(document.route.path, [...(owners.get(document.route.path) ?? []), document.sourcePath]);
    }

    return taxonomies.flatMap((listing) => {
        const paths = owners.get(listing.route);
        if (!paths) {
            return [];
        }
        const claimants = [...paths].sort(byCodeUnit);
        claimants.push(`${listing.taxonomy} listing "${listing.term}"`);
        return [new RouteCollisionError(listing.route, claimants)];
    });
}

/**
 * Why a document is left out of this build, or null if it is published.
 */
export function getExclusionReason(document: Document, config: BuildConfig): ExclusionReason | null {
    const { draft, date, expiryDate } = document.metadata;
    const now = config.now.getTime();

    if (draft && !config.preview) {
        return "draft";
    }
    if (date && date.getTime() > now && !config.buildFuture) {
        return "future";
    }
    if (expiryDate && expiryDate.getTime() <= now && !config.buildExpired) {
        return "expired";
    }
    return null;
}

/**
 * Group concrete documents by taxonomy term.
 */
function buildTaxonomies(published: readonly Document[]): TaxonomyListing[] {
    const listings: TaxonomyListing[] = [];

    for (const taxonomy of TAXONOMIES) {
        const terms = new Map<string, { term: string; documents: Document[] }>();

        for (const document of published) {
            if (document.route.isParameterized) {
                continue;
            }
            for (const term of document.metadata[taxonomy]) {
                const slug = slugifyTerm(term);
                if (!slug) {
                    continue;
                }
                const entry = terms.get(slug) ?? { term, documents: [] };
                if (!entry.documents.includes(document)) {
                    entry.documents.push(document);
                }
                terms.set(slug, entry);
            }
        }

        const sorted = [...terms.entries()].sort(([a], [b]) => byCodeUnit(a, b));
        for (const [slug, { term, documents }] of sorted) {
            listings.push({ taxonomy, term, slug, route: `/${taxonomy}/${slug}`, documents });
        }
    }

    return listings;
}

/**
 * Group concrete documents by top-level content directory.
 */
function buildSections(published: readonly Document[]): SectionListing[] {
    const sections = new Map<string, { index: Document | null; documents: Document[] }>();

    for (const document of published) {
        const first = document.route.segments[0];
        if (document.route.isParameterized || !document.sourcePath.includes("/") || first?.kind !== "literal") {
            continue;
        }

        const entry = sections.get(first.value) ?? { index: null, documents: [] };
        if (document.route.segments.length === 1) {
            entry.index = document;
        }
        else {
            entry.documents.push(document);
        }
        sections.set(first.value, entry);
    }

    return [...sections.entries()]
        .sort(([a], [b]) => byCodeUnit(a, b))
        .map(([section, { index, documents }]) => ({
            section,
            route: `/${section}`,
            index,
            documents,
        }));
}

function buildSitemap(published: readonly Document[], config: BuildConfig): SitemapEntry[] {
    return published.flatMap((document) => {
        const loc = routeToPermalink(document.route, config);
        if (loc === null) {
            return [];
        }
        const lastmod = getLastModified(document);
        return [{ route: document.route.path, loc, ...(lastmod ? { lastmod } : {}) }];
    });
}

function buildFeed(published: readonly Document[], config: BuildConfig): FeedEntry[] {
    const entries = published.flatMap((document): FeedEntry[] => {
        const link = routeToPermalink(document.route, config);
        if (link === null) {
            return [];
        }
        const description = document.metadata.description ?? document.summary;
        const date = document.metadata.date;
        return [{
            route: document.route.path,
            link,
            title: document.metadata.title,
            ...(description ? { description } : {}),
            ...(date ? { date } : {}),
        }];
    });

    return config.feedLimit > 0 ? entries.slice(0, config.feedLimit) : entries;
}

/**
 * Assemble the site from all successfully parsed documents.
 *
 * @param documents - Every parsed document of the build, in any order
 * @param config - Resolved build configuration
 * @returns The assembled site
 * @throws BuildFailedError holding one RouteCollisionError per colliding route,
 *     including taxonomy listings that land on a document's route
 *
 * @example
 * ```typescript
 * const site = assembleSite(documents, resolveBuildConfig({ ...input, preview: true }));
 * site.published.map((doc) => doc.route.path); // ["/", "/posts/b", "/posts/a"]
 * ```
 */
export function assembleSite(documents: readonly Document[], config: BuildConfig): Site {
    const collisions = detectRouteCollisions(documents);
    if (collisions.length > 0) {
        throw new BuildFailedError(collisions);
    }

    const included: Document[] = [];
    const excluded: ExcludedDocument[] = [];

    for (const document of documents) {
        const reason = getExclusionReason(document, config);
        if (reason) {
            excluded.push({ sourcePath: document.sourcePath, reason });
        }
        else {
            included.push(document);
        }
    }

    excluded.sort((a, b) => byCodeUnit(a.sourcePath, b.sourcePath));

    const home = included.find((document) => document.route.path === "/") ?? null;
    const pages = included.filter((document) => document !== home).sort(compareDocuments);
    const published = home ? [home, ...pages] : pages;

    const taxonomies = buildTaxonomies(published);
    const listingCollisions = detectListingCollisions(documents, taxonomies);
    if (listingCollisions.length > 0) {
        throw new BuildFailedError(listingCollisions);
    }

    return {
        config,
        home,
        pages,
        published,
        excluded,
        taxonomies,
        sections  : buildSections(published),
        sitemap   : buildSitemap(published, config),
        feed      : buildFeed(published, config),
    };
}
