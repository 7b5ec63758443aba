/**
 * @fileoverview Manifest Emitter
 *
 * Writes `manifest.json`: the published routes with their metadata and the
 * listings, in published order. The templating layer renders HTML from it.
 *
 * @module @plume/engine/emitters/ManifestEmitter
 */

import type { Artifact, ArtifactEmitter, EmitterContext } from "../contracts/ArtifactEmitter.js";
import type { Document } from "../contracts/Document.js";
import type { Site } from "../contracts/Site.js";
import { routeToPermalink } from "../routing/RouteResolver.js";

/**
 * Manifest record for one published document.
 */
export interface ManifestDocument {
    readonly sourcePath: string;
    readonly route: string;
    readonly parameters: readonly string[];
    readonly permalink: string | null;
    readonly title: string;
    readonly description: string | null;
    readonly summary: string | null;
    readonly date: string | null;
    readonly lastmod: string | null;
    readonly draft: boolean;
    readonly tags: readonly string[];
    readonly categories: readonly string[];
    readonly authors: readonly string[];
    readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * Manifest file shape.
 */
export interface SiteManifest {
    readonly site: {
        readonly title: string;
        readonly baseUrl: string;
        readonly description: string | null;
        readonly languageCode: string | null;
        readonly preview: boolean;
        readonly params: Readonly<Record<string, unknown>>;
    };
    readonly home: string | null;
    readonly documents: readonly ManifestDocument[];
    readonly taxonomies: ReadonlyArray<{
        readonly taxonomy: string;
        readonly term: string;
        readonly slug: string;
        readonly route: string;
        readonly documents: readonly string[];
    }>;
    readonly sections: ReadonlyArray<{
        readonly section: string;
        readonly route: string;
        readonly index: string | null;
        readonly documents: readonly string[];
    }>;
    readonly excluded: ReadonlyArray<{ readonly sourcePath: string; readonly reason: string }>;
}

/**
 * Build the manifest object for a site.
 */
export function createManifest(site: Site): SiteManifest {
    const { config } = site;
    const routeOf = (document: Document): string => document.route.path;

    return {
        site: {
            title       : config.title,
            baseUrl     : config.baseUrl,
            description : config.description ?? null,
            languageCode: config.languageCode ?? null,
            preview     : config.preview,
            params      : config.params,
        },
        home     : site.home ? site.home.route.path : null,
        documents: site.published.map((document) => ({
            sourcePath : document.sourcePath,
            route      : document.route.path,
            parameters : document.route.parameters,
            permalink  : routeToPermalink(document.route, config),
            title      : document.metadata.title,
            description: document.metadata.description ?? null,
            summary    : document.summary ?? null,
            date       : document.metadata.date?.toISOString() ?? null,
            lastmod    : document.metadata.lastmod?.toISOString() ?? null,
            draft      : document.metadata.draft,
            tags       : document.metadata.tags,
            categories : document.metadata.categories,
            authors    : document.metadata.authors,
            extra      : document.metadata.extra,
        })),
        taxonomies: site.taxonomies.map((listing) => ({
            taxonomy : listing.taxonomy,
            term     : listing.term,
            slug     : listing.slug,
            route    : listing.route,
            documents: listing.documents.map(routeOf),
        })),
        sections: site.sections.map((listing) => ({
            section  : listing.section,
            route    : listing.route,
            index    : listing.index ? routeOf(listing.index) : null,
            documents: listing.documents.map(routeOf),
        })),
        excluded: site.excluded,
    };
}

export class ManifestEmitter implements ArtifactEmitter {
    readonly id   = "manifest";
    readonly name = "Route manifest";

    emit(site: Site, context: EmitterContext): Artifact[] {
        const manifest = createManifest(site);
        context.logger.debug("Manifest rendered", { documents: manifest.documents.length });

        return [{
            path       : "manifest.json",
            contentType: "application/json",
            content    : `${JSON.stringify(manifest, null, 2)}\n`,
        }];
    }
}
