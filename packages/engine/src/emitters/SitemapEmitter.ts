/**
 * @fileoverview Sitemap Emitter
 *
 * Writes `sitemap.xml` in the sitemaps.org 0.9 format, one `<url>` per
 * sitemap entry of the site.
 *
 * @module @plume/engine/emitters/SitemapEmitter
 */

import type { Artifact, ArtifactEmitter, EmitterContext } from "../contracts/ArtifactEmitter.js";
import type { Site } from "../contracts/Site.js";
import { XML_DECLARATION, xmlElement } from "./xml.js";

/**
 * Configuration for SitemapEmitter
 */
export interface SitemapEmitterConfig {
    /** Output path (default: "sitemap.xml") */
    readonly path?: string;
}

/**
 * Sitemap Emitter
 *
 * @example
 * ```typescript
 * const [artifact] = await new SitemapEmitter().emit(site, context);
 * artifact.path; // "sitemap.xml"
 * ```
 */
export class SitemapEmitter implements ArtifactEmitter {
    readonly id   = "sitemap";
    readonly name = "Sitemap";

    readonly path: string;

    constructor(config: SitemapEmitterConfig = {}) {
        this.path = config.path ?? "sitemap.xml";
    }

    emit(site: Site, context: EmitterContext): Artifact[] {
        const urls = site.sitemap.map((entry) => {
            const lastmod = entry.lastmod ? `\n    ${xmlElement("lastmod", entry.lastmod.toISOString())}` : "";
            return `  <url>\n    ${xmlElement("loc", entry.loc)}${lastmod}\n  </url>`;
        });

        const content = [
            XML_DECLARATION,
            `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
            ...urls,
            `</urlset>`,
            "",
        ].join("\n");

        context.logger.debug("Sitemap rendered", { urls: urls.length });

        return [{ path: this.path, contentType: "application/xml", content }];
    }
}
