/**
 * @fileoverview Robots Emitter
 *
 * Writes `robots.txt` allowing every crawler and pointing at the sitemap.
 *
 * @module @plume/engine/emitters/RobotsEmitter
 */

import type { Artifact, ArtifactEmitter, EmitterContext } from "../contracts/ArtifactEmitter.js";
import type { Site } from "../contracts/Site.js";

/**
 * Configuration for RobotsEmitter
 */
export interface RobotsEmitterConfig {
    /** Sitemap path the file points at (default: "sitemap.xml") */
    readonly sitemapPath?: string;
}

export class RobotsEmitter implements ArtifactEmitter {
    readonly id   = "robots";
    readonly name = "robots.txt";

    private readonly sitemapPath: string;

    constructor(config: RobotsEmitterConfig = {}) {
        this.sitemapPath = config.sitemapPath ?? "sitemap.xml";
    }

    emit(site: Site, _context: EmitterContext): Artifact[] {
        const sitemapUrl = `${site.config.baseUrl.replace(/\/+$/, "")}/${this.sitemapPath}`;

        return [{
            path       : "robots.txt",
            contentType: "text/plain",
            content    : `User-agent: *\nAllow: /\n\nSitemap: ${sitemapUrl}\n`,
        }];
    }
}
