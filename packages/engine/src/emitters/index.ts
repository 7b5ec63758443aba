/**
 * @fileoverview Emitter barrel exports
 *
 * @module @plume/engine/emitters
 */

import type { ArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import { FeedEmitter } from "./FeedEmitter.js";
import { ManifestEmitter } from "./ManifestEmitter.js";
import { RobotsEmitter } from "./RobotsEmitter.js";
import { SitemapEmitter } from "./SitemapEmitter.js";

export { SitemapEmitter, type SitemapEmitterConfig } from "./SitemapEmitter.js";
export { FeedEmitter, type FeedEmitterConfig } from "./FeedEmitter.js";
export { RobotsEmitter, type RobotsEmitterConfig } from "./RobotsEmitter.js";
export {
    ManifestEmitter,
    createManifest,
    type ManifestDocument,
    type SiteManifest,
} from "./ManifestEmitter.js";
export { escapeXml } from "./xml.js";

/**
 * The standard emitter set: sitemap, feed, robots.txt and manifest.
 */
export function createDefaultEmitters(): ArtifactEmitter[] {
    return [
        new SitemapEmitter(),
        new FeedEmitter(),
        new RobotsEmitter(),
        new ManifestEmitter(),
    ];
}
