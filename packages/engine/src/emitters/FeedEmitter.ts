/**
 * @fileoverview Feed Emitter
 *
 * Writes an RSS 2.0 feed of the site's feed entries. The channel takes its
 * title, link, description and language from the build configuration.
 *
 * @module @plume/engine/emitters/FeedEmitter
 */

import type { Artifact, ArtifactEmitter, EmitterContext } from "../contracts/ArtifactEmitter.js";
import type { FeedEntry, Site } from "../contracts/Site.js";
import { XML_DECLARATION, escapeXml, xmlElement } from "./xml.js";

/**
 * Configuration for FeedEmitter
 */
export interface FeedEmitterConfig {
    /** Output path (default: "index.xml") */
    readonly path?: string;
}

/**
 * Feed Emitter
 *
 * @example
 * ```typescript
 * const [artifact] = await new FeedEmitter().emit(site, context);
 * artifact.path; // "index.xml"
 * ```
 */
export class FeedEmitter implements ArtifactEmitter {
    readonly id   = "feed";
    readonly name = "RSS Feed";

    readonly path: string;

    constructor(config: FeedEmitterConfig = {}) {
        this.path = config.path ?? "index.xml";
    }

    emit(site: Site, context: EmitterContext): Artifact[] {
        const { config } = site;
        const channelLink = config.baseUrl.replace(/\/+$/, "") + "/";
        const feedUrl = channelLink + this.path;
        const newest = site.feed.reduce<Date | undefined>(
            (latest, entry) => (entry.date && (!latest || entry.date > latest) ? entry.date : latest),
            undefined
        );

        const channel = [
            `    ${xmlElement("title", config.title)}`,
            `    ${xmlElement("link", channelLink)}`,
            `    ${xmlElement("description", config.description ?? `Recent content on ${config.title}`)}`,
            ...(config.languageCode ? [`    ${xmlElement("language", config.languageCode)}`] : []),
            ...(newest ? [`    ${xmlElement("lastBuildDate", newest.toUTCString())}`] : []),
            `    <atom:link href="${escapeXml(feedUrl)}" rel="self" type="application/rss+xml"/>`,
            ...site.feed.map((entry) => this.renderItem(entry)),
        ];

        const content = [
            XML_DECLARATION,
            `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">`,
            `  <channel>`,
            ...channel,
            `  </channel>`,
            `</rss>`,
            "",
        ].join("\n");

        context.logger.debug("Feed rendered", { items: site.feed.length });

        return [{ path: this.path, contentType: "application/rss+xml", content }];
    }

    private renderItem(entry: FeedEntry): string {
        const lines = [
            `      ${xmlElement("title", entry.title)}`,
            `      ${xmlElement("link", entry.link)}`,
            `      ${xmlElement("guid", entry.link)}`,
            ...(entry.date ? [`      ${xmlElement("pubDate", entry.date.toUTCString())}`] : []),
            ...(entry.description ? [`      ${xmlElement("description", entry.description)}`] : []),
        ];
        return ["    <item>", ...lines, "    </item>"].join("\n");
    }
}
