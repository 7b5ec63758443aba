/**
 * @fileoverview Unit tests for the built-in artifact emitters
 *
 * @module @plume/engine/__tests__/emitters
 */

import { describe, it, expect } from "vitest";
import { assembleSite } from "../assembler/SiteAssembler.js";
import type { EmitterContext } from "../contracts/ArtifactEmitter.js";
import { silentLogger } from "../contracts/Logger.js";
import {
    FeedEmitter,
    ManifestEmitter,
    RobotsEmitter,
    SitemapEmitter,
    createDefaultEmitters,
    createManifest,
    escapeXml,
} from "../emitters/index.js";
import { makeConfig, makeDocument, utc } from "./fixtures.js";

const context: EmitterContext = { logger: silentLogger, traceId: "bld_test" };

function buildSite(overrides: Parameters<typeof makeConfig>[0] = {}) {
    return assembleSite([
        makeDocument("index.md", { title: "Home", date: utc("2024-01-01") }),
        makeDocument("posts/a.md", {
            title      : "Tips & Tricks",
            date       : utc("2024-01-10"),
            lastmod    : utc("2024-01-20"),
            description: "Some <b>tips</b>",
            tags       : ["How To"],
        }),
        makeDocument("posts/draft.md", { draft: true }),
        makeDocument("docs/[slug].md"),
    ], makeConfig(overrides));
}

describe("escapeXml", () => {
    it("should escape the five XML special characters", () => {
        expect(escapeXml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;");
    });
});

describe("SitemapEmitter", () => {
    it("should list every concrete published route", () => {
        const [artifact] = new SitemapEmitter().emit(buildSite(), context);

        expect(artifact.path).toBe("sitemap.xml");
        expect(artifact.contentType).toBe("application/xml");
        expect(artifact.content).toBe([
            `<?xml version="1.0" encoding="UTF-8"?>`,
            `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
            `  <url>`,
            `    <loc>https://example.org/</loc>`,
            `    <lastmod>2024-01-01T00:00:00.000Z</lastmod>`,
            `  </url>`,
            `  <url>`,
            `    <loc>https://example.org/posts/a/</loc>`,
            `    <lastmod>2024-01-20T00:00:00.000Z</lastmod>`,
            `  </url>`,
            `</urlset>`,
            ``,
        ].join("\n"));
    });

    it("should honour a custom path", () => {
        const [artifact] = new SitemapEmitter({ path: "maps/site.xml" }).emit(buildSite(), context);

        expect(artifact.path).toBe("maps/site.xml");
    });
});

describe("FeedEmitter", () => {
    it("should render an RSS channel with escaped items", () => {
        const [artifact] = new FeedEmitter().emit(buildSite({ languageCode: "en-us" }), context);
        const lines = artifact.content.split("\n");

        expect(artifact.path).toBe("index.xml");
        expect(artifact.contentType).toBe("application/rss+xml");
        expect(lines.slice(0, 10)).toEqual([
            `<?xml version="1.0" encoding="UTF-8"?>`,
            `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">`,
            `  <channel>`,
            `    <title>Test Site</title>`,
            `    <link>https://example.org/</link>`,
            `    <description>Recent content on Test Site</description>`,
            `    <language>en-us</language>`,
            `    <lastBuildDate>Wed, 10 Jan 2024 00:00:00 GMT</lastBuildDate>`,
            `    <atom:link href="https://example.org/index.xml" rel="self" type="application/rss+xml"/>`,
            `    <item>`,
        ]);
        expect(lines).toContain(`      <title>Tips &amp; Tricks</title>`);
        expect(lines).toContain(`      <description>Some &lt;b&gt;tips&lt;/b&gt;</description>`);
        expect(lines).toContain(`      <pubDate>Wed, 10 Jan 2024 00:00:00 GMT</pubDate>`);
        expect(lines.filter((line) => line === "    <item>")).toHaveLength(2);
    });

    it("should use the site description when set", () => {
        const [artifact] = new FeedEmitter().emit(buildSite({ description: "All the news" }), context);

        expect(artifact.content).toContain(`    <description>All the news</description>\n`);
    });
});

describe("RobotsEmitter", () => {
    it("should point crawlers at the sitemap", () => {
        const [artifact] = new RobotsEmitter().emit(buildSite({ baseUrl: "https://example.org/blog/" }), context);

        expect(artifact).toEqual({
            path       : "robots.txt",
            contentType: "text/plain",
            content    : "User-agent: *\nAllow: /\n\nSitemap: https://example.org/blog/sitemap.xml\n",
        });
    });
});

describe("ManifestEmitter", () => {
    it("should describe routes, listings and exclusions", () => {
        const manifest = createManifest(buildSite());

        expect(manifest.home).toBe("/");
        expect(manifest.documents.map((document) => [document.route, document.permalink])).toEqual([
            ["/", "https://example.org/"],
            ["/posts/a", "https://example.org/posts/a/"],
            ["/docs/[slug]", null],
        ]);
        expect(manifest.documents[1]).toMatchObject({
            sourcePath: "posts/a.md",
            date      : "2024-01-10T00:00:00.000Z",
            lastmod   : "2024-01-20T00:00:00.000Z",
            tags      : ["How To"],
        });
        expect(manifest.documents[2].parameters).toEqual(["slug"]);
        expect(manifest.taxonomies).toEqual([
            { taxonomy: "tags", term: "How To", slug: "how-to", route: "/tags/how-to", documents: ["/posts/a"] },
        ]);
        expect(manifest.sections).toEqual([
            { section: "posts", route: "/posts", index: null, documents: ["/posts/a"] },
        ]);
        expect(manifest.excluded).toEqual([{ sourcePath: "posts/draft.md", reason: "draft" }]);
    });

    it("should write the manifest as JSON", async () => {
        const [artifact] = await new ManifestEmitter().emit(buildSite(), context);

        expect(artifact.path).toBe("manifest.json");
        expect(artifact.content.endsWith("}\n")).toBe(true);
        expect(JSON.parse(artifact.content)).toMatchObject({
            site: { title: "Test Site", baseUrl: "https://example.org/", preview: false },
            home: "/",
        });
    });
});

describe("createDefaultEmitters", () => {
    it("should create the standard emitter set", () => {
        expect(createDefaultEmitters().map((emitter) => emitter.id)).toEqual(["sitemap", "feed", "robots", "manifest"]);
    });
});
