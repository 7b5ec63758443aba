/**
 * @fileoverview Tests for the build runner
 *
 * Runs whole builds against a temporary content tree.
 *
 * @module __tests__/build
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join, resolve } from "path";
import { resolveBuildSettings, runBuild } from "../build.js";
import { getDefaultSiteConfig } from "../config/index.js";

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [path, content] of Object.entries(files)) {
        const target = join(root, path);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, "utf-8");
    }
}

function createLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("runBuild", () => {
    let dir: string;
    let contentDir: string;
    let outputDir: string;
    let configPath: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "plume-build-"));
        contentDir = join(dir, "content");
        outputDir = join(dir, "public");
        configPath = join(dir, "site.yml");

        await writeTree(contentDir, {
            "_index.md"  : "---\ntitle: Home\n---\nWelcome\n",
            "posts/a.md" : "---\ntitle: A\ndate: 2024-01-10\n---\nA body\n",
            "posts/b.md" : "---\ntitle: B\ndate: 2024-02-01\ndraft: true\n---\nB body\n",
        });
        await writeFile(configPath, [
            "title: Test Blog",
            "baseUrl: https://example.org/",
            `contentDir: ${contentDir}`,
            `outputDir: ${outputDir}`,
            "",
        ].join("\n"), "utf-8");
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function manifestRoutes(): Promise<string[]> {
        const manifest: { documents: Array<{ route: string }> } = JSON.parse(
            await readFile(join(outputDir, "manifest.json"), "utf-8")
        );
        return manifest.documents.map((document) => document.route);
    }

    // Scenario: Successful build
    it("should write every artifact and return 0", async () => {
        const logger = createLogger();

        const code = await runBuild({ config: configPath, emitters: join(dir, "none") }, { appRoot: dir, logger, env: {} });

        expect(code).toBe(0);
        expect(await readFile(join(outputDir, "robots.txt"), "utf-8"))
            .toBe("User-agent: *\nAllow: /\n\nSitemap: https://example.org/sitemap.xml\n");
        expect(existsSync(join(outputDir, "sitemap.xml"))).toBe(true);
        expect(existsSync(join(outputDir, "index.xml"))).toBe(true);
        expect(await manifestRoutes()).toEqual(["/", "/posts/a"]);
    });

    // Scenario: --drafts
    it("should publish drafts with the drafts flag", async () => {
        const code = await runBuild(
            { config: configPath, emitters: join(dir, "none"), drafts: true },
            { appRoot: dir, logger: createLogger(), env: {} }
        );

        expect(code).toBe(0);
        expect(await manifestRoutes()).toEqual(["/", "/posts/b", "/posts/a"]);
    });

    // Scenario: Future-dated posts follow the content tree, not the clock
    it("should publish a future-dated post with the default settings", async () => {
        await writeTree(contentDir, { "posts/c.md": "---\ntitle: C\ndate: 2099-01-01\n---\nC body\n" });

        const code = await runBuild({ config: configPath, emitters: join(dir, "none") }, { appRoot: dir, logger: createLogger(), env: {} });

        expect(code).toBe(0);
        expect(await manifestRoutes()).toEqual(["/", "/posts/c", "/posts/a"]);
    });

    // Scenario: Environment and command line override site.yml
    it("should prefer the command line over the environment", async () => {
        const env = { PLUME_BASE_URL: "https://staging.example.org/" };

        await runBuild({ config: configPath, emitters: join(dir, "none") }, { appRoot: dir, logger: createLogger(), env });
        expect(await readFile(join(outputDir, "robots.txt"), "utf-8")).toContain("https://staging.example.org/sitemap.xml");

        await runBuild(
            { config: configPath, emitters: join(dir, "none"), baseUrl: "https://cli.example.org/" },
            { appRoot: dir, logger: createLogger(), env }
        );
        expect(await readFile(join(outputDir, "robots.txt"), "utf-8")).toContain("https://cli.example.org/sitemap.xml");
    });

    // Scenario: A broken document is reported but does not fail the build
    it("should warn about skipped documents", async () => {
        await writeFile(join(contentDir, "posts", "broken.md"), "no front matter\n", "utf-8");
        const logger = createLogger();

        const code = await runBuild({ config: configPath, emitters: join(dir, "none") }, { appRoot: dir, logger, env: {} });

        expect(code).toBe(0);
        expect(logger.warn).toHaveBeenCalledWith('posts/broken.md: missing required field "title"', {
            code: "MISSING_FIELD",
        });
    });

    // Scenario: Route collision fails the build
    it("should return 1 and write nothing when the build fails", async () => {
        await writeTree(contentDir, { "posts/a/index.md": "---\ntitle: Also A\n---\n" });
        const logger = createLogger();

        const code = await runBuild({ config: configPath, emitters: join(dir, "none") }, { appRoot: dir, logger, env: {} });

        expect(code).toBe(1);
        expect(logger.error).toHaveBeenCalledWith("Route /posts/a is claimed by posts/a.md, posts/a/index.md", {
            code: "ROUTE_COLLISION",
        });
        expect(logger.error).toHaveBeenCalledWith("Build failed with 1 error");
        expect(existsSync(outputDir)).toBe(false);
    });
});

describe("resolveBuildSettings", () => {
    it("should apply site.yml values when no flags are given", () => {
        const settings = resolveBuildSettings(
            { ...getDefaultSiteConfig(), buildDrafts: true, feedLimit: 5, emittersDir: "plugins" },
            {},
            "/app"
        );

        expect(settings.input).toMatchObject({
            contentDir  : resolve("content"),
            baseUrl     : "http://localhost:1313/",
            title       : "My Plume Site",
            preview     : true,
            buildFuture : true,
            buildExpired: true,
            feedLimit   : 5,
        });
        expect(settings.outputDir).toBe(resolve("public"));
        expect(settings.emittersDir).toBe(resolve("plugins"));
    });

    it("should default the emitters directory to the app root", () => {
        expect(resolveBuildSettings(getDefaultSiteConfig(), {}, "/app").emittersDir).toBe(resolve("/app/user/emitters"));
    });

    it("should let flags win over site.yml", () => {
        const settings = resolveBuildSettings(
            { ...getDefaultSiteConfig(), buildDrafts: true, buildFuture: false, buildExpired: false },
            { drafts: false, content: "/srv/content", out: "/srv/public", future: true },
            "/app"
        );

        expect(settings.input).toMatchObject({
            contentDir  : "/srv/content",
            preview     : false,
            buildFuture : true,
            buildExpired: false,
        });
        expect(settings.outputDir).toBe("/srv/public");
    });
});
