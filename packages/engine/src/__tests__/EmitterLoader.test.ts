/**
 * @fileoverview Unit tests for EmitterLoader
 *
 * @module @plume/engine/__tests__/EmitterLoader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EmitterLoader, collectEmitters } from "../plugins/EmitterLoader.js";
import { assembleSite } from "../assembler/SiteAssembler.js";
import type { ArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import { createMockLogger, makeConfig, type MockLogger } from "./fixtures.js";

function emitter(id: string): ArtifactEmitter {
    return { id, emit: () => [] };
}

describe("collectEmitters", () => {
    it("should collect named and default exports", () => {
        const named = emitter("named");
        const fallback = emitter("default");

        expect(collectEmitters({ named, default: fallback, VERSION: "1.0" })).toEqual([named, fallback]);
    });

    it("should collect a default-exported array", () => {
        const one = emitter("one");
        const two = emitter("two");

        expect(collectEmitters({ default: [one, "not an emitter", two] })).toEqual([one, two]);
    });

    it("should not collect the same emitter twice", () => {
        const shared = emitter("shared");

        expect(collectEmitters({ shared, default: shared })).toEqual([shared]);
    });

    it("should ignore objects without an emit function", () => {
        expect(collectEmitters({ half: { id: "half" }, wrong: { id: 3, emit: () => [] } })).toEqual([]);
    });
});

describe("EmitterLoader", () => {
    let dir: string;
    let logger: MockLogger;
    let loader: EmitterLoader;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "plume-emitters-"));
        logger = createMockLogger();
        loader = new EmitterLoader({ logger });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("should return no emitters for a missing directory", async () => {
        expect(await loader.loadFromDirectory(join(dir, "missing"))).toEqual([]);
        expect(logger.debug).toHaveBeenCalledWith("[EmitterLoader] Emitter directory does not exist", {
            dirPath: join(dir, "missing"),
        });
    });

    it("should warn when the path is a file", async () => {
        const file = join(dir, "emitter.js");
        await writeFile(file, "export {};\n", "utf-8");

        expect(await loader.loadFromDirectory(file)).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith("[EmitterLoader] Emitter path is not a directory", { dirPath: file });
    });

    it("should skip files that are not code modules", async () => {
        await writeFile(join(dir, "notes.txt"), "not code", "utf-8");

        expect(await loader.loadFromDirectory(dir)).toEqual([]);
        expect(logger.info).toHaveBeenCalledWith("[EmitterLoader] Emitters loaded from directory", {
            dirPath : dir,
            emitters: 0,
        });
    });

    it("should load emitters from modules and skip a module that throws", async () => {
        await writeFile(join(dir, "a-named.mjs"), [
            "export const words = { id: \"words\", emit: () => [] };",
            "export default [{ id: \"list-one\", emit: () => [] }, { id: \"list-two\", emit: () => [] }];",
            "",
        ].join("\n"), "utf-8");
        await writeFile(join(dir, "b-broken.mjs"), "throw new Error(\"boom\");\n", "utf-8");
        await writeFile(join(dir, "c-default.mjs"), "export default { id: \"fallback\", emit: () => [] };\n", "utf-8");

        const emitters = await loader.loadFromDirectory(dir);

        expect(emitters.map((item) => item.id)).toEqual(["list-one", "list-two", "words", "fallback"]);
        expect(logger.error).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith("[EmitterLoader] Failed to load emitter file", {
            filePath: join(dir, "b-broken.mjs"),
            error   : "boom",
        });
        expect(logger.info).toHaveBeenCalledWith("[EmitterLoader] Emitters loaded from directory", {
            dirPath : dir,
            emitters: 4,
        });
    });

    it("should return the artifacts of a loaded emitter", async () => {
        const filePath = join(dir, "notes.mjs");
        await writeFile(filePath, [
            "export const notes = {",
            "    id: \"notes\",",
            "    emit: (site) => [{ path: \"notes.txt\", contentType: \"text/plain\", content: site.config.title }],",
            "};",
            "",
        ].join("\n"), "utf-8");

        const [notes] = await loader.loadCodeFile(filePath);
        const site = assembleSite([], makeConfig({ title: "Loaded" }));

        expect(await notes.emit(site, { logger, traceId: "bld_test" })).toEqual([
            { path: "notes.txt", contentType: "text/plain", content: "Loaded" },
        ]);
    });
});
