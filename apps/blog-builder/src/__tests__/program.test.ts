/**
 * @fileoverview Unit tests for command line parsing
 *
 * @module cli/__tests__/program
 */

import { describe, it, expect } from "vitest";
import { createProgram, type CliOptions } from "../cli/program.js";

async function parse(args: string[]): Promise<CliOptions> {
    let parsed: CliOptions | undefined;
    const program = createProgram(async (options) => {
        parsed = options;
    });

    await program.parseAsync(args, { from: "user" });

    if (!parsed) {
        throw new Error("action was not called");
    }
    return parsed;
}

describe("createProgram", () => {
    it("should leave options unset when no flags are given", async () => {
        expect(await parse([])).toEqual({});
    });

    it("should parse long flags", async () => {
        expect(await parse([
            "--drafts",
            "--future",
            "--expired",
            "--config", "site.yml",
            "--content", "docs",
            "--out", "dist",
            "--base-url", "https://example.org/",
            "--emitters", "plugins",
            "--verbose",
        ])).toEqual({
            drafts  : true,
            future  : true,
            expired : true,
            config  : "site.yml",
            content : "docs",
            out     : "dist",
            baseUrl : "https://example.org/",
            emitters: "plugins",
            verbose : true,
        });
    });

    it("should parse short flags", async () => {
        expect(await parse(["-D", "-F", "-E"])).toEqual({ drafts: true, future: true, expired: true });
    });
});
