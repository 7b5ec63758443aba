/**
 * @fileoverview blog-builder - Main Entry Point
 *
 * Builds a static site from a directory of Markdown documents with the
 * Plume publishing engine.
 *
 * @module blog-builder
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { createProgram } from "./cli/program.js";
import { runBuild } from "./build.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const appRoot = join(__dirname, "..");

const program = createProgram(async (options) => {
    process.exitCode = await runBuild(options, { appRoot });
});

program.parseAsync().catch((error: unknown) => {
    console.error("[FATAL] Build crashed:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
