/**
 * @fileoverview Command line definition for blog-builder.
 *
 * @module cli/program
 */

import { Command } from "commander";

/**
 * Options accepted on the command line. Unset options fall back to the
 * environment, then to site.yml.
 */
export type CliOptions = {
    drafts?: boolean;
    future?: boolean;
    expired?: boolean;
    config?: string;
    content?: string;
    out?: string;
    baseUrl?: string;
    emitters?: string;
    verbose?: boolean;
};

/**
 * Create the blog-builder program.
 *
 * @param action - Called with the parsed options
 *
 * @example
 * ```typescript
 * const program = createProgram(async (options) => {
 *     process.exitCode = await runBuild(options, { appRoot });
 * });
 * await program.parseAsync();
 * ```
 */
export function createProgram(action: (options: CliOptions) => Promise<void>): Command {
    const program = new Command();

    program
        .name("blog-builder")
        .description("Build a static site from a directory of Markdown documents")
        .version("1.0.0")
        .option("-D, --drafts", "include drafts (preview build)")
        .option("-F, --future", "include documents dated in the future when site.yml holds them back")
        .option("-E, --expired", "include expired documents when site.yml holds them back")
        .option("--config <file>", "site configuration file")
        .option("--content <dir>", "content directory")
        .option("--out <dir>", "publish directory")
        .option("--base-url <url>", "absolute base URL of the site")
        .option("--emitters <dir>", "directory of user emitter modules")
        .option("--verbose", "enable debug logging")
        .action(async () => {
            await action(program.opts<CliOptions>());
        });

    return program;
}
