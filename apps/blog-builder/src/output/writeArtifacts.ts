/**
 * @fileoverview Artifact writer
 *
 * Writes emitted artifacts below the publish directory.
 *
 * @module output/writeArtifacts
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, isAbsolute, relative, resolve } from "path";
import type { Artifact } from "@plume/engine";

/**
 * Resolve an artifact path below the publish directory.
 *
 * @throws Error if the path points outside it
 */
function resolveTarget(root: string, artifact: Artifact): string {
    const target = resolve(root, artifact.path);
    const inside = relative(root, target);
    if (inside === "" || inside.startsWith("..") || isAbsolute(inside)) {
        throw new Error(`Artifact path escapes the publish directory: ${artifact.path}`);
    }
    return target;
}

/**
 * Write artifacts to disk. Every path is checked before the first write,
 * so a rejected set leaves the publish directory untouched.
 *
 * @param outputDir - Publish directory, created if missing
 * @param artifacts - Artifacts from a successful build
 * @returns Absolute paths written, in artifact order
 * @throws Error if an artifact path points outside the publish directory
 */
export async function writeArtifacts(outputDir: string, artifacts: readonly Artifact[]): Promise<string[]> {
    const root = resolve(outputDir);
    const targets = artifacts.map((artifact) => resolveTarget(root, artifact));

    for (const [index, artifact] of artifacts.entries()) {
        await mkdir(dirname(targets[index]), { recursive: true });
        await writeFile(targets[index], artifact.content, "utf-8");
    }

    return targets;
}
