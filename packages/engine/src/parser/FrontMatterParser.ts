/**
 * @fileoverview Front-Matter Parser
 *
 * Splits a document's raw text into its front-matter block and body, then
 * decodes and validates the block into DocumentMetadata.
 *
 * Supported blocks:
 * - YAML between `---` lines at the top of the file
 * - JSON object starting at the first character and closing on a `}` line
 *
 * Recognized keys are matched case-insensitively (`lastMod`, `expirydate`).
 * Unrecognized keys are kept in `metadata.extra`.
 *
 * @module @plume/engine/parser/FrontMatterParser
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { DocumentMetadata } from "../contracts/Document.js";
import {
    MalformedFrontMatterError,
    MissingFieldError,
    describeError,
} from "../contracts/Errors.js";

/**
 * Result of parsing a document's raw text.
 */
export interface ParsedContent {
    readonly metadata: DocumentMetadata;
    readonly body: string;
    readonly summary?: string;
}

/**
 * Front-matter block split from the body, still encoded.
 */
export interface FrontMatterBlock {
    readonly format: "yaml" | "json" | "none";
    readonly block: string;
    readonly body: string;
}

/**
 * Recognized keys by lowercase spelling.
 */
const RECOGNIZED_KEYS = {
    title      : "title",
    description: "description",
    date       : "date",
    lastmod    : "lastmod",
    expirydate : "expiryDate",
    draft      : "draft",
    tags       : "tags",
    categories : "categories",
    authors    : "authors",
} as const;

type RecognizedKey = (typeof RECOGNIZED_KEYS)[keyof typeof RECOGNIZED_KEYS];

function isRecognizedSpelling(key: string): key is keyof typeof RECOGNIZED_KEYS {
    return Object.hasOwn(RECOGNIZED_KEYS, key);
}

const SUMMARY_DIVIDER = /<!--\s*more\s*-->/i;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse a date value. `YYYY-MM-DD` is UTC midnight; date-times without a
 * zone designator are read as UTC.
 *
 * @returns The date, or null if the value is not a valid date
 */
export function parseDateValue(value: string | Date): Date | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value;
    }

    const text = value.trim();
    const calendar = CALENDAR_DATE.exec(text);
    if (calendar) {
        const [year, month, day] = [Number(calendar[1]), Number(calendar[2]), Number(calendar[3])];
        const date = new Date(Date.UTC(year, month - 1, day));
        const roundTrips =
            date.getUTCFullYear() === year &&
            date.getUTCMonth() === month - 1 &&
            date.getUTCDate() === day;
        return roundTrips ? date : null;
    }

    if (DATE_TIME.test(text)) {
        const iso = text.replace(" ", "T");
        const time = Date.parse(ZONE_DESIGNATOR.test(iso) ? iso : `${iso}Z`);
        return Number.isNaN(time) ? null : new Date(time);
    }

    return null;
}

const scalarText = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const dateValue = z.union([z.string(), z.date()]).transform((value, ctx) => {
    const date = parseDateValue(value);
    if (!date) {
        ctx.addIssue({
            code   : z.ZodIssueCode.custom,
            message: `invalid date "${String(value)}"`,
        });
        return z.NEVER;
    }
    return date;
});

const textList = z
    .union([scalarText, z.array(scalarText)])
    .transform((value) => (Array.isArray(value) ? value : [value]).filter((item) => item.length > 0));

const frontMatterSchema = z.object({
    title      : scalarText.optional(),
    description: scalarText.optional(),
    date       : dateValue.optional(),
    lastmod    : dateValue.optional(),
    expiryDate : dateValue.optional(),
    draft      : z.boolean().optional(),
    tags       : textList.optional(),
    categories : textList.optional(),
    authors    : textList.optional(),
});

/**
 * Split lines, keeping each line's start and end offsets.
 */
function splitLines(text: string): Array<{ content: string; start: number; end: number }> {
    const lines: Array<{ content: string; start: number; end: number }> = [];
    let start = 0;

    while (start < text.length) {
        const newline = text.indexOf("\n", start);
        const end = newline === -1 ? text.length : newline + 1;
        const content = text.slice(start, newline === -1 ? text.length : newline).replace(/\r$/, "");
        lines.push({ content, start, end });
        start = end;
    }

    return lines;
}

/**
 * Split raw text into its encoded front-matter block and body.
 *
 * @param raw - Raw document text
 * @param sourcePath - Used in error messages
 * @throws MalformedFrontMatterError on unbalanced delimiters or TOML blocks
 */
export function splitFrontMatter(raw: string, sourcePath: string): FrontMatterBlock {
    const text = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
    const lines = splitLines(text);
    const opening = lines[0]?.content.trimEnd();

    if (opening === "---") {
        const closing = lines.findIndex((line, index) => index > 0 && line.content.trimEnd() === "---");
        if (closing === -1) {
            throw new MalformedFrontMatterError(sourcePath, "missing closing --- delimiter");
        }
        return {
            format: "yaml",
            block : text.slice(lines[0].end, lines[closing].start),
            body  : text.slice(lines[closing].end),
        };
    }

    if (opening === "+++") {
        throw new MalformedFrontMatterError(sourcePath, "TOML front matter is not supported");
    }

    if (text.startsWith("{")) {
        const closing = lines.findIndex((line) => line.content.trimEnd() === "}");
        if (closing === -1) {
            throw new MalformedFrontMatterError(sourcePath, "unterminated JSON front matter");
        }
        return {
            format: "json",
            block : text.slice(0, lines[closing].start + lines[closing].content.length),
            body  : text.slice(lines[closing].end),
        };
    }

    return { format: "none", block: "", body: text };
}

/**
 * Decode an encoded block into a plain record.
 */
function decodeBlock(split: FrontMatterBlock, sourcePath: string): Record<string, unknown> {
    if (split.format === "none") {
        return {};
    }

    let decoded: unknown;
    try {
        decoded = split.format === "yaml" ? parseYaml(split.block) : JSON.parse(split.block);
    }
    catch (error) {
        throw new MalformedFrontMatterError(sourcePath, describeError(error), { cause: error });
    }

    if (decoded === null || decoded === undefined) {
        return {};
    }

    if (typeof decoded !== "object" || Array.isArray(decoded)) {
        throw new MalformedFrontMatterError(sourcePath, "front matter must be a mapping");
    }

    return Object.fromEntries(Object.entries(decoded));
}

/**
 * Separate recognized keys (canonical spelling) from the rest.
 */
function partitionKeys(
    record: Record<string, unknown>,
    sourcePath: string
): { recognized: Partial<Record<RecognizedKey, unknown>>; extra: Record<string, unknown> } {
    const recognized: Partial<Record<RecognizedKey, unknown>> = {};
    const extra: Array<[string, unknown]> = [];

    for (const [key, value] of Object.entries(record)) {
        const lower = key.toLowerCase();
        if (!isRecognizedSpelling(lower)) {
            extra.push([key, value]);
            continue;
        }

        const canonical = RECOGNIZED_KEYS[lower];
        if (canonical in recognized) {
            throw new MalformedFrontMatterError(sourcePath, `duplicate key "${key}"`);
        }
        if (value !== null && value !== undefined) {
            recognized[canonical] = value;
        }
    }

    // fromEntries defines own properties, so "__proto__" stays data
    return { recognized, extra: Object.fromEntries(extra) };
}

/**
 * Remove repeated entries, keeping the first.
 */
function uniqueValues(values: readonly string[]): string[] {
    return [...new Set(values)];
}

/**
 * Extract the summary: text before the `<!--more-->` divider.
 */
export function extractSummary(body: string): string | undefined {
    const match = SUMMARY_DIVIDER.exec(body);
    if (!match) {
        return undefined;
    }
    return body.slice(0, match.index).trim();
}

/**
 * Parse a document's raw text.
 *
 * @param raw - Raw document text
 * @param sourcePath - Document path, used in errors
 * @returns Metadata, body and optional summary
 * @throws MalformedFrontMatterError if the block cannot be decoded
 * @throws MissingFieldError if the title is absent or blank
 *
 * @example
 * ```typescript
 * const parsed = parseFrontMatter("---\ntitle: Hello\ntags: [vue]\n---\nBody", "posts/hello.md");
 * parsed.metadata.title; // "Hello"
 * parsed.metadata.draft; // false
 * parsed.body;           // "Body"
 * ```
 */
export function parseFrontMatter(raw: string, sourcePath: string): ParsedContent {
    const split = splitFrontMatter(raw, sourcePath);
    const { recognized, extra } = partitionKeys(decodeBlock(split, sourcePath), sourcePath);

    const result = frontMatterSchema.safeParse(recognized);
    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new MalformedFrontMatterError(sourcePath, reason, { cause: result.error });
    }

    const fields = result.data;
    if (!fields.title) {
        throw new MissingFieldError(sourcePath, "title");
    }

    const metadata: DocumentMetadata = {
        title     : fields.title,
        ...(fields.description ? { description: fields.description } : {}),
        ...(fields.date ? { date: fields.date } : {}),
        ...(fields.lastmod ? { lastmod: fields.lastmod } : {}),
        ...(fields.expiryDate ? { expiryDate: fields.expiryDate } : {}),
        draft     : fields.draft ?? false,
        tags      : uniqueValues(fields.tags ?? []),
        categories: uniqueValues(fields.categories ?? []),
        authors   : fields.authors ?? [],
        extra,
    };

    const summary = extractSummary(split.body);

    return {
        metadata,
        body: split.body,
        ...(summary !== undefined ? { summary } : {}),
    };
}
