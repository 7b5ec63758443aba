/**
 * Escape text for XML element content and attribute values.
 */
export function escapeXml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&apos;");
}

/**
 * `<name>escaped text</name>`
 */
export function xmlElement(name: string, text: string): string {
    return `<${name}>${escapeXml(text)}</${name}>`;
}

export const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;
