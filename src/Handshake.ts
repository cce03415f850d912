import type { HandshakeRequest } from "./Types.ts";

// node's default --max-http-header-size
export const MAX_HEADER_BYTES = 16 * 1024;

/**
 * Offset of the blank line ending the request head, or -1 while it is still
 * incomplete.
 */
export function findHeaderEnd(buffer: Buffer): number {
    return buffer.indexOf("\r\n\r\n");
}

/**
 * Parses a request line and header lines (without the blank line). Header
 * names keep their casing, repeated headers stay separate entries. Returns
 * null for anything that is not an HTTP/1.x request head.
 */
export function parseHandshake(head: Buffer): HandshakeRequest | null {
    const [requestLine, ...headerLines] = head.toString("latin1").split("\r\n");
    const parts = requestLine.split(" ");
    if (parts.length !== 3) return null;
    const [method, path, version] = parts;
    if (!method || !path || !version.startsWith("HTTP/")) return null;

    const headers: [string, string][] = [];
    for (const line of headerLines) {
        const idx = line.indexOf(":");
        if (idx <= 0) return null;
        headers.push([line.slice(0, idx).trim(), line.slice(idx + 1).trim()]);
    }
    return { method, path, version, headers };
}

// latin1 so header bytes come out exactly as they were read
export function serializeHandshake(handshake: HandshakeRequest): Buffer {
    let text = `${handshake.method} ${handshake.path} ${handshake.version}\r\n`;
    for (const [name, value] of handshake.headers) {
        text += `${name}: ${value}\r\n`;
    }
    text += "\r\n";
    return Buffer.from(text, "latin1");
}
