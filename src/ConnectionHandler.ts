import { STATUS_CODES } from "node:http";
import type { Socket } from "node:net";
import { connectBackend } from "./BackendConnector.ts";
import { findHeaderEnd, MAX_HEADER_BYTES, parseHandshake, serializeHandshake } from "./Handshake.ts";
import { SocketRelay } from "./Relay.ts";
import type { SessionRegistry } from "./Sessions.ts";
import type { HandshakeRequest, RelayResult, ServerOptions } from "./Types.ts";
import type { Logger } from "./utils/Logger.ts";

export type RouteContext = {
    options: ServerOptions;
    logger: Logger;
    sessions: SessionRegistry;
    // hands a connection, with its unread bytes put back, to the static side
    serveHttp: (socket: Socket) => void;
};

let nextSessionID = 1;

// The first Upgrade header decides; nothing else about the request is looked at
export function isWebSocketUpgrade(headers: HandshakeRequest["headers"]): boolean {
    const upgrade = headers.find(([name]) => name.toLowerCase() === "upgrade");
    return upgrade?.[1].toLowerCase() === "websocket";
}

// Status line and a short text body written straight on the socket, then closed
export function abortHandshake(socket: Socket, status: number) {
    if (socket.destroyed) return;
    socket.on("error", () => socket.destroy());
    const body = `${status} ${STATUS_CODES[status] ?? "Error"}`;
    socket.end(
        `HTTP/1.1 ${body}\r\n` +
            "Connection: close\r\n" +
            "Content-Type: text/plain\r\n" +
            `Content-Length: ${Buffer.byteLength(body)}\r\n` +
            "\r\n" +
            body,
        () => socket.destroy(),
    );
}

/**
 * Buffers what the client sends until the request head is complete. Resolves
 * with everything read so far (head and any bytes past it), once the blank
 * line arrives or more than maxBytes are buffered without one. Resolves null
 * when the connection ends, fails or stays silent for timeout ms first.
 *
 * The socket is left paused either way.
 */
export function readRequestHead(socket: Socket, maxBytes: number, timeout: number): Promise<Buffer | null> {
    return new Promise((resolve) => {
        let buffered = Buffer.alloc(0);

        const finish = (result: Buffer | null) => {
            socket.removeListener("data", onData);
            socket.removeListener("end", onGone);
            socket.removeListener("close", onGone);
            socket.removeListener("timeout", onGone);
            socket.setTimeout(0);
            socket.pause();
            resolve(result);
        };
        const onData = (chunk: Buffer) => {
            buffered = Buffer.concat([buffered, chunk]);
            if (findHeaderEnd(buffered) !== -1 || buffered.length > maxBytes) finish(buffered);
        };
        const onGone = () => finish(null);

        socket.on("data", onData);
        socket.once("end", onGone);
        socket.once("close", onGone);
        socket.once("timeout", onGone);
        socket.setTimeout(timeout);
    });
}

/**
 * Entry point for every accepted connection. WebSocket upgrades are relayed
 * as raw bytes to the backend; everything else, including heads that do not
 * parse, goes to the static side untouched.
 */
export async function routeConnection(socket: Socket, context: RouteContext): Promise<RelayResult | null> {
    const { options, logger } = context;
    const onEarlyError = (err: Error) => logger.debug(`connection error before routing: ${err.message}`);
    socket.on("error", onEarlyError);

    const buffered = await readRequestHead(socket, MAX_HEADER_BYTES, options.headersTimeout);
    socket.removeListener("error", onEarlyError);
    if (buffered === null) {
        socket.destroy();
        return null;
    }

    const headerEnd = findHeaderEnd(buffered);
    const handshake = headerEnd === -1 ? null : parseHandshake(buffered.subarray(0, headerEnd));
    if (!handshake || !isWebSocketUpgrade(handshake.headers)) {
        socket.unshift(buffered);
        context.serveHttp(socket);
        return null;
    }
    return routeRequest(socket, handshake, buffered.subarray(headerEnd + 4), context);
}

/**
 * Relays one WebSocket upgrade: connects the backend, replays the handshake
 * followed by any bytes already read past it, then pumps bytes until both
 * sides are closed. A backend that cannot be reached gets the client a 502.
 *
 * Resolves with the relay's result, or null when no relay was started.
 */
export async function routeRequest(
    socket: Socket,
    handshake: HandshakeRequest,
    head: Buffer,
    context: Omit<RouteContext, "serveHttp">,
): Promise<RelayResult | null> {
    const { options, logger, sessions } = context;
    const sessionLogger = logger.scoped(`relay#${nextSessionID++}`);
    sessionLogger.debug(`upgrade for ${handshake.path} from ${socket.remoteAddress ?? "unknown"}`);

    // hold client bytes in the socket until the backend is there to take them
    socket.pause();
    const onEarlyError = (err: Error) => sessionLogger.warn(`client socket error before relaying: ${err.message}`);
    socket.on("error", onEarlyError);

    let backend: Socket;
    try {
        backend = await connectBackend(options.backendHost, options.backendPort, options.connectTimeout);
    } catch (e) {
        sessionLogger.error("WebSocket proxy error:", e instanceof Error ? e.message : e);
        abortHandshake(socket, 502);
        return null;
    }

    if (sessions.closing) {
        sessionLogger.debug("server is shutting down, dropping the session");
        backend.destroy();
        socket.destroy();
        return null;
    }

    try {
        backend.write(Buffer.concat([serializeHandshake(handshake), head]));
    } catch (e) {
        sessionLogger.error("failed to forward handshake:", e);
        backend.destroy();
        abortHandshake(socket, 502);
        return null;
    }

    socket.removeListener("error", onEarlyError);
    const relay = new SocketRelay(socket, backend, {
        pollInterval: options.pollInterval,
        logger: sessionLogger,
    });
    sessions.add(relay);
    try {
        return await relay.run();
    } finally {
        sessions.delete(relay);
    }
}

export default {
    routeConnection,
};
