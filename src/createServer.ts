import http from "node:http";
import net from "node:net";
import gateway from "./ConnectionHandler.ts";
import { defaultOptions } from "./Config.ts";
import { SessionRegistry } from "./Sessions.ts";
import { createStaticApp } from "./StaticHandler.ts";
import type { ServerOptions } from "./Types.ts";
import { Logger } from "./utils/Logger.ts";

export type GatewayServer = {
    server: net.Server;
    httpServer: http.Server;
    sessions: SessionRegistry;
    logger: Logger;
    options: ServerOptions;
    shutdown(): Promise<void>;
};

/**
 * Builds the gateway without listening. Each accepted connection has its
 * request head read first: WebSocket upgrades are relayed to the backend,
 * everything else is handed to the static app's http.Server, which never
 * listens on its own.
 */
export function createServer(overrides: Partial<ServerOptions> = {}): GatewayServer {
    const options: ServerOptions = Object.assign({}, defaultOptions, overrides);
    const logger = new Logger(options.logLevel);
    const sessions = new SessionRegistry();

    // no upgrade listener: requests carrying Upgrade headers are served as plain requests
    const httpServer = http.createServer(createStaticApp(options, logger));

    const serveHttp = (socket: net.Socket) => {
        httpServer.emit("connection", socket);
        socket.resume();
    };

    const server = net.createServer({ allowHalfOpen: true, noDelay: true }, (socket) => {
        if (!sessions.accept(socket)) return;
        gateway.routeConnection(socket, { options, logger, sessions, serveHttp }).catch((e: unknown) => {
            logger.error("WebSocket proxy error:", e);
            socket.destroy();
        });
    });

    const shutdown = () =>
        new Promise<void>((resolve, reject) => {
            sessions.close();
            server.close((err) => (err ? reject(err) : resolve()));
        });

    return { server, httpServer, sessions, logger, options, shutdown };
}
