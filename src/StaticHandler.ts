import express, { type NextFunction, type Request, type Response } from "express";
import serveIndex from "serve-index";
import type { ServerOptions } from "./Types.ts";
import type { Logger } from "./utils/Logger.ts";

// Entries starting with "." match file extensions, anything else a path prefix
export function isQuietPath(path: string, quietPaths: string[]): boolean {
    return quietPaths.some((entry) => (entry.startsWith(".") ? path.endsWith(entry) : path.startsWith(entry)));
}

function requestLogger(quietPaths: string[], logger: Logger) {
    return (req: Request, res: Response, next: NextFunction) => {
        res.on("finish", () => {
            if (isQuietPath(req.path, quietPaths)) return;
            logger.info(
                `${req.socket.remoteAddress ?? "-"} "${req.method} ${req.originalUrl} HTTP/${req.httpVersion}" ${res.statusCode}`,
            );
        });
        next();
    };
}

/**
 * Plain HTTP side of the gateway: files under staticRoot, and a listing for
 * directories without an index.html. One request per connection, so every
 * connection gets classified before anything is read from it.
 */
export function createStaticApp(options: ServerOptions, logger: Logger) {
    const app = express();
    app.disable("x-powered-by");

    app.use(requestLogger(options.quietPaths, logger));
    app.use((_req: Request, res: Response, next: NextFunction) => {
        res.set("Connection", "close");
        next();
    });
    app.use((req: Request, res: Response, next: NextFunction) => {
        if (req.method === "GET" || req.method === "HEAD") return next();
        res.status(501).type("text/plain").send("Unsupported method");
    });
    app.use(express.static(options.staticRoot, { dotfiles: "ignore", index: ["index.html"] }));
    app.use(serveIndex(options.staticRoot, { icons: false }));
    app.use((_req: Request, res: Response) => {
        res.status(404).type("text/plain").send("Not Found");
    });

    return app;
}
