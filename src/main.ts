import { loadOptions } from "./Config.ts";
import { createServer } from "./createServer.ts";
import { LOG_LEVEL } from "./Types.ts";
import { ConfigError } from "./utils/Error.ts";
import { Logger } from "./utils/Logger.ts";

function start() {
    const options = loadOptions();
    const { server, logger, shutdown } = createServer(options);

    server.listen(options.port, () => {
        logger.info(`HTTP/WebSocket gateway running on port ${options.port}`);
        logger.info(`   - Serving static files from ${options.staticRoot}`);
        logger.info(`   - Proxying WebSocket to ${options.backendHost}:${options.backendPort}`);
    });

    const stop = () => {
        logger.info("Server stopped");
        shutdown().catch((e: unknown) => logger.error("error while shutting down:", e));
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
}

try {
    start();
} catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    new Logger(LOG_LEVEL.ERROR).error(`invalid configuration, ${e.message}`);
    process.exitCode = 1;
}
