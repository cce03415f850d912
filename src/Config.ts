import { LOG_LEVEL, type ServerOptions } from "./Types.ts";
import { ConfigError } from "./utils/Error.ts";

export const defaultOptions: ServerOptions = {
    port: 8080,
    staticRoot: "/app/static",
    backendHost: "127.0.0.1",
    backendPort: 8081,
    logLevel: LOG_LEVEL.INFO,
    pollInterval: 1000,
    connectTimeout: 10_000,
    headersTimeout: 60_000,
    // asset requests are too noisy to log
    quietPaths: ["/pkg/", "/assets/", ".js", ".wasm"],
};

const logLevels: Record<string, LOG_LEVEL> = {
    debug: LOG_LEVEL.DEBUG,
    info: LOG_LEVEL.INFO,
    warn: LOG_LEVEL.WARN,
    error: LOG_LEVEL.ERROR,
    none: LOG_LEVEL.NONE,
};

function readInteger(env: NodeJS.ProcessEnv, variable: string, fallback: number, max = Number.MAX_SAFE_INTEGER) {
    const raw = env[variable]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) throw new ConfigError(variable, `expected a positive integer, got "${raw}"`);
    const value = Number(raw);
    if (value < 1 || value > max) throw new ConfigError(variable, `${value} is out of range 1..${max}`);
    return value;
}

function readLogLevel(env: NodeJS.ProcessEnv, fallback: LOG_LEVEL) {
    const raw = env.LOG_LEVEL?.trim().toLowerCase();
    if (!raw) return fallback;
    if (!Object.hasOwn(logLevels, raw)) {
        throw new ConfigError("LOG_LEVEL", `expected one of ${Object.keys(logLevels).join(", ")}, got "${raw}"`);
    }
    return logLevels[raw];
}

export function loadOptions(env: NodeJS.ProcessEnv = process.env): ServerOptions {
    const quietPaths = env.QUIET_PATHS?.trim();
    return {
        port: readInteger(env, "PORT", defaultOptions.port, 65535),
        staticRoot: env.STATIC_ROOT?.trim() || defaultOptions.staticRoot,
        backendHost: env.BACKEND_HOST?.trim() || defaultOptions.backendHost,
        backendPort: readInteger(env, "BACKEND_PORT", defaultOptions.backendPort, 65535),
        logLevel: readLogLevel(env, defaultOptions.logLevel),
        pollInterval: readInteger(env, "POLL_INTERVAL_MS", defaultOptions.pollInterval),
        connectTimeout: readInteger(env, "CONNECT_TIMEOUT_MS", defaultOptions.connectTimeout),
        headersTimeout: readInteger(env, "HEADERS_TIMEOUT_MS", defaultOptions.headersTimeout),
        quietPaths: quietPaths
            ? quietPaths
                  .split(",")
                  .map((entry) => entry.trim())
                  .filter((entry) => entry.length > 0)
            : [...defaultOptions.quietPaths],
    };
}
