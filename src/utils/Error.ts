import { CLOSE_REASON } from "../Types.ts";

// https://nodejs.org/api/errors.html#errorcode
export function checkErrorCode(err: NodeJS.ErrnoException): CLOSE_REASON {
    switch (err.code) {
        case "ECONNRESET":
            return CLOSE_REASON.VOLUNTARY;
        case "EHOSTUNREACH":
        case "ENETUNREACH":
        case "ENOTFOUND":
            return CLOSE_REASON.UNREACHABLE;
        case "ETIMEDOUT":
            return CLOSE_REASON.TIMEOUT;
        case "ECONNREFUSED":
            return CLOSE_REASON.REFUSED;
        default:
            return CLOSE_REASON.NETWORK_ERROR;
    }
}

export class ConnectError extends Error {
    readonly host: string;
    readonly port: number;
    readonly reason: CLOSE_REASON;
    constructor(host: string, port: number, reason: CLOSE_REASON, cause?: unknown) {
        const detail = cause instanceof Error ? `: ${cause.message}` : "";
        super(`could not reach backend ${host}:${port}${detail}`, { cause });
        this.name = "ConnectError";
        this.host = host;
        this.port = port;
        this.reason = reason;
    }
}

export class ConfigError extends Error {
    readonly variable: string;
    constructor(variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = "ConfigError";
        this.variable = variable;
    }
}
