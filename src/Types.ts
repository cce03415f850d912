export enum LOG_LEVEL {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

// Why a relay session ended
export enum CLOSE_REASON {
    VOLUNTARY = 0x02,
    NETWORK_ERROR = 0x03,
    UNREACHABLE = 0x42,
    TIMEOUT = 0x43,
    REFUSED = 0x44,
}

export type ServerOptions = {
    port: number;
    staticRoot: string;
    backendHost: string;
    backendPort: number;
    logLevel: LOG_LEVEL;
    pollInterval: number;
    connectTimeout: number;
    headersTimeout: number;
    quietPaths: string[];
};

export type HandshakeRequest = {
    method: string;
    path: string;
    version: string;
    headers: [name: string, value: string][];
};

export type RelaySide = "client" | "backend";

export type RelayResult = {
    reason: CLOSE_REASON;
    closedBy: RelaySide | null;
    bytesFromClient: number;
    bytesFromBackend: number;
};
