import net, { Socket } from "node:net";
import { CLOSE_REASON } from "./Types.ts";
import { checkErrorCode, ConnectError } from "./utils/Error.ts";

/**
 * Opens one TCP connection to the backend. There is no retry: the caller
 * turns a rejection into a gateway error for the client.
 */
export function connectBackend(host: string, port: number, timeout: number): Promise<Socket> {
    return new Promise((resolve, reject) => {
        const backend = net.connect({ host, port });

        const fail = (reason: CLOSE_REASON, cause?: Error) => {
            backend.removeListener("error", onError);
            backend.destroy();
            reject(new ConnectError(host, port, reason, cause));
        };
        const onError = (err: NodeJS.ErrnoException) => fail(checkErrorCode(err), err);

        backend.once("error", onError);
        // cleared on connect, so this only fires while still connecting
        backend.setTimeout(timeout, () => fail(CLOSE_REASON.TIMEOUT));
        backend.once("connect", () => {
            backend.setTimeout(0);
            backend.removeListener("error", onError);
            resolve(backend);
        });
    });
}
