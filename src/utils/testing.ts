import { once } from "node:events";
import net, { type Server, type Socket } from "node:net";

export function portOf(server: { address(): net.AddressInfo | string | null }): number {
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a TCP port");
    return address.port;
}

export async function listen(server: Server): Promise<number> {
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    return portOf(server);
}

// A port nothing listens on
export async function unusedPort(): Promise<number> {
    const server = net.createServer();
    const port = await listen(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    return port;
}

// Two connected loopback sockets: [dialing side, accepted side]
export async function socketPair(dialOptions: { allowHalfOpen?: boolean } = {}): Promise<[Socket, Socket]> {
    const server = net.createServer();
    const port = await listen(server);
    const accepted = once(server, "connection");
    const outer = net.connect({ port, host: "127.0.0.1", ...dialOptions });
    await once(outer, "connect");
    const [inner] = await accepted;
    server.close();
    if (!(inner instanceof net.Socket)) throw new Error("expected an accepted socket");
    return [outer, inner];
}

/**
 * Buffers everything a socket receives so tests can wait for exact byte
 * sequences regardless of how they were chunked on the wire.
 */
export class ByteCollector {
    readonly socket: Socket;
    readonly closed: Promise<void>;
    error: Error | null = null;
    private data = Buffer.alloc(0);
    private waiters: { check: (data: Buffer) => boolean; resolve: (data: Buffer) => void }[] = [];

    constructor(socket: Socket) {
        this.socket = socket;
        socket.on("data", (chunk: Buffer) => {
            this.data = Buffer.concat([this.data, chunk]);
            this.waiters = this.waiters.filter((waiter) => {
                if (!waiter.check(this.data)) return true;
                waiter.resolve(this.data);
                return false;
            });
        });
        socket.on("error", (err) => {
            this.error = err;
        });
        this.closed = new Promise((resolve) => socket.once("close", () => resolve()));
    }

    text() {
        return this.data.toString("latin1");
    }

    waitFor(check: (data: Buffer) => boolean): Promise<Buffer> {
        if (check(this.data)) return Promise.resolve(this.data);
        return new Promise((resolve) => this.waiters.push({ check, resolve }));
    }

    waitForLength(length: number) {
        return this.waitFor((data) => data.length >= length);
    }

    waitForText(marker: string) {
        return this.waitFor((data) => data.toString("latin1").includes(marker));
    }
}
