import type { Socket } from "node:net";
import type { SocketRelay } from "./Relay.ts";

/**
 * Every accepted connection and running relay, so shutdown can reach the
 * ones still being routed or still connecting to the backend.
 */
export class SessionRegistry {
    readonly connections = new Set<Socket>();
    readonly relays = new Set<SocketRelay>();
    private closed = false;

    get closing() {
        return this.closed;
    }

    accept(socket: Socket): boolean {
        if (this.closed) {
            socket.destroy();
            return false;
        }
        this.connections.add(socket);
        socket.once("close", () => this.connections.delete(socket));
        return true;
    }

    add(relay: SocketRelay): boolean {
        if (this.closed) {
            relay.destroy();
            return false;
        }
        this.relays.add(relay);
        return true;
    }

    delete(relay: SocketRelay) {
        this.relays.delete(relay);
    }

    close() {
        this.closed = true;
        for (const relay of this.relays) relay.destroy();
        for (const socket of this.connections) socket.destroy();
    }
}
