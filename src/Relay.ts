import type { Socket } from "node:net";
import { CLOSE_REASON, type RelayResult, type RelaySide } from "./Types.ts";
import type { Logger } from "./utils/Logger.ts";
import { checkErrorCode } from "./utils/Error.ts";

export type RelayOptions = {
    pollInterval: number;
    logger: Logger;
};

/**
 * Copies raw bytes between a client socket and a backend socket until both
 * are closed. Nothing passing through is parsed.
 *
 * Each socket's partner comes from a map fixed at construction, so a handler
 * never depends on which socket some earlier event was about.
 */
export class SocketRelay {
    readonly client: Socket;
    readonly backend: Socket;
    private readonly options: RelayOptions;
    private readonly partners: Map<Socket, Socket>;

    private readonly watched = new Set<Socket>();
    // sockets we ended, each with the timer that destroys it if it lingers
    private readonly closing = new Map<Socket, NodeJS.Timeout>();
    private readonly closed = new Set<Socket>();
    // sources waiting for their partner to drain
    private readonly stalled = new Set<Socket>();
    private readonly received: Record<RelaySide, number> = { client: 0, backend: 0 };

    private reason: CLOSE_REASON | null = null;
    private closedBy: RelaySide | null = null;
    private sweepTimer: NodeJS.Timeout | null = null;
    private result: Promise<RelayResult> | null = null;
    private settle: ((result: RelayResult) => void) | null = null;

    constructor(client: Socket, backend: Socket, options: RelayOptions) {
        this.client = client;
        this.backend = backend;
        this.options = options;
        this.partners = new Map([
            [client, backend],
            [backend, client],
        ]);
    }

    run(): Promise<RelayResult> {
        if (this.result) return this.result;
        this.result = new Promise((resolve) => {
            this.settle = resolve;
        });

        const sockets = [this.client, this.backend];
        for (const socket of sockets) {
            this.watched.add(socket);
            socket.on("readable", () => this.pump(socket));
            socket.on("end", () => this.handleEnd(socket));
            socket.on("error", (err: NodeJS.ErrnoException) => this.handleError(socket, err));
            socket.on("close", () => this.handleClose(socket));
        }
        this.sweepTimer = setInterval(() => this.sweep(), this.options.pollInterval);

        for (const socket of sockets) {
            if (socket.destroyed) this.handleClose(socket);
            else this.pump(socket);
        }
        return this.result;
    }

    destroy() {
        for (const socket of [this.client, this.backend]) {
            this.watched.delete(socket);
            socket.destroy();
        }
    }

    private partnerOf(socket: Socket): Socket {
        const partner = this.partners.get(socket);
        if (!partner) throw new Error("socket does not belong to this relay");
        return partner;
    }

    private sideOf(socket: Socket): RelaySide {
        return socket === this.client ? "client" : "backend";
    }

    private pump(source: Socket) {
        if (!this.watched.has(source) || this.stalled.has(source)) return;
        const target = this.partnerOf(source);

        let chunk: Buffer | null;
        while ((chunk = source.read()) !== null) {
            this.received[this.sideOf(source)] += chunk.length;
            if (!target.write(chunk)) {
                // resume once everything queued so far has been flushed
                this.stalled.add(source);
                target.once("drain", () => {
                    this.stalled.delete(source);
                    this.pump(source);
                });
                return;
            }
        }
    }

    private handleEnd(socket: Socket) {
        if (!this.watched.has(socket)) return;
        this.options.logger.debug(`${this.sideOf(socket)} closed its side`);
        this.record(CLOSE_REASON.VOLUNTARY, socket);
        this.close(socket);
        this.close(this.partnerOf(socket));
    }

    private handleError(socket: Socket, err: NodeJS.ErrnoException) {
        this.options.logger.warn(`${this.sideOf(socket)} socket error: ${err.message}`);
        this.record(checkErrorCode(err), socket);
        this.watched.delete(socket);
        this.clearCloseTimer(socket);
        socket.destroy();
        this.close(this.partnerOf(socket));
    }

    private handleClose(socket: Socket) {
        if (this.closed.has(socket)) return;
        this.closed.add(socket);
        this.watched.delete(socket);
        this.clearCloseTimer(socket);
        this.stalled.delete(socket);
        this.record(CLOSE_REASON.VOLUNTARY, socket);
        this.close(this.partnerOf(socket));
        if (this.closed.size === this.partners.size) this.finish();
    }

    private close(socket: Socket) {
        if (this.closed.has(socket) || this.closing.has(socket)) return;
        this.watched.delete(socket);
        // a peer that never closes its side gets one interval after our FIN
        this.closing.set(socket, setTimeout(() => socket.destroy(), this.options.pollInterval));
        // flushes whatever is still queued before sending FIN
        socket.end();
    }

    private clearCloseTimer(socket: Socket) {
        const timer = this.closing.get(socket);
        if (timer) clearTimeout(timer);
        this.closing.delete(socket);
    }

    // catches sockets destroyed without a close event reaching us
    private sweep() {
        for (const socket of this.watched) {
            if (socket.destroyed) this.handleClose(socket);
        }
    }

    private record(reason: CLOSE_REASON, socket: Socket) {
        if (this.reason !== null) return;
        this.reason = reason;
        this.closedBy = this.sideOf(socket);
    }

    private finish() {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
        for (const socket of [...this.closing.keys()]) this.clearCloseTimer(socket);
        const result: RelayResult = {
            reason: this.reason ?? CLOSE_REASON.VOLUNTARY,
            closedBy: this.closedBy,
            bytesFromClient: this.received.client,
            bytesFromBackend: this.received.backend,
        };
        this.options.logger.info(
            `relay finished (closed by ${result.closedBy ?? "unknown"}, reason 0x${result.reason.toString(16)}, ` +
                `${result.bytesFromClient} bytes up, ${result.bytesFromBackend} bytes down)`,
        );
        this.settle?.(result);
        this.settle = null;
    }
}
