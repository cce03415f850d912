import { once } from "node:events";
import type { Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { SocketRelay } from "./Relay.ts";
import { CLOSE_REASON, LOG_LEVEL } from "./Types.ts";
import { Logger } from "./utils/Logger.ts";
import { ByteCollector, socketPair } from "./utils/testing.ts";

const logger = new Logger(LOG_LEVEL.NONE);
const opened: Socket[] = [];

// browser <-> clientSide | relay | backendSide <-> game
async function relayFixture({ pollInterval = 50, browserHalfOpen = false } = {}) {
    const [browser, clientSide] = await socketPair({ allowHalfOpen: browserHalfOpen });
    const [backendSide, game] = await socketPair();
    opened.push(browser, clientSide, backendSide, game);
    const relay = new SocketRelay(clientSide, backendSide, { pollInterval, logger });
    // collectors also keep resets on the outer ends from surfacing as unhandled errors
    const atBrowser = new ByteCollector(browser);
    const atGame = new ByteCollector(game);
    return { browser, clientSide, backendSide, game, relay, atBrowser, atGame };
}

afterEach(() => {
    for (const socket of opened.splice(0)) socket.destroy();
});

describe("SocketRelay", () => {
    it("delivers client bytes to the backend in the order they were sent", async () => {
        const { browser, relay, atGame } = await relayFixture();
        const done = relay.run();

        browser.write("first-");
        browser.write("second");
        await atGame.waitForLength(12);

        expect(atGame.text()).toBe("first-second");
        relay.destroy();
        expect((await done).bytesFromClient).toBe(12);
    });

    it("delivers backend bytes to the client", async () => {
        const { game, relay, atBrowser } = await relayFixture();
        const done = relay.run();

        game.write("HTTP/1.1 101 Switching Protocols\r\n\r\n");
        await atBrowser.waitForText("\r\n\r\n");

        expect(atBrowser.text()).toBe("HTTP/1.1 101 Switching Protocols\r\n\r\n");
        relay.destroy();
        await done;
    });

    it("relays a payload larger than the socket buffers byte for byte", async () => {
        const { browser, relay, atGame } = await relayFixture();
        const done = relay.run();
        const payload = Buffer.from(Array.from({ length: 1 << 20 }, (_, i) => i % 251));

        browser.write(payload);
        const received = await atGame.waitForLength(payload.length);

        expect(received.equals(payload)).toBe(true);
        relay.destroy();
        await done;
    });

    it("closes the client after the backend closes, after flushing what the backend sent", async () => {
        const { game, relay, atBrowser } = await relayFixture();
        const done = relay.run();

        game.end("last words");
        await atBrowser.closed;

        expect(atBrowser.text()).toBe("last words");
        expect(await done).toEqual({
            reason: CLOSE_REASON.VOLUNTARY,
            closedBy: "backend",
            bytesFromClient: 0,
            bytesFromBackend: 10,
        });
    });

    it("destroys a client that never closes its side within one interval", async () => {
        const { clientSide, game, relay } = await relayFixture({ pollInterval: 200, browserHalfOpen: true });
        const done = relay.run();

        const started = Date.now();
        game.end();
        const result = await done;
        const elapsed = Date.now() - started;

        expect(result.closedBy).toBe("backend");
        expect(clientSide.destroyed).toBe(true);
        expect(elapsed).toBeGreaterThanOrEqual(150);
        expect(elapsed).toBeLessThan(400);
    });

    it("tears down the backend when the client socket errors", async () => {
        const { clientSide, backendSide, relay, atGame } = await relayFixture();
        const done = relay.run();

        clientSide.destroy(new Error("boom"));
        await atGame.closed;

        const result = await done;
        expect(result.reason).toBe(CLOSE_REASON.NETWORK_ERROR);
        expect(result.closedBy).toBe("client");
        expect(backendSide.destroyed).toBe(true);
    });

    it("finishes when a socket was already closed before relaying", async () => {
        const { clientSide, relay, atGame } = await relayFixture();
        clientSide.destroy();
        await once(clientSide, "close");

        const result = await relay.run();
        await atGame.closed;

        expect(result.closedBy).toBe("client");
        expect(result.reason).toBe(CLOSE_REASON.VOLUNTARY);
    });

    it("keeps concurrent sessions apart", async () => {
        const first = await relayFixture();
        const second = await relayFixture();
        const runs = [first.relay.run(), second.relay.run()];

        first.browser.write("session-a:1;");
        second.browser.write("session-b:1;");
        first.browser.write("session-a:2;");
        second.browser.write("session-b:2;");
        await Promise.all([first.atGame.waitForLength(24), second.atGame.waitForLength(24)]);

        expect(first.atGame.text()).toBe("session-a:1;session-a:2;");
        expect(second.atGame.text()).toBe("session-b:1;session-b:2;");
        first.relay.destroy();
        second.relay.destroy();
        await Promise.all(runs);
    });

    it("returns the same promise when run twice", async () => {
        const { relay } = await relayFixture();
        const done = relay.run();

        expect(relay.run()).toBe(done);
        relay.destroy();
        await done;
    });

    it("destroys both sockets on destroy()", async () => {
        const { clientSide, backendSide, relay } = await relayFixture();
        const done = relay.run();

        relay.destroy();
        await done;

        expect(clientSide.destroyed).toBe(true);
        expect(backendSide.destroyed).toBe(true);
    });
});
