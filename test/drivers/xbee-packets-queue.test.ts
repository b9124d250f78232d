import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_QUEUE_MAX_SIZE, XBeePacketsQueue } from "../../src/drivers/xbee-packets-queue.js";
import { XBeeApiFrameType } from "../../src/xbee/frame-types.js";
import type { XBeePacket } from "../../src/xbee/packet.js";
import type { ReceivePacket } from "../../src/xbee/packets/receive.js";
import { ATCommandStatus, XBeeModemStatus } from "../../src/xbee/statuses.js";

const makeModemStatus = (status: XBeeModemStatus): XBeePacket => ({ frameType: XBeeApiFrameType.MODEM_STATUS, status });
const makeReceive = (source64: bigint, text: string): ReceivePacket => ({
    frameType: XBeeApiFrameType.RECEIVE_PACKET,
    source64,
    source16: 0xfffe,
    receiveOptions: 0x01,
    rfData: Buffer.from(text),
});

describe("XBee packets queue", () => {
    it("defaults to 50 packets", () => {
        expect(new XBeePacketsQueue().maxSize).toStrictEqual(DEFAULT_QUEUE_MAX_SIZE);
        expect(DEFAULT_QUEUE_MAX_SIZE).toStrictEqual(50);
    });

    it("rejects an invalid size", () => {
        expect(() => new XBeePacketsQueue(0)).toThrow("Invalid queue size, got 0, expected a positive integer");
        expect(() => new XBeePacketsQueue(1.5)).toThrow("Invalid queue size, got 1.5, expected a positive integer");
    });

    it("drops the oldest packet when full", async () => {
        const queue = new XBeePacketsQueue(3);

        queue.add(makeModemStatus(XBeeModemStatus.HARDWARE_RESET));
        queue.add(makeModemStatus(XBeeModemStatus.WATCHDOG_TIMER_RESET));
        queue.add(makeModemStatus(XBeeModemStatus.JOINED_NETWORK));
        expect(queue.isFull()).toStrictEqual(true);

        queue.add(makeModemStatus(XBeeModemStatus.DISASSOCIATED));

        expect(queue.size).toStrictEqual(3);
        await expect(queue.getFirstPacket()).resolves.toStrictEqual(makeModemStatus(XBeeModemStatus.WATCHDOG_TIMER_RESET));
        expect(queue.size).toStrictEqual(2);
    });

    it("takes the first packet matching a filter, leaving the others", async () => {
        const queue = new XBeePacketsQueue();
        const fromA = makeReceive(0x0013a20000000001n, "a");
        const fromB = makeReceive(0x0013a20000000002n, "b");

        queue.add(makeModemStatus(XBeeModemStatus.COORDINATOR_STARTED));
        queue.add(fromA);
        queue.add(fromB);

        await expect(queue.getFirstDataPacketFrom(0x0013a20000000002n)).resolves.toBe(fromB);
        await expect(queue.getFirstDataPacket()).resolves.toBe(fromA);
        await expect(queue.getFirstDataPacket()).resolves.toStrictEqual(undefined);
        await expect(queue.getFirstExplicitDataPacket()).resolves.toStrictEqual(undefined);
        await expect(queue.getFirstIPDataPacket()).resolves.toStrictEqual(undefined);
        expect(queue.size).toStrictEqual(1);
    });

    it("finds packets by source address across types", async () => {
        const queue = new XBeePacketsQueue();
        const response: XBeePacket = {
            frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE,
            frameId: 1,
            source64: 0x0013a20000000001n,
            source16: 0x1234,
            command: "NI",
            status: ATCommandStatus.OK,
            value: undefined,
        };

        queue.add(response);

        await expect(queue.getFirstPacketFrom(0x0013a20000000002n)).resolves.toStrictEqual(undefined);
        await expect(queue.getFirstPacketFrom(0x0013a20000000001n)).resolves.toBe(response);
    });

    it("clears", () => {
        const queue = new XBeePacketsQueue();

        queue.add(makeModemStatus(XBeeModemStatus.HARDWARE_RESET));
        queue.clear();

        expect(queue.size).toStrictEqual(0);
    });

    describe("waiting", () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it("resolves when a matching packet arrives in time", async () => {
            const queue = new XBeePacketsQueue();
            const packet = makeReceive(0x0013a20000000001n, "late");
            const waiting = queue.getFirstDataPacket(1000);

            await vi.advanceTimersByTimeAsync(500);
            queue.add(makeModemStatus(XBeeModemStatus.HARDWARE_RESET));
            queue.add(packet);

            await expect(waiting).resolves.toBe(packet);
            expect(queue.size).toStrictEqual(1);
        });

        it("resolves undefined on timeout", async () => {
            const queue = new XBeePacketsQueue();
            const waiting = queue.getFirstDataPacket(1000);

            await vi.advanceTimersByTimeAsync(1000);

            await expect(waiting).resolves.toStrictEqual(undefined);

            // no longer waiting, stays queued
            queue.add(makeReceive(0x0013a20000000001n, "too late"));
            expect(queue.size).toStrictEqual(1);
        });
    });
});
