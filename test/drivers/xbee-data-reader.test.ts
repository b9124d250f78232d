import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { XBeeDataReader, XBeeDataReaderState } from "../../src/drivers/xbee-data-reader.js";
import { XBeeOperatingMode } from "../../src/xbee/consts.js";
import { XBeeApiFrameType } from "../../src/xbee/frame-types.js";
import { XBeeIOLine } from "../../src/xbee/io-sample.js";
import { XBeeLocalInterface } from "../../src/xbee/options.js";
import { XBeeModemStatus } from "../../src/xbee/statuses.js";
import { logger } from "../../src/utils/logger.js";
import { flushReader, MockConnection, makeFrame } from "../utils.js";

const REMOTE_64 = 0x0013a20012345678n;
const RECEIVE_HI = makeFrame("900013a20012345678fffe016869");
/** Digi data endpoints/cluster/profile */
const EXPLICIT_DIGI_HI = makeFrame("910013a20012345678fffee8e80011c105006869");
const AT_RESPONSE_NI_1 = makeFrame("88014e49004142");

describe("XBee data reader", () => {
    let connection: MockConnection;
    let reader: XBeeDataReader;

    beforeEach(async () => {
        connection = new MockConnection();
        reader = new XBeeDataReader(connection, { operatingMode: XBeeOperatingMode.API });

        await connection.open();
        reader.start();
    });

    afterEach(async () => {
        await reader.stop();
    });

    it("dispatches a received packet to the queue and listeners", async () => {
        const onPacket = vi.fn();
        const onData = vi.fn();

        reader.packetReceived.add(onPacket);
        reader.dataReceived.add(onData);

        connection.feed(RECEIVE_HI);
        await flushReader();

        expect(onPacket).toHaveBeenCalledTimes(1);
        expect(onPacket).toHaveBeenCalledWith({
            frameType: XBeeApiFrameType.RECEIVE_PACKET,
            source64: REMOTE_64,
            source16: 0xfffe,
            receiveOptions: 0x01,
            rfData: Buffer.from("hi"),
        });
        expect(onData).toHaveBeenCalledWith({ remote64: REMOTE_64, remote16: 0xfffe, data: Buffer.from("hi"), isBroadcast: true });
        expect(reader.queue.size).toStrictEqual(1);
    });

    it("skips bytes before a start delimiter", async () => {
        const onPacket = vi.fn();

        reader.packetReceived.add(onPacket);

        connection.feed(Buffer.concat([Buffer.from([0x01, 0x02, 0x4e]), RECEIVE_HI]));
        await flushReader();

        expect(onPacket).toHaveBeenCalledTimes(1);
    });

    it("logs and drops a corrupted frame, then keeps reading", async () => {
        const errorSpy = vi.spyOn(logger, "error");
        const onPacket = vi.fn();
        const corrupted = Buffer.from(RECEIVE_HI);

        corrupted[corrupted.byteLength - 1] ^= 0xff;
        reader.packetReceived.add(onPacket);

        connection.feed(Buffer.concat([corrupted, RECEIVE_HI]));
        await flushReader();

        expect(errorSpy).toHaveBeenCalledWith("Error parsing the API packet. Invalid checksum (expected 0xD7).", "xbee-driver:reader");
        expect(onPacket).toHaveBeenCalledTimes(1);
        expect(reader.state).toStrictEqual(XBeeDataReaderState.RUNNING);
    });

    it("delivers Digi data explicit frames as both explicit and plain data", async () => {
        const onExplicit = vi.fn();
        const onData = vi.fn();

        reader.explicitDataReceived.add(onExplicit);
        reader.dataReceived.add(onData);

        connection.feed(EXPLICIT_DIGI_HI);
        await flushReader();

        expect(onExplicit).toHaveBeenCalledWith({
            remote64: REMOTE_64,
            remote16: 0xfffe,
            data: Buffer.from("hi"),
            isBroadcast: false,
            sourceEndpoint: 0xe8,
            destinationEndpoint: 0xe8,
            clusterId: 0x0011,
            profileId: 0xc105,
        });
        expect(onData).toHaveBeenCalledWith({ remote64: REMOTE_64, remote16: 0xfffe, data: Buffer.from("hi"), isBroadcast: false });
        expect(reader.queue.size).toStrictEqual(2);
        await expect(reader.queue.getFirstDataPacket()).resolves.toMatchObject({ frameType: XBeeApiFrameType.RECEIVE_PACKET });
        await expect(reader.queue.getFirstExplicitDataPacket()).resolves.toMatchObject({ frameType: XBeeApiFrameType.EXPLICIT_RX_INDICATOR });
    });

    it("dispatches IO samples, modem status and relay data to their listeners", async () => {
        const onIOSample = vi.fn();
        const onModemStatus = vi.fn();
        const onRelay = vi.fn();

        reader.ioSampleReceived.add(onIOSample);
        reader.modemStatusReceived.add(onModemStatus);
        reader.userDataRelayReceived.add(onRelay);

        connection.feed(
            Buffer.concat([makeFrame("920013a20012345678fffe01010000020155"), makeFrame("8a06"), makeFrame("ad026869")]),
        );
        await flushReader();

        expect(onIOSample).toHaveBeenCalledTimes(1);
        expect(onIOSample.mock.calls[0][0]).toMatchObject({ remote64: REMOTE_64, remote16: 0xfffe });
        expect(onIOSample.mock.calls[0][0].ioSample.analogValues.get(XBeeIOLine.DIO1_AD1)).toStrictEqual(0x0155);
        expect(onModemStatus).toHaveBeenCalledWith(XBeeModemStatus.COORDINATOR_STARTED);
        expect(onRelay).toHaveBeenCalledWith({ sourceInterface: XBeeLocalInterface.MICROPYTHON, data: Buffer.from("hi") });
    });

    it("keeps notifying other listeners when one throws", async () => {
        const onData = vi.fn();

        reader.packetReceived.add(() => {
            throw new Error("listener failure");
        });
        reader.dataReceived.add(onData);

        connection.feed(RECEIVE_HI);
        await flushReader();

        expect(onData).toHaveBeenCalledTimes(1);
    });

    it("calls a frame ID listener once", async () => {
        const listener = vi.fn();

        reader.addFrameIdListener(1, listener);
        expect(reader.frameIdListenerCount).toStrictEqual(1);

        connection.feed(AT_RESPONSE_NI_1);
        await flushReader();

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener.mock.calls[0][0]).toMatchObject({ frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE, frameId: 1, command: "NI" });
        expect(reader.frameIdListenerCount).toStrictEqual(0);
    });

    it("keeps a frame ID listener that returns false", async () => {
        const listener = vi.fn().mockReturnValue(false);

        reader.addFrameIdListener(1, listener);

        connection.feed(Buffer.concat([AT_RESPONSE_NI_1, AT_RESPONSE_NI_1]));
        await flushReader();

        expect(listener).toHaveBeenCalledTimes(2);
        expect(reader.frameIdListenerCount).toStrictEqual(1);

        reader.removeFrameIdListener(1, listener);
        expect(reader.frameIdListenerCount).toStrictEqual(0);
    });

    it("ignores frame ID listeners of other frame IDs", async () => {
        const listener = vi.fn();

        reader.addFrameIdListener(2, listener);

        connection.feed(AT_RESPONSE_NI_1);
        await flushReader();

        expect(listener).toHaveBeenCalledTimes(0);
        expect(reader.frameIdListenerCount).toStrictEqual(1);
    });

    it("stops and closes the connection", async () => {
        expect(reader.isRunning).toStrictEqual(true);

        await reader.stop();

        expect(reader.state).toStrictEqual(XBeeDataReaderState.STOPPED);
        expect(connection.isOpen).toStrictEqual(false);
    });

    it("exits when the connection closes", async () => {
        await connection.close();
        await flushReader();

        expect(reader.state).toStrictEqual(XBeeDataReaderState.STOPPED);
    });
});
