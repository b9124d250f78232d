import { describe, expect, it } from "vitest";
import { XBEE_64_BROADCAST } from "../../src/xbee/address.js";
import { XBeeParsingError } from "../../src/xbee/errors.js";
import { getXBeeFrameParameters } from "../../src/xbee/frame.js";
import { getXBeeApiFrameType, XBeeApiFrameType } from "../../src/xbee/frame-types.js";
import { XBeeIPProtocol, XBeeLocalInterface } from "../../src/xbee/options.js";
import {
    decodeXBeePacket,
    encodeXBeePacket,
    getFrameId,
    getXBeePacketSource64,
    isBroadcast,
    needsFrameId,
    type XBeePacket,
} from "../../src/xbee/packet.js";
import type { TransmitRequestPacket } from "../../src/xbee/packets/transmit.js";
import { ATCommandStatus, XBeeDiscoveryStatus, XBeeModemStatus, XBeeTransmitStatus } from "../../src/xbee/statuses.js";

const REMOTE_64 = 0x0013a20012345678n;
const RECEIVE_HI_PAYLOAD = "900013a20012345678fffe016869";

describe("XBee packets", () => {
    describe("frame types", () => {
        it("maps known codes", () => {
            expect(getXBeeApiFrameType(0x90)).toStrictEqual(XBeeApiFrameType.RECEIVE_PACKET);
            expect(getXBeeApiFrameType(0x00)).toStrictEqual(XBeeApiFrameType.TX_64);
        });

        it("maps codes without a codec to UNKNOWN", () => {
            expect(getXBeeApiFrameType(0x42)).toStrictEqual(XBeeApiFrameType.UNKNOWN);
        });
    });

    describe("decode", () => {
        it("throws on an empty payload", () => {
            expect(() => decodeXBeePacket(Buffer.alloc(0))).toThrow(new XBeeParsingError("Error parsing packet: Empty payload."));
        });

        it("decodes a receive packet", () => {
            const packet = decodeXBeePacket(Buffer.from(RECEIVE_HI_PAYLOAD, "hex"));

            expect(packet).toStrictEqual({
                frameType: XBeeApiFrameType.RECEIVE_PACKET,
                source64: REMOTE_64,
                source16: 0xfffe,
                receiveOptions: 0x01,
                rfData: Buffer.from("hi"),
            });
            expect(isBroadcast(packet)).toStrictEqual(true);
            expect(needsFrameId(packet)).toStrictEqual(false);
            expect(getFrameId(packet)).toStrictEqual(undefined);
            expect(getXBeePacketSource64(packet)).toStrictEqual(REMOTE_64);
        });

        it("flags receive broadcasts on either option bit", () => {
            expect(isBroadcast(decodeXBeePacket(Buffer.from("900013a20012345678fffe006869", "hex")))).toStrictEqual(false);
            expect(isBroadcast(decodeXBeePacket(Buffer.from("900013a20012345678fffe026869", "hex")))).toStrictEqual(true);
        });

        it("rejects a receive packet shorter than its minimum", () => {
            expect(() => decodeXBeePacket(Buffer.from("900013a20012345678fffe", "hex"))).toThrow(
                new XBeeParsingError("Incomplete Receive Packet packet, got 11 bytes, expected at least 12"),
            );
        });

        it("decodes a receive packet at its minimum length", () => {
            expect(decodeXBeePacket(Buffer.from("900013a20012345678fffe00", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.RECEIVE_PACKET,
                source64: REMOTE_64,
                source16: 0xfffe,
                receiveOptions: 0x00,
                rfData: Buffer.alloc(0),
            });
        });

        it("re-encodes decoded payloads unchanged", () => {
            for (const payload of [
                "08014e49",
                "88014e49004142",
                "8802494400",
                "17030013a20012345678fffe02443005",
                "8b01fffe000000",
                "8a00",
                RECEIVE_HI_PAYLOAD,
            ]) {
                expect(encodeXBeePacket(decodeXBeePacket(Buffer.from(payload, "hex"))).toString("hex")).toStrictEqual(payload);
            }
        });

        it("decodes an AT command response with and without value", () => {
            expect(decodeXBeePacket(Buffer.from("88014e49004142", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE,
                frameId: 1,
                command: "NI",
                status: ATCommandStatus.OK,
                value: Buffer.from("AB"),
            });
            expect(decodeXBeePacket(Buffer.from("8802494400", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE,
                frameId: 2,
                command: "ID",
                status: ATCommandStatus.OK,
                value: undefined,
            });
        });

        it("decodes AT command queue with the AT command codec", () => {
            const packet = decodeXBeePacket(Buffer.from("09054e4900", "hex"));

            expect(packet).toStrictEqual({
                frameType: XBeeApiFrameType.AT_COMMAND_QUEUE,
                frameId: 5,
                command: "NI",
                parameter: Buffer.from([0x00]),
            });
            expect(getFrameId(packet)).toStrictEqual(5);
        });

        it("decodes a transmit status", () => {
            expect(decodeXBeePacket(Buffer.from("8b01fffe000000", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.TRANSMIT_STATUS,
                frameId: 1,
                destination16: 0xfffe,
                retryCount: 0,
                deliveryStatus: XBeeTransmitStatus.SUCCESS,
                discoveryStatus: XBeeDiscoveryStatus.NO_DISCOVERY_OVERHEAD,
            });
        });

        it("decodes a modem status", () => {
            expect(decodeXBeePacket(Buffer.from("8a06", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.MODEM_STATUS,
                status: XBeeModemStatus.COORDINATOR_STARTED,
            });
        });

        it("decodes 802.15.4 receive packets", () => {
            const rx16 = decodeXBeePacket(Buffer.from("811234280241", "hex"));

            expect(rx16).toStrictEqual({
                frameType: XBeeApiFrameType.RX_16,
                source16: 0x1234,
                rssi: 0x28,
                receiveOptions: 0x02,
                rfData: Buffer.from("A"),
            });
            expect(isBroadcast(rx16)).toStrictEqual(true);

            const rx64 = decodeXBeePacket(Buffer.from("800013a200123456782800", "hex"));

            expect(rx64).toStrictEqual({
                frameType: XBeeApiFrameType.RX_64,
                source64: REMOTE_64,
                rssi: 0x28,
                receiveOptions: 0x00,
                rfData: Buffer.alloc(0),
            });
            expect(isBroadcast(rx64)).toStrictEqual(false);
            expect(isBroadcast(decodeXBeePacket(Buffer.from("800013a200123456782804", "hex")))).toStrictEqual(true);
        });

        it("decodes an RX IPv4 packet", () => {
            expect(decodeXBeePacket(Buffer.from("b0c0a800011f900050" + "0000" + "6869", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.RX_IPV4,
                sourceAddress: "192.168.0.1",
                destinationPort: 8080,
                sourcePort: 80,
                protocol: XBeeIPProtocol.UDP,
                data: Buffer.from("hi"),
            });
        });

        it("decodes a user data relay output packet", () => {
            expect(decodeXBeePacket(Buffer.from("ad026869", "hex"))).toStrictEqual({
                frameType: XBeeApiFrameType.USER_DATA_RELAY_OUTPUT,
                sourceInterface: XBeeLocalInterface.MICROPYTHON,
                data: Buffer.from("hi"),
            });
        });

        it("keeps frames without a codec as unknown", () => {
            const packet = decodeXBeePacket(Buffer.from("420102", "hex"));

            expect(packet).toStrictEqual({
                frameType: XBeeApiFrameType.UNKNOWN,
                frameTypeValue: 0x42,
                data: Buffer.from([0x01, 0x02]),
            });
            expect(encodeXBeePacket(packet)).toStrictEqual(Buffer.from("420102", "hex"));
            expect(getXBeeFrameParameters(packet)).toStrictEqual([
                ["Start delimiter", "7E"],
                ["Length", "00 03 (3)"],
                ["Frame type", "42 (Unknown)"],
                ["RF data", "01 02"],
                ["Checksum", "BA"],
            ]);
        });
    });

    describe("encode", () => {
        it("encodes a transmit request", () => {
            const packet: TransmitRequestPacket = {
                frameType: XBeeApiFrameType.TRANSMIT_REQUEST,
                frameId: 1,
                destination64: REMOTE_64,
                destination16: 0xfffe,
                broadcastRadius: 0,
                options: 0,
                rfData: Buffer.from("hi"),
            };
            const payload = encodeXBeePacket(packet);

            expect(payload).toStrictEqual(Buffer.from("10010013a20012345678fffe00006869", "hex"));
            expect(decodeXBeePacket(payload)).toStrictEqual(packet);
            expect(isBroadcast(packet)).toStrictEqual(false);
            expect(isBroadcast({ ...packet, destination64: XBEE_64_BROADCAST })).toStrictEqual(true);
        });

        it("encodes a remote AT command request", () => {
            const packet: XBeePacket = {
                frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST,
                frameId: 3,
                destination64: REMOTE_64,
                destination16: 0xfffe,
                options: 0x02,
                command: "D0",
                parameter: Buffer.from([0x05]),
            };

            expect(encodeXBeePacket(packet)).toStrictEqual(Buffer.from("17030013a20012345678fffe02443005", "hex"));
            expect(isBroadcast(packet)).toStrictEqual(false);
        });

        it("rejects AT commands that are not 2 characters", () => {
            expect(() =>
                encodeXBeePacket({ frameType: XBeeApiFrameType.AT_COMMAND, frameId: 1, command: "NID", parameter: undefined }),
            ).toThrow("Invalid AT command, got NID, expected 2 characters");
        });

        it("rejects frame IDs out of range", () => {
            expect(() =>
                encodeXBeePacket({ frameType: XBeeApiFrameType.AT_COMMAND, frameId: 256, command: "NI", parameter: undefined }),
            ).toThrow("Invalid frame ID, got 256, expected 0-255");
        });

        it("encodes a TX SMS packet with a NUL padded phone number", () => {
            const packet: XBeePacket = { frameType: XBeeApiFrameType.TX_SMS, frameId: 1, phoneNumber: "+1555", data: "hi" };
            const payload = encodeXBeePacket(packet);

            expect(payload).toStrictEqual(Buffer.from(`1f0100${Buffer.from("+1555").toString("hex")}${"00".repeat(15)}6869`, "hex"));
            expect(decodeXBeePacket(payload)).toStrictEqual(packet);
        });

        it("rejects an invalid IPv4 address", () => {
            expect(() =>
                encodeXBeePacket({
                    frameType: XBeeApiFrameType.TX_IPV4,
                    frameId: 1,
                    destinationAddress: "300.1.1.1",
                    destinationPort: 80,
                    sourcePort: 0,
                    protocol: XBeeIPProtocol.TCP,
                    transmitOptions: 0,
                    data: Buffer.alloc(0),
                }),
            ).toThrow("Invalid IPv4 address, got 300.1.1.1");
        });
    });

    describe("minimum lengths", () => {
        it.each([
            [XBeeApiFrameType.TX_64, "TX (Transmit) Request 64-bit address", 11],
            [XBeeApiFrameType.TX_16, "TX (Transmit) Request 16-bit address", 5],
            [XBeeApiFrameType.AT_COMMAND, "AT Command", 4],
            [XBeeApiFrameType.AT_COMMAND_QUEUE, "AT Command Queue", 4],
            [XBeeApiFrameType.TRANSMIT_REQUEST, "Transmit Request", 14],
            [XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME, "Explicit Addressing Command Frame", 20],
            [XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST, "Remote AT Command Request", 15],
            [XBeeApiFrameType.TX_SMS, "TX SMS", 23],
            [XBeeApiFrameType.TX_IPV4, "TX IPv4", 12],
            [XBeeApiFrameType.USER_DATA_RELAY, "User Data Relay", 3],
            [XBeeApiFrameType.RX_64, "RX (Receive) Packet 64-bit Address", 11],
            [XBeeApiFrameType.RX_16, "RX (Receive) Packet 16-bit Address", 5],
            [XBeeApiFrameType.RX_IO_64, "IO Data Sample RX 64-bit Address Indicator", 11],
            [XBeeApiFrameType.RX_IO_16, "IO Data Sample RX 16-bit Address Indicator", 5],
            [XBeeApiFrameType.AT_COMMAND_RESPONSE, "AT Command Response", 5],
            [XBeeApiFrameType.TX_STATUS, "TX (Transmit) Status", 3],
            [XBeeApiFrameType.MODEM_STATUS, "Modem Status", 2],
            [XBeeApiFrameType.TRANSMIT_STATUS, "Transmit Status", 7],
            [XBeeApiFrameType.RECEIVE_PACKET, "Receive Packet", 12],
            [XBeeApiFrameType.EXPLICIT_RX_INDICATOR, "Explicit RX Indicator", 18],
            [XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR, "IO Data Sample RX Indicator", 12],
            [XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE, "Remote Command Response", 15],
            [XBeeApiFrameType.RX_SMS, "RX SMS", 21],
            [XBeeApiFrameType.USER_DATA_RELAY_OUTPUT, "User Data Relay Output", 2],
            [XBeeApiFrameType.RX_IPV4, "RX IPv4", 11],
        ])("enforces the minimum length of frame type %i, %s (%i bytes)", (frameType, name, minLength) => {
            const atMinimum = Buffer.alloc(minLength);
            atMinimum.writeUInt8(frameType, 0);

            expect(decodeXBeePacket(atMinimum).frameType).toStrictEqual(frameType);
            expect(() => decodeXBeePacket(atMinimum.subarray(0, minLength - 1))).toThrow(
                new XBeeParsingError(`Incomplete ${name} packet, got ${minLength - 1} bytes, expected at least ${minLength}`),
            );
        });

        it("decodes a lone unknown type byte", () => {
            expect(decodeXBeePacket(Buffer.from([0x42]))).toStrictEqual({
                frameType: XBeeApiFrameType.UNKNOWN,
                frameTypeValue: 0x42,
                data: undefined,
            });
        });
    });

    describe("decode of encode", () => {
        const packets: XBeePacket[] = [
            { frameType: XBeeApiFrameType.TX_64, frameId: 1, destination64: REMOTE_64, options: 0x01, rfData: Buffer.from("hi") },
            { frameType: XBeeApiFrameType.TX_16, frameId: 2, destination16: 0x1234, options: 0x00, rfData: Buffer.from("hi") },
            { frameType: XBeeApiFrameType.AT_COMMAND, frameId: 3, command: "NI", parameter: Buffer.from("node") },
            { frameType: XBeeApiFrameType.AT_COMMAND_QUEUE, frameId: 4, command: "D0", parameter: undefined },
            {
                frameType: XBeeApiFrameType.TRANSMIT_REQUEST,
                frameId: 5,
                destination64: REMOTE_64,
                destination16: 0xfffe,
                broadcastRadius: 3,
                options: 0x00,
                rfData: Buffer.from("hi"),
            },
            {
                frameType: XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME,
                frameId: 6,
                destination64: REMOTE_64,
                destination16: 0xfffe,
                sourceEndpoint: 0xe8,
                destinationEndpoint: 0xe8,
                clusterId: 0x0011,
                profileId: 0xc105,
                broadcastRadius: 0,
                options: 0x00,
                rfData: Buffer.from("hi"),
            },
            {
                frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST,
                frameId: 7,
                destination64: REMOTE_64,
                destination16: 0xfffe,
                options: 0x02,
                command: "D0",
                parameter: Buffer.from([0x05]),
            },
            { frameType: XBeeApiFrameType.TX_SMS, frameId: 8, phoneNumber: "+15550100", data: "hi" },
            {
                frameType: XBeeApiFrameType.TX_IPV4,
                frameId: 9,
                destinationAddress: "10.0.0.2",
                destinationPort: 80,
                sourcePort: 8080,
                protocol: XBeeIPProtocol.TCP,
                transmitOptions: 0x00,
                data: Buffer.from("hi"),
            },
            { frameType: XBeeApiFrameType.USER_DATA_RELAY, frameId: 10, destinationInterface: XBeeLocalInterface.BLUETOOTH, data: Buffer.from("hi") },
            { frameType: XBeeApiFrameType.RX_64, source64: REMOTE_64, rssi: 0x28, receiveOptions: 0x00, rfData: Buffer.from("hi") },
            { frameType: XBeeApiFrameType.RX_16, source16: 0x1234, rssi: 0x28, receiveOptions: 0x02, rfData: Buffer.from("hi") },
            {
                frameType: XBeeApiFrameType.RX_IO_64,
                source64: REMOTE_64,
                rssi: 0x28,
                receiveOptions: 0x00,
                rfData: Buffer.from([0x01]),
                ioSample: undefined,
            },
            { frameType: XBeeApiFrameType.RX_IO_16, source16: 0x1234, rssi: 0x28, receiveOptions: 0x00, rfData: Buffer.alloc(0), ioSample: undefined },
            { frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE, frameId: 11, command: "NI", status: ATCommandStatus.OK, value: Buffer.from("AB") },
            { frameType: XBeeApiFrameType.TX_STATUS, frameId: 12, status: XBeeTransmitStatus.SUCCESS },
            { frameType: XBeeApiFrameType.MODEM_STATUS, status: XBeeModemStatus.HARDWARE_RESET },
            {
                frameType: XBeeApiFrameType.TRANSMIT_STATUS,
                frameId: 13,
                destination16: 0x1234,
                retryCount: 2,
                deliveryStatus: XBeeTransmitStatus.NETWORK_ACK_FAILURE,
                discoveryStatus: XBeeDiscoveryStatus.NO_DISCOVERY_OVERHEAD,
            },
            { frameType: XBeeApiFrameType.RECEIVE_PACKET, source64: REMOTE_64, source16: 0x1234, receiveOptions: 0x00, rfData: Buffer.from("hi") },
            {
                frameType: XBeeApiFrameType.EXPLICIT_RX_INDICATOR,
                source64: REMOTE_64,
                source16: 0xfffe,
                sourceEndpoint: 0xe8,
                destinationEndpoint: 0xe8,
                clusterId: 0x0011,
                profileId: 0xc105,
                receiveOptions: 0x00,
                rfData: Buffer.from("hi"),
            },
            {
                frameType: XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR,
                source64: REMOTE_64,
                source16: 0x1234,
                receiveOptions: 0x00,
                rfData: Buffer.from([0x01, 0x00]),
                ioSample: undefined,
            },
            {
                frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE,
                frameId: 14,
                source64: REMOTE_64,
                source16: 0x1234,
                command: "D0",
                status: ATCommandStatus.INVALID_PARAMETER,
                value: undefined,
            },
            { frameType: XBeeApiFrameType.RX_SMS, phoneNumber: "15550100", data: undefined },
            { frameType: XBeeApiFrameType.USER_DATA_RELAY_OUTPUT, sourceInterface: XBeeLocalInterface.MICROPYTHON, data: undefined },
            {
                frameType: XBeeApiFrameType.RX_IPV4,
                sourceAddress: "192.168.0.1",
                destinationPort: 8080,
                sourcePort: 80,
                protocol: XBeeIPProtocol.UDP,
                data: Buffer.from("hi"),
            },
            { frameType: XBeeApiFrameType.UNKNOWN, frameTypeValue: 0x42, data: Buffer.from([0xba]) },
        ];

        it("covers every frame type", () => {
            const covered = new Set(packets.map((packet) => packet.frameType));

            for (const type of Object.values(XBeeApiFrameType)) {
                if (typeof type === "number") {
                    expect(covered.has(type)).toStrictEqual(true);
                }
            }
        });

        const cases = packets.map((packet): [XBeeApiFrameType, XBeePacket] => [packet.frameType, packet]);

        it.each(cases)("decodes what it encoded for frame type %i", (_frameType, packet) => {
            expect(decodeXBeePacket(encodeXBeePacket(packet))).toStrictEqual(packet);
        });
    });

    it("lists the fields of a receive packet", () => {
        expect(getXBeeFrameParameters(decodeXBeePacket(Buffer.from(RECEIVE_HI_PAYLOAD, "hex")))).toStrictEqual([
            ["Start delimiter", "7E"],
            ["Length", "00 0E (14)"],
            ["Frame type", "90 (Receive Packet)"],
            ["64-bit source address", "00 13 A2 00 12 34 56 78"],
            ["16-bit source address", "FF FE"],
            ["Receive options", "01"],
            ["RF data", "68 69"],
            ["Checksum", "D7"],
        ]);
    });
});
