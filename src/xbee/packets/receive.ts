import { address16ToString, address64ToString, readAddress16, readAddress64, writeAddress16, writeAddress64 } from "../address.js";
import { XBeeApiFrameType } from "../frame-types.js";
import { decodeXBeeIOSample, type XBeeIOSample, XBeeIOSampleConsts, xbeeIOSampleToString } from "../io-sample.js";
import { XBeeRawReceiveOptions, XBeeReceiveOptions } from "../options.js";
import { getXBeeModemStatusDescription, type XBeeModemStatus } from "../statuses.js";
import { prettyHexString, toHexString } from "../utils.js";
import { assertMinLength, hexParameter, type XBeePacketParameters } from "./codec.js";

export const enum ReceivePacketConsts {
    /** type + 64-bit address + 16-bit address + options */
    RECEIVE_PACKET_MIN_LENGTH = 12,
    /** type + 64-bit address + 16-bit address + endpoints + cluster + profile + options */
    EXPLICIT_RX_MIN_LENGTH = 18,
    /** type + 64-bit address + 16-bit address + options */
    IO_DATA_SAMPLE_MIN_LENGTH = 12,
    /** type + 64-bit address + RSSI + options */
    RX_64_MIN_LENGTH = 11,
    /** type + 16-bit address + RSSI + options */
    RX_16_MIN_LENGTH = 5,
    /** type + status */
    MODEM_STATUS_MIN_LENGTH = 2,
}

export type ReceivePacket = {
    frameType: XBeeApiFrameType.RECEIVE_PACKET;
    source64: bigint;
    source16: number;
    /** bitfield of XBeeReceiveOptions */
    receiveOptions: number;
    rfData: Buffer;
};

export type ExplicitRxIndicatorPacket = {
    frameType: XBeeApiFrameType.EXPLICIT_RX_INDICATOR;
    source64: bigint;
    source16: number;
    sourceEndpoint: number;
    destinationEndpoint: number;
    clusterId: number;
    profileId: number;
    receiveOptions: number;
    rfData: Buffer;
};

export type IODataSampleRxIndicatorPacket = {
    frameType: XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR;
    source64: bigint;
    source16: number;
    receiveOptions: number;
    /** raw IO sample payload */
    rfData: Buffer;
    /** decoded from `rfData`, undefined when too short to hold a sample */
    ioSample: XBeeIOSample | undefined;
};

/** 802.15.4 receive packet */
export type RX64Packet = {
    frameType: XBeeApiFrameType.RX_64;
    source64: bigint;
    rssi: number;
    /** bitfield of XBeeRawReceiveOptions */
    receiveOptions: number;
    rfData: Buffer;
};

export type RX16Packet = {
    frameType: XBeeApiFrameType.RX_16;
    source16: number;
    rssi: number;
    receiveOptions: number;
    rfData: Buffer;
};

export type RX64IOPacket = {
    frameType: XBeeApiFrameType.RX_IO_64;
    source64: bigint;
    rssi: number;
    receiveOptions: number;
    rfData: Buffer;
    ioSample: XBeeIOSample | undefined;
};

export type RX16IOPacket = {
    frameType: XBeeApiFrameType.RX_IO_16;
    source16: number;
    rssi: number;
    receiveOptions: number;
    rfData: Buffer;
    ioSample: XBeeIOSample | undefined;
};

export type ModemStatusPacket = {
    frameType: XBeeApiFrameType.MODEM_STATUS;
    status: XBeeModemStatus;
};

export function decodeOptionalIOSample(rfData: Buffer): XBeeIOSample | undefined {
    return rfData.byteLength >= XBeeIOSampleConsts.MIN_PAYLOAD_LENGTH ? decodeXBeeIOSample(rfData) : undefined;
}

function pushRFData(parameters: XBeePacketParameters, rfData: Buffer): XBeePacketParameters {
    if (rfData.byteLength > 0) {
        parameters.push(["RF data", hexParameter(rfData)]);
    }

    return parameters;
}

function pushIOSample(parameters: XBeePacketParameters, rfData: Buffer, ioSample: XBeeIOSample | undefined): XBeePacketParameters {
    if (ioSample !== undefined) {
        parameters.push(["IO sample", xbeeIOSampleToString(ioSample)]);
    } else if (rfData.byteLength > 0) {
        parameters.push(["RF data", hexParameter(rfData)]);
    }

    return parameters;
}

// #region Receive Packet

export function decodeReceivePacket(payload: Buffer): ReceivePacket {
    assertMinLength(payload, ReceivePacketConsts.RECEIVE_PACKET_MIN_LENGTH, XBeeApiFrameType.RECEIVE_PACKET);

    const [source64, src16Offset] = readAddress64(payload, 1);
    const [source16, optionsOffset] = readAddress16(payload, src16Offset);
    const receiveOptions = payload.readUInt8(optionsOffset);

    return {
        frameType: XBeeApiFrameType.RECEIVE_PACKET,
        source64,
        source16,
        receiveOptions,
        rfData: payload.subarray(optionsOffset + 1),
    };
}

export function encodeReceivePacket(packet: ReceivePacket): Buffer {
    const data = Buffer.alloc(ReceivePacketConsts.RECEIVE_PACKET_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeAddress64(data, packet.source64, offset);
    offset = writeAddress16(data, packet.source16, offset);
    offset = data.writeUInt8(packet.receiveOptions, offset);

    packet.rfData.copy(data, offset);

    return data;
}

/**
 * Bit 0 or bit 1 of the receive options flags a broadcast reception.
 *
 * NOTE: bit 0 is "packet acknowledged" on the module side, so an acknowledged unicast reception also reports broadcast.
 * This is deliberate: a receive frame with options `0x01` must read as broadcast.
 * Test `XBeeReceiveOptions.BROADCAST_PACKET` alone to tell acknowledged unicasts apart.
 */
export function isReceiveOptionsBroadcast(receiveOptions: number): boolean {
    return (receiveOptions & (XBeeReceiveOptions.PACKET_ACKNOWLEDGED | XBeeReceiveOptions.BROADCAST_PACKET)) !== 0;
}

export function getReceivePacketParameters(packet: ReceivePacket): XBeePacketParameters {
    return pushRFData(
        [
            ["64-bit source address", prettyHexString(address64ToString(packet.source64))],
            ["16-bit source address", prettyHexString(address16ToString(packet.source16))],
            ["Receive options", toHexString(packet.receiveOptions, 1)],
        ],
        packet.rfData,
    );
}

// #endregion

// #region Explicit RX Indicator

export function decodeExplicitRxIndicatorPacket(payload: Buffer): ExplicitRxIndicatorPacket {
    assertMinLength(payload, ReceivePacketConsts.EXPLICIT_RX_MIN_LENGTH, XBeeApiFrameType.EXPLICIT_RX_INDICATOR);

    const [source64, src16Offset] = readAddress64(payload, 1);
    const [source16, endpointOffset] = readAddress16(payload, src16Offset);
    let offset = endpointOffset;
    const sourceEndpoint = payload.readUInt8(offset);
    offset += 1;
    const destinationEndpoint = payload.readUInt8(offset);
    offset += 1;
    const clusterId = payload.readUInt16BE(offset);
    offset += 2;
    const profileId = payload.readUInt16BE(offset);
    offset += 2;
    const receiveOptions = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.EXPLICIT_RX_INDICATOR,
        source64,
        source16,
        sourceEndpoint,
        destinationEndpoint,
        clusterId,
        profileId,
        receiveOptions,
        rfData: payload.subarray(offset),
    };
}

export function encodeExplicitRxIndicatorPacket(packet: ExplicitRxIndicatorPacket): Buffer {
    const data = Buffer.alloc(ReceivePacketConsts.EXPLICIT_RX_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeAddress64(data, packet.source64, offset);
    offset = writeAddress16(data, packet.source16, offset);
    offset = data.writeUInt8(packet.sourceEndpoint, offset);
    offset = data.writeUInt8(packet.destinationEndpoint, offset);
    offset = data.writeUInt16BE(packet.clusterId, offset);
    offset = data.writeUInt16BE(packet.profileId, offset);
    offset = data.writeUInt8(packet.receiveOptions, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function getExplicitRxIndicatorPacketParameters(packet: ExplicitRxIndicatorPacket): XBeePacketParameters {
    return pushRFData(
        [
            ["64-bit source address", prettyHexString(address64ToString(packet.source64))],
            ["16-bit source address", prettyHexString(address16ToString(packet.source16))],
            ["Source endpoint", toHexString(packet.sourceEndpoint, 1)],
            ["Dest. endpoint", toHexString(packet.destinationEndpoint, 1)],
            ["Cluster ID", prettyHexString(toHexString(packet.clusterId, 2))],
            ["Profile ID", prettyHexString(toHexString(packet.profileId, 2))],
            ["Receive options", toHexString(packet.receiveOptions, 1)],
        ],
        packet.rfData,
    );
}

// #endregion

// #region IO Data Sample RX Indicator

export function decodeIODataSampleRxIndicatorPacket(payload: Buffer): IODataSampleRxIndicatorPacket {
    assertMinLength(payload, ReceivePacketConsts.IO_DATA_SAMPLE_MIN_LENGTH, XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR);

    const [source64, src16Offset] = readAddress64(payload, 1);
    const [source16, optionsOffset] = readAddress16(payload, src16Offset);
    const receiveOptions = payload.readUInt8(optionsOffset);
    const rfData = payload.subarray(optionsOffset + 1);

    return {
        frameType: XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR,
        source64,
        source16,
        receiveOptions,
        rfData,
        ioSample: decodeOptionalIOSample(rfData),
    };
}

export function encodeIODataSampleRxIndicatorPacket(packet: IODataSampleRxIndicatorPacket): Buffer {
    const data = Buffer.alloc(ReceivePacketConsts.IO_DATA_SAMPLE_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeAddress64(data, packet.source64, offset);
    offset = writeAddress16(data, packet.source16, offset);
    offset = data.writeUInt8(packet.receiveOptions, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function getIODataSampleRxIndicatorPacketParameters(packet: IODataSampleRxIndicatorPacket): XBeePacketParameters {
    return pushIOSample(
        [
            ["64-bit source address", prettyHexString(address64ToString(packet.source64))],
            ["16-bit source address", prettyHexString(address16ToString(packet.source16))],
            ["Receive options", toHexString(packet.receiveOptions, 1)],
        ],
        packet.rfData,
        packet.ioSample,
    );
}

// #endregion

// #region RX 64/16 and RX IO 64/16

/**
 * Layout shared by the 802.15.4 receive frames: [source address][RSSI][options][data]
 */
function decodeRawReceive(payload: Buffer, addressLength: 2 | 8): { rssi: number; receiveOptions: number; rfData: Buffer } {
    const offset = 1 + addressLength;

    return {
        rssi: payload.readUInt8(offset),
        receiveOptions: payload.readUInt8(offset + 1),
        rfData: payload.subarray(offset + 2),
    };
}

function encodeRawReceive(
    frameType: XBeeApiFrameType,
    address: { source64: bigint } | { source16: number },
    rssi: number,
    receiveOptions: number,
    rfData: Buffer,
): Buffer {
    const addressLength = "source64" in address ? 8 : 2;
    const data = Buffer.alloc(3 + addressLength + rfData.byteLength);
    let offset = data.writeUInt8(frameType, 0);
    offset = "source64" in address ? writeAddress64(data, address.source64, offset) : writeAddress16(data, address.source16, offset);
    offset = data.writeUInt8(rssi, offset);
    offset = data.writeUInt8(receiveOptions, offset);

    rfData.copy(data, offset);

    return data;
}

export function decodeRX64Packet(payload: Buffer): RX64Packet {
    assertMinLength(payload, ReceivePacketConsts.RX_64_MIN_LENGTH, XBeeApiFrameType.RX_64);

    const [source64] = readAddress64(payload, 1);

    return { frameType: XBeeApiFrameType.RX_64, source64, ...decodeRawReceive(payload, 8) };
}

export function encodeRX64Packet(packet: RX64Packet): Buffer {
    return encodeRawReceive(packet.frameType, packet, packet.rssi, packet.receiveOptions, packet.rfData);
}

export function decodeRX16Packet(payload: Buffer): RX16Packet {
    assertMinLength(payload, ReceivePacketConsts.RX_16_MIN_LENGTH, XBeeApiFrameType.RX_16);

    const [source16] = readAddress16(payload, 1);

    return { frameType: XBeeApiFrameType.RX_16, source16, ...decodeRawReceive(payload, 2) };
}

export function encodeRX16Packet(packet: RX16Packet): Buffer {
    return encodeRawReceive(packet.frameType, packet, packet.rssi, packet.receiveOptions, packet.rfData);
}

export function decodeRX64IOPacket(payload: Buffer): RX64IOPacket {
    assertMinLength(payload, ReceivePacketConsts.RX_64_MIN_LENGTH, XBeeApiFrameType.RX_IO_64);

    const [source64] = readAddress64(payload, 1);
    const fields = decodeRawReceive(payload, 8);

    return { frameType: XBeeApiFrameType.RX_IO_64, source64, ...fields, ioSample: decodeOptionalIOSample(fields.rfData) };
}

export function encodeRX64IOPacket(packet: RX64IOPacket): Buffer {
    return encodeRawReceive(packet.frameType, packet, packet.rssi, packet.receiveOptions, packet.rfData);
}

export function decodeRX16IOPacket(payload: Buffer): RX16IOPacket {
    assertMinLength(payload, ReceivePacketConsts.RX_16_MIN_LENGTH, XBeeApiFrameType.RX_IO_16);

    const [source16] = readAddress16(payload, 1);
    const fields = decodeRawReceive(payload, 2);

    return { frameType: XBeeApiFrameType.RX_IO_16, source16, ...fields, ioSample: decodeOptionalIOSample(fields.rfData) };
}

export function encodeRX16IOPacket(packet: RX16IOPacket): Buffer {
    return encodeRawReceive(packet.frameType, packet, packet.rssi, packet.receiveOptions, packet.rfData);
}

/**
 * 802.15.4 frames flag both address and PAN broadcasts.
 */
export function isRawReceiveOptionsBroadcast(receiveOptions: number): boolean {
    return (receiveOptions & (XBeeRawReceiveOptions.ADDRESS_BROADCAST | XBeeRawReceiveOptions.PAN_BROADCAST)) !== 0;
}

export function getRawReceivePacketParameters(packet: RX64Packet | RX16Packet | RX64IOPacket | RX16IOPacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        "source64" in packet
            ? ["64-bit source address", prettyHexString(address64ToString(packet.source64))]
            : ["16-bit source address", prettyHexString(address16ToString(packet.source16))],
        ["RSSI", toHexString(packet.rssi, 1)],
        ["Options", toHexString(packet.receiveOptions, 1)],
    ];

    return "ioSample" in packet ? pushIOSample(parameters, packet.rfData, packet.ioSample) : pushRFData(parameters, packet.rfData);
}

// #endregion

// #region Modem Status

export function decodeModemStatusPacket(payload: Buffer): ModemStatusPacket {
    assertMinLength(payload, ReceivePacketConsts.MODEM_STATUS_MIN_LENGTH, XBeeApiFrameType.MODEM_STATUS);

    const status: XBeeModemStatus = payload.readUInt8(1);

    return { frameType: XBeeApiFrameType.MODEM_STATUS, status };
}

export function encodeModemStatusPacket(packet: ModemStatusPacket): Buffer {
    const data = Buffer.alloc(ReceivePacketConsts.MODEM_STATUS_MIN_LENGTH);

    data.writeUInt8(packet.frameType, 0);
    data.writeUInt8(packet.status, 1);

    return data;
}

export function getModemStatusPacketParameters(packet: ModemStatusPacket): XBeePacketParameters {
    return [["Modem status", `${toHexString(packet.status, 1)} (${getXBeeModemStatusDescription(packet.status)})`]];
}

// #endregion
