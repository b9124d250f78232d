import {
    address16ToString,
    address64ToString,
    readAddress16,
    readAddress64,
    writeAddress16,
    writeAddress64,
    XBEE_64_BROADCAST,
    XBee16BitAddress,
} from "../address.js";
import { XBeeApiFrameType } from "../frame-types.js";
import {
    getXBeeDiscoveryStatusDescription,
    getXBeeTransmitStatusDescription,
    type XBeeDiscoveryStatus,
    type XBeeTransmitStatus,
} from "../statuses.js";
import { prettyHexString, prettyValue, toHexString } from "../utils.js";
import { assertMinLength, hexParameter, writeFrameId, type XBeePacketParameters } from "./codec.js";

export const enum TransmitPacketConsts {
    /** type + frame ID + 64-bit address + 16-bit address + radius + options */
    TRANSMIT_REQUEST_MIN_LENGTH = 14,
    /** type + frame ID + 16-bit address + retry count + delivery status + discovery status */
    TRANSMIT_STATUS_MIN_LENGTH = 7,
    /** type + frame ID + 64-bit address + 16-bit address + endpoints + cluster + profile + radius + options */
    EXPLICIT_ADDRESSING_MIN_LENGTH = 20,
    /** type + frame ID + 64-bit address + options */
    TX_64_MIN_LENGTH = 11,
    /** type + frame ID + 16-bit address + options */
    TX_16_MIN_LENGTH = 5,
    /** type + frame ID + status */
    TX_STATUS_MIN_LENGTH = 3,
}

export type TransmitRequestPacket = {
    frameType: XBeeApiFrameType.TRANSMIT_REQUEST;
    frameId: number;
    destination64: bigint;
    destination16: number;
    /** max hops of a broadcast, 0 for the device maximum */
    broadcastRadius: number;
    /** bitfield of XBeeTransmitOptions */
    options: number;
    rfData: Buffer;
};

export type TransmitStatusPacket = {
    frameType: XBeeApiFrameType.TRANSMIT_STATUS;
    frameId: number;
    destination16: number;
    retryCount: number;
    deliveryStatus: XBeeTransmitStatus;
    discoveryStatus: XBeeDiscoveryStatus;
};

export type ExplicitAddressingPacket = {
    frameType: XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME;
    frameId: number;
    destination64: bigint;
    destination16: number;
    sourceEndpoint: number;
    destinationEndpoint: number;
    clusterId: number;
    profileId: number;
    broadcastRadius: number;
    options: number;
    rfData: Buffer;
};

/** 802.15.4 transmit request with 64-bit addressing */
export type TX64Packet = {
    frameType: XBeeApiFrameType.TX_64;
    frameId: number;
    destination64: bigint;
    options: number;
    rfData: Buffer;
};

/** 802.15.4 transmit request with 16-bit addressing */
export type TX16Packet = {
    frameType: XBeeApiFrameType.TX_16;
    frameId: number;
    destination16: number;
    options: number;
    rfData: Buffer;
};

/** 802.15.4 transmit status */
export type TXStatusPacket = {
    frameType: XBeeApiFrameType.TX_STATUS;
    frameId: number;
    status: XBeeTransmitStatus;
};

function transmitStatusParameter(status: XBeeTransmitStatus): string {
    return `${toHexString(status, 1)} (${getXBeeTransmitStatusDescription(status)})`;
}

function pushRFData(parameters: XBeePacketParameters, rfData: Buffer): XBeePacketParameters {
    if (rfData.byteLength > 0) {
        parameters.push(["RF data", hexParameter(rfData)]);
    }

    return parameters;
}

// #region Transmit Request

export function decodeTransmitRequestPacket(payload: Buffer): TransmitRequestPacket {
    assertMinLength(payload, TransmitPacketConsts.TRANSMIT_REQUEST_MIN_LENGTH, XBeeApiFrameType.TRANSMIT_REQUEST);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination64, dest16Offset] = readAddress64(payload, offset);
    const [destination16, radiusOffset] = readAddress16(payload, dest16Offset);
    offset = radiusOffset;
    const broadcastRadius = payload.readUInt8(offset);
    offset += 1;
    const options = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.TRANSMIT_REQUEST,
        frameId,
        destination64,
        destination16,
        broadcastRadius,
        options,
        rfData: payload.subarray(offset),
    };
}

export function encodeTransmitRequestPacket(packet: TransmitRequestPacket): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.TRANSMIT_REQUEST_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress64(data, packet.destination64, offset);
    offset = writeAddress16(data, packet.destination16, offset);
    offset = data.writeUInt8(packet.broadcastRadius, offset);
    offset = data.writeUInt8(packet.options, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function getTransmitRequestPacketParameters(packet: TransmitRequestPacket): XBeePacketParameters {
    return pushRFData(
        [
            ["64-bit dest. address", prettyHexString(address64ToString(packet.destination64))],
            ["16-bit dest. address", prettyHexString(address16ToString(packet.destination16))],
            ["Broadcast radius", prettyValue(packet.broadcastRadius, 1)],
            ["Options", toHexString(packet.options, 1)],
        ],
        packet.rfData,
    );
}

// #endregion

// #region Transmit Status

export function decodeTransmitStatusPacket(payload: Buffer): TransmitStatusPacket {
    assertMinLength(payload, TransmitPacketConsts.TRANSMIT_STATUS_MIN_LENGTH, XBeeApiFrameType.TRANSMIT_STATUS);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination16, retryOffset] = readAddress16(payload, offset);
    offset = retryOffset;
    const retryCount = payload.readUInt8(offset);
    offset += 1;
    const deliveryStatus: XBeeTransmitStatus = payload.readUInt8(offset);
    offset += 1;
    const discoveryStatus: XBeeDiscoveryStatus = payload.readUInt8(offset);

    return {
        frameType: XBeeApiFrameType.TRANSMIT_STATUS,
        frameId,
        destination16,
        retryCount,
        deliveryStatus,
        discoveryStatus,
    };
}

export function encodeTransmitStatusPacket(packet: TransmitStatusPacket): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.TRANSMIT_STATUS_MIN_LENGTH);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress16(data, packet.destination16, offset);
    offset = data.writeUInt8(packet.retryCount, offset);
    offset = data.writeUInt8(packet.deliveryStatus, offset);
    data.writeUInt8(packet.discoveryStatus, offset);

    return data;
}

export function getTransmitStatusPacketParameters(packet: TransmitStatusPacket): XBeePacketParameters {
    return [
        ["16-bit dest. address", prettyHexString(address16ToString(packet.destination16))],
        ["Tx. retry count", prettyValue(packet.retryCount, 1)],
        ["Delivery status", transmitStatusParameter(packet.deliveryStatus)],
        ["Discovery status", `${toHexString(packet.discoveryStatus, 1)} (${getXBeeDiscoveryStatusDescription(packet.discoveryStatus)})`],
    ];
}

// #endregion

// #region Explicit Addressing Command

export function decodeExplicitAddressingPacket(payload: Buffer): ExplicitAddressingPacket {
    assertMinLength(payload, TransmitPacketConsts.EXPLICIT_ADDRESSING_MIN_LENGTH, XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination64, dest16Offset] = readAddress64(payload, offset);
    const [destination16, endpointOffset] = readAddress16(payload, dest16Offset);
    offset = endpointOffset;
    const sourceEndpoint = payload.readUInt8(offset);
    offset += 1;
    const destinationEndpoint = payload.readUInt8(offset);
    offset += 1;
    const clusterId = payload.readUInt16BE(offset);
    offset += 2;
    const profileId = payload.readUInt16BE(offset);
    offset += 2;
    const broadcastRadius = payload.readUInt8(offset);
    offset += 1;
    const options = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME,
        frameId,
        destination64,
        destination16,
        sourceEndpoint,
        destinationEndpoint,
        clusterId,
        profileId,
        broadcastRadius,
        options,
        rfData: payload.subarray(offset),
    };
}

export function encodeExplicitAddressingPacket(packet: ExplicitAddressingPacket): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.EXPLICIT_ADDRESSING_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress64(data, packet.destination64, offset);
    offset = writeAddress16(data, packet.destination16, offset);
    offset = data.writeUInt8(packet.sourceEndpoint, offset);
    offset = data.writeUInt8(packet.destinationEndpoint, offset);
    offset = data.writeUInt16BE(packet.clusterId, offset);
    offset = data.writeUInt16BE(packet.profileId, offset);
    offset = data.writeUInt8(packet.broadcastRadius, offset);
    offset = data.writeUInt8(packet.options, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function getExplicitAddressingPacketParameters(packet: ExplicitAddressingPacket): XBeePacketParameters {
    return pushRFData(
        [
            ["64-bit dest. address", prettyHexString(address64ToString(packet.destination64))],
            ["16-bit dest. address", prettyHexString(address16ToString(packet.destination16))],
            ["Source endpoint", toHexString(packet.sourceEndpoint, 1)],
            ["Dest. endpoint", toHexString(packet.destinationEndpoint, 1)],
            ["Cluster ID", prettyHexString(toHexString(packet.clusterId, 2))],
            ["Profile ID", prettyHexString(toHexString(packet.profileId, 2))],
            ["Broadcast radius", prettyValue(packet.broadcastRadius, 1)],
            ["Transmit options", toHexString(packet.options, 1)],
        ],
        packet.rfData,
    );
}

// #endregion

// #region TX 64/16

export function decodeTX64Packet(payload: Buffer): TX64Packet {
    assertMinLength(payload, TransmitPacketConsts.TX_64_MIN_LENGTH, XBeeApiFrameType.TX_64);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination64, optionsOffset] = readAddress64(payload, offset);
    offset = optionsOffset;
    const options = payload.readUInt8(offset);
    offset += 1;

    return { frameType: XBeeApiFrameType.TX_64, frameId, destination64, options, rfData: payload.subarray(offset) };
}

export function encodeTX64Packet(packet: TX64Packet): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.TX_64_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress64(data, packet.destination64, offset);
    offset = data.writeUInt8(packet.options, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function decodeTX16Packet(payload: Buffer): TX16Packet {
    assertMinLength(payload, TransmitPacketConsts.TX_16_MIN_LENGTH, XBeeApiFrameType.TX_16);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination16, optionsOffset] = readAddress16(payload, offset);
    offset = optionsOffset;
    const options = payload.readUInt8(offset);
    offset += 1;

    return { frameType: XBeeApiFrameType.TX_16, frameId, destination16, options, rfData: payload.subarray(offset) };
}

export function encodeTX16Packet(packet: TX16Packet): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.TX_16_MIN_LENGTH + packet.rfData.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress16(data, packet.destination16, offset);
    offset = data.writeUInt8(packet.options, offset);

    packet.rfData.copy(data, offset);

    return data;
}

export function getTX64PacketParameters(packet: TX64Packet): XBeePacketParameters {
    return pushRFData(
        [
            ["64-bit dest. address", prettyHexString(address64ToString(packet.destination64))],
            ["Options", toHexString(packet.options, 1)],
        ],
        packet.rfData,
    );
}

export function getTX16PacketParameters(packet: TX16Packet): XBeePacketParameters {
    return pushRFData(
        [
            ["16-bit dest. address", prettyHexString(address16ToString(packet.destination16))],
            ["Options", toHexString(packet.options, 1)],
        ],
        packet.rfData,
    );
}

// #endregion

// #region TX Status

export function decodeTXStatusPacket(payload: Buffer): TXStatusPacket {
    assertMinLength(payload, TransmitPacketConsts.TX_STATUS_MIN_LENGTH, XBeeApiFrameType.TX_STATUS);

    const frameId = payload.readUInt8(1);
    const status: XBeeTransmitStatus = payload.readUInt8(2);

    return { frameType: XBeeApiFrameType.TX_STATUS, frameId, status };
}

export function encodeTXStatusPacket(packet: TXStatusPacket): Buffer {
    const data = Buffer.alloc(TransmitPacketConsts.TX_STATUS_MIN_LENGTH);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    data.writeUInt8(packet.status, offset);

    return data;
}

export function getTXStatusPacketParameters(packet: TXStatusPacket): XBeePacketParameters {
    return [["Status", transmitStatusParameter(packet.status)]];
}

// #endregion

export function isTransmitBroadcast(packet: TransmitRequestPacket | ExplicitAddressingPacket): boolean {
    return packet.destination64 === XBEE_64_BROADCAST || packet.destination16 === XBee16BitAddress.BROADCAST;
}
