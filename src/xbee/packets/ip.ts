import { isIPv4 } from "node:net";
import { XBeeApiFrameType } from "../frame-types.js";
import { XBEE_IP_PROTOCOL_NAMES, XBeeIPProtocol } from "../options.js";
import { prettyHexString, prettyValue, toHexString } from "../utils.js";
import { assertMinLength, hexParameter, writeFrameId, type XBeePacketParameters } from "./codec.js";

export const enum IPPacketConsts {
    /** type + frame ID + IP + dest port + source port + protocol + options */
    TX_IPV4_MIN_LENGTH = 12,
    /** type + IP + dest port + source port + protocol + status */
    RX_IPV4_MIN_LENGTH = 11,
    PHONE_NUMBER_LENGTH = 20,
    /** type + frame ID + options + phone number */
    TX_SMS_MIN_LENGTH = 23,
    /** type + phone number */
    RX_SMS_MIN_LENGTH = 21,
}

export type TXIPv4Packet = {
    frameType: XBeeApiFrameType.TX_IPV4;
    frameId: number;
    /** dotted quad */
    destinationAddress: string;
    destinationPort: number;
    sourcePort: number;
    protocol: XBeeIPProtocol;
    /** XBeeIPTransmitOptions */
    transmitOptions: number;
    data: Buffer;
};

export type RXIPv4Packet = {
    frameType: XBeeApiFrameType.RX_IPV4;
    sourceAddress: string;
    destinationPort: number;
    sourcePort: number;
    protocol: XBeeIPProtocol;
    data: Buffer;
};

export type TXSMSPacket = {
    frameType: XBeeApiFrameType.TX_SMS;
    frameId: number;
    phoneNumber: string;
    data: string | undefined;
};

export type RXSMSPacket = {
    frameType: XBeeApiFrameType.RX_SMS;
    phoneNumber: string;
    data: string | undefined;
};

const PHONE_NUMBER_REGEX = /^\+?\d+$/;

function readIPv4(payload: Buffer, offset: number): [string, offset: number] {
    return [Array.from(payload.subarray(offset, offset + 4)).join("."), offset + 4];
}

function writeIPv4(data: Buffer, address: string, offset: number): number {
    if (!isIPv4(address)) {
        throw new Error(`Invalid IPv4 address, got ${address}`);
    }

    for (const octet of address.split(".")) {
        offset = data.writeUInt8(Number.parseInt(octet, 10), offset);
    }

    return offset;
}

function readPhoneNumber(payload: Buffer, offset: number): [string, offset: number] {
    const phoneNumber = payload.toString("utf8", offset, offset + IPPacketConsts.PHONE_NUMBER_LENGTH).replaceAll("\u0000", "");

    return [phoneNumber, offset + IPPacketConsts.PHONE_NUMBER_LENGTH];
}

function writePhoneNumber(data: Buffer, phoneNumber: string, offset: number): number {
    if (!PHONE_NUMBER_REGEX.test(phoneNumber) || Buffer.byteLength(phoneNumber, "utf8") > IPPacketConsts.PHONE_NUMBER_LENGTH) {
        throw new Error(`Invalid phone number, got ${phoneNumber}, expected up to ${IPPacketConsts.PHONE_NUMBER_LENGTH} digits`);
    }

    // NUL padded
    data.write(phoneNumber, offset, "utf8");

    return offset + IPPacketConsts.PHONE_NUMBER_LENGTH;
}

function readOptionalString(payload: Buffer, offset: number): string | undefined {
    return offset < payload.byteLength ? payload.toString("utf8", offset) : undefined;
}

function ipProtocolParameter(protocol: XBeeIPProtocol): string {
    return `${toHexString(protocol, 1)} (${XBEE_IP_PROTOCOL_NAMES[protocol] ?? XBEE_IP_PROTOCOL_NAMES[XBeeIPProtocol.UNKNOWN]})`;
}

// #region TX IPv4

export function decodeTXIPv4Packet(payload: Buffer): TXIPv4Packet {
    assertMinLength(payload, IPPacketConsts.TX_IPV4_MIN_LENGTH, XBeeApiFrameType.TX_IPV4);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destinationAddress, portOffset] = readIPv4(payload, offset);
    offset = portOffset;
    const destinationPort = payload.readUInt16BE(offset);
    offset += 2;
    const sourcePort = payload.readUInt16BE(offset);
    offset += 2;
    const protocol: XBeeIPProtocol = payload.readUInt8(offset);
    offset += 1;
    const transmitOptions = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.TX_IPV4,
        frameId,
        destinationAddress,
        destinationPort,
        sourcePort,
        protocol,
        transmitOptions,
        data: payload.subarray(offset),
    };
}

export function encodeTXIPv4Packet(packet: TXIPv4Packet): Buffer {
    const data = Buffer.alloc(IPPacketConsts.TX_IPV4_MIN_LENGTH + packet.data.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeIPv4(data, packet.destinationAddress, offset);
    offset = data.writeUInt16BE(packet.destinationPort, offset);
    offset = data.writeUInt16BE(packet.sourcePort, offset);
    offset = data.writeUInt8(packet.protocol, offset);
    offset = data.writeUInt8(packet.transmitOptions, offset);

    packet.data.copy(data, offset);

    return data;
}

export function getTXIPv4PacketParameters(packet: TXIPv4Packet): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        ["Destination address", packet.destinationAddress],
        ["Destination port", prettyValue(packet.destinationPort, 2)],
        ["Source port", prettyValue(packet.sourcePort, 2)],
        ["Protocol", ipProtocolParameter(packet.protocol)],
        ["Transmit options", toHexString(packet.transmitOptions, 1)],
    ];

    if (packet.data.byteLength > 0) {
        parameters.push(["Payload", hexParameter(packet.data)]);
    }

    return parameters;
}

// #endregion

// #region RX IPv4

export function decodeRXIPv4Packet(payload: Buffer): RXIPv4Packet {
    assertMinLength(payload, IPPacketConsts.RX_IPV4_MIN_LENGTH, XBeeApiFrameType.RX_IPV4);

    const [sourceAddress, portOffset] = readIPv4(payload, 1);
    let offset = portOffset;
    const destinationPort = payload.readUInt16BE(offset);
    offset += 2;
    const sourcePort = payload.readUInt16BE(offset);
    offset += 2;
    const protocol: XBeeIPProtocol = payload.readUInt8(offset);
    offset += 1;
    // status, reserved
    offset += 1;

    return {
        frameType: XBeeApiFrameType.RX_IPV4,
        sourceAddress,
        destinationPort,
        sourcePort,
        protocol,
        data: payload.subarray(offset),
    };
}

export function encodeRXIPv4Packet(packet: RXIPv4Packet): Buffer {
    const data = Buffer.alloc(IPPacketConsts.RX_IPV4_MIN_LENGTH + packet.data.byteLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeIPv4(data, packet.sourceAddress, offset);
    offset = data.writeUInt16BE(packet.destinationPort, offset);
    offset = data.writeUInt16BE(packet.sourcePort, offset);
    offset = data.writeUInt8(packet.protocol, offset);
    offset = data.writeUInt8(0, offset);

    packet.data.copy(data, offset);

    return data;
}

export function getRXIPv4PacketParameters(packet: RXIPv4Packet): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        ["Source address", packet.sourceAddress],
        ["Destination port", prettyValue(packet.destinationPort, 2)],
        ["Source port", prettyValue(packet.sourcePort, 2)],
        ["Protocol", ipProtocolParameter(packet.protocol)],
        ["Status", "00 (Reserved)"],
    ];

    if (packet.data.byteLength > 0) {
        parameters.push(["Payload", hexParameter(packet.data)]);
    }

    return parameters;
}

// #endregion

// #region SMS

export function decodeTXSMSPacket(payload: Buffer): TXSMSPacket {
    assertMinLength(payload, IPPacketConsts.TX_SMS_MIN_LENGTH, XBeeApiFrameType.TX_SMS);

    const frameId = payload.readUInt8(1);
    // options byte at 2, reserved
    const [phoneNumber, dataOffset] = readPhoneNumber(payload, 3);

    return { frameType: XBeeApiFrameType.TX_SMS, frameId, phoneNumber, data: readOptionalString(payload, dataOffset) };
}

export function encodeTXSMSPacket(packet: TXSMSPacket): Buffer {
    const dataLength = packet.data === undefined ? 0 : Buffer.byteLength(packet.data, "utf8");
    const data = Buffer.alloc(IPPacketConsts.TX_SMS_MIN_LENGTH + dataLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = data.writeUInt8(0, offset);
    offset = writePhoneNumber(data, packet.phoneNumber, offset);

    if (packet.data !== undefined) {
        data.write(packet.data, offset, "utf8");
    }

    return data;
}

export function decodeRXSMSPacket(payload: Buffer): RXSMSPacket {
    assertMinLength(payload, IPPacketConsts.RX_SMS_MIN_LENGTH, XBeeApiFrameType.RX_SMS);

    const [phoneNumber, dataOffset] = readPhoneNumber(payload, 1);

    return { frameType: XBeeApiFrameType.RX_SMS, phoneNumber, data: readOptionalString(payload, dataOffset) };
}

export function encodeRXSMSPacket(packet: RXSMSPacket): Buffer {
    const dataLength = packet.data === undefined ? 0 : Buffer.byteLength(packet.data, "utf8");
    const data = Buffer.alloc(IPPacketConsts.RX_SMS_MIN_LENGTH + dataLength);
    const offset = writePhoneNumber(data, packet.phoneNumber, data.writeUInt8(packet.frameType, 0));

    if (packet.data !== undefined) {
        data.write(packet.data, offset, "utf8");
    }

    return data;
}

export function getSMSPacketParameters(packet: TXSMSPacket | RXSMSPacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [];

    if (packet.frameType === XBeeApiFrameType.TX_SMS) {
        parameters.push(["Transmit options", "00"]);
    }

    parameters.push(["Phone number", `${prettyHexString(Buffer.from(packet.phoneNumber, "utf8").toString("hex").toUpperCase())} (${packet.phoneNumber})`]);

    if (packet.data !== undefined) {
        parameters.push(["Data", packet.data]);
    }

    return parameters;
}

// #endregion
