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
import { type ATCommandStatus, getATCommandStatusDescription } from "../statuses.js";
import { prettyHexString, toHexString } from "../utils.js";
import {
    assertMinLength,
    hexParameter,
    readATCommand,
    readRemaining,
    writeATCommand,
    writeFrameId,
    type XBeePacketParameters,
} from "./codec.js";

export const enum ATCommandPacketConsts {
    /** type + frame ID + command */
    AT_COMMAND_MIN_LENGTH = 4,
    /** type + frame ID + command + status */
    AT_COMMAND_RESPONSE_MIN_LENGTH = 5,
    /** type + frame ID + 64-bit address + 16-bit address + options + command */
    REMOTE_AT_COMMAND_REQUEST_MIN_LENGTH = 15,
    /** type + frame ID + 64-bit address + 16-bit address + command + status */
    REMOTE_AT_COMMAND_RESPONSE_MIN_LENGTH = 15,
}

/**
 * Local AT command, applied immediately (AT_COMMAND) or queued until AC/a non-queued command (AT_COMMAND_QUEUE).
 */
export type ATCommandPacket = {
    frameType: XBeeApiFrameType.AT_COMMAND | XBeeApiFrameType.AT_COMMAND_QUEUE;
    frameId: number;
    /** 2 ASCII characters, e.g. `NI` */
    command: string;
    /** undefined to query the current value */
    parameter: Buffer | undefined;
};

export type ATCommandResponsePacket = {
    frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE;
    frameId: number;
    command: string;
    status: ATCommandStatus;
    value: Buffer | undefined;
};

export type RemoteATCommandRequestPacket = {
    frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST;
    frameId: number;
    destination64: bigint;
    destination16: number;
    /** bitfield of RemoteATCommandOptions */
    options: number;
    command: string;
    parameter: Buffer | undefined;
};

export type RemoteATCommandResponsePacket = {
    frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE;
    frameId: number;
    source64: bigint;
    source16: number;
    command: string;
    status: ATCommandStatus;
    value: Buffer | undefined;
};

function commandParameter(command: string): string {
    return `${prettyHexString(Buffer.from(command, "latin1").toString("hex").toUpperCase())} (${command})`;
}

// #region AT Command

export function decodeATCommandPacket(payload: Buffer): ATCommandPacket {
    const frameType = payload[0] === XBeeApiFrameType.AT_COMMAND_QUEUE ? XBeeApiFrameType.AT_COMMAND_QUEUE : XBeeApiFrameType.AT_COMMAND;

    assertMinLength(payload, ATCommandPacketConsts.AT_COMMAND_MIN_LENGTH, frameType);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [command, parameterOffset] = readATCommand(payload, offset);

    return { frameType, frameId, command, parameter: readRemaining(payload, parameterOffset) };
}

export function encodeATCommandPacket(packet: ATCommandPacket): Buffer {
    const parameterLength = packet.parameter?.byteLength ?? 0;
    const data = Buffer.alloc(ATCommandPacketConsts.AT_COMMAND_MIN_LENGTH + parameterLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeATCommand(data, packet.command, offset);

    packet.parameter?.copy(data, offset);

    return data;
}

export function getATCommandPacketParameters(packet: ATCommandPacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [["AT Command", commandParameter(packet.command)]];

    if (packet.parameter !== undefined) {
        parameters.push(["Parameter", hexParameter(packet.parameter)]);
    }

    return parameters;
}

// #endregion

// #region AT Command Response

export function decodeATCommandResponsePacket(payload: Buffer): ATCommandResponsePacket {
    assertMinLength(payload, ATCommandPacketConsts.AT_COMMAND_RESPONSE_MIN_LENGTH, XBeeApiFrameType.AT_COMMAND_RESPONSE);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [command, statusOffset] = readATCommand(payload, offset);
    offset = statusOffset;
    const status: ATCommandStatus = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.AT_COMMAND_RESPONSE,
        frameId,
        command,
        status,
        value: readRemaining(payload, offset),
    };
}

export function encodeATCommandResponsePacket(packet: ATCommandResponsePacket): Buffer {
    const valueLength = packet.value?.byteLength ?? 0;
    const data = Buffer.alloc(ATCommandPacketConsts.AT_COMMAND_RESPONSE_MIN_LENGTH + valueLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeATCommand(data, packet.command, offset);
    offset = data.writeUInt8(packet.status, offset);

    packet.value?.copy(data, offset);

    return data;
}

export function getATCommandResponsePacketParameters(packet: ATCommandResponsePacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        ["AT Command", commandParameter(packet.command)],
        ["Status", `${toHexString(packet.status, 1)} (${getATCommandStatusDescription(packet.status)})`],
    ];

    if (packet.value !== undefined) {
        parameters.push(["Response", hexParameter(packet.value)]);
    }

    return parameters;
}

// #endregion

// #region Remote AT Command Request

export function decodeRemoteATCommandRequestPacket(payload: Buffer): RemoteATCommandRequestPacket {
    assertMinLength(payload, ATCommandPacketConsts.REMOTE_AT_COMMAND_REQUEST_MIN_LENGTH, XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [destination64, dest16Offset] = readAddress64(payload, offset);
    const [destination16, optionsOffset] = readAddress16(payload, dest16Offset);
    offset = optionsOffset;
    const options = payload.readUInt8(offset);
    offset += 1;
    const [command, parameterOffset] = readATCommand(payload, offset);

    return {
        frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST,
        frameId,
        destination64,
        destination16,
        options,
        command,
        parameter: readRemaining(payload, parameterOffset),
    };
}

export function encodeRemoteATCommandRequestPacket(packet: RemoteATCommandRequestPacket): Buffer {
    const parameterLength = packet.parameter?.byteLength ?? 0;
    const data = Buffer.alloc(ATCommandPacketConsts.REMOTE_AT_COMMAND_REQUEST_MIN_LENGTH + parameterLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress64(data, packet.destination64, offset);
    offset = writeAddress16(data, packet.destination16, offset);
    offset = data.writeUInt8(packet.options, offset);
    offset = writeATCommand(data, packet.command, offset);

    packet.parameter?.copy(data, offset);

    return data;
}

export function isRemoteATCommandRequestBroadcast(packet: RemoteATCommandRequestPacket): boolean {
    return packet.destination64 === XBEE_64_BROADCAST || packet.destination16 === XBee16BitAddress.BROADCAST;
}

export function getRemoteATCommandRequestPacketParameters(packet: RemoteATCommandRequestPacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        ["64-bit dest. address", prettyHexString(address64ToString(packet.destination64))],
        ["16-bit dest. address", prettyHexString(address16ToString(packet.destination16))],
        ["Command options", toHexString(packet.options, 1)],
        ["AT Command", commandParameter(packet.command)],
    ];

    if (packet.parameter !== undefined) {
        parameters.push(["Parameter", hexParameter(packet.parameter)]);
    }

    return parameters;
}

// #endregion

// #region Remote AT Command Response

export function decodeRemoteATCommandResponsePacket(payload: Buffer): RemoteATCommandResponsePacket {
    assertMinLength(payload, ATCommandPacketConsts.REMOTE_AT_COMMAND_RESPONSE_MIN_LENGTH, XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE);

    let offset = 1;
    const frameId = payload.readUInt8(offset);
    offset += 1;
    const [source64, src16Offset] = readAddress64(payload, offset);
    const [source16, commandOffset] = readAddress16(payload, src16Offset);
    const [command, statusOffset] = readATCommand(payload, commandOffset);
    offset = statusOffset;
    const status: ATCommandStatus = payload.readUInt8(offset);
    offset += 1;

    return {
        frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE,
        frameId,
        source64,
        source16,
        command,
        status,
        value: readRemaining(payload, offset),
    };
}

export function encodeRemoteATCommandResponsePacket(packet: RemoteATCommandResponsePacket): Buffer {
    const valueLength = packet.value?.byteLength ?? 0;
    const data = Buffer.alloc(ATCommandPacketConsts.REMOTE_AT_COMMAND_RESPONSE_MIN_LENGTH + valueLength);
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = writeAddress64(data, packet.source64, offset);
    offset = writeAddress16(data, packet.source16, offset);
    offset = writeATCommand(data, packet.command, offset);
    offset = data.writeUInt8(packet.status, offset);

    packet.value?.copy(data, offset);

    return data;
}

export function getRemoteATCommandResponsePacketParameters(packet: RemoteATCommandResponsePacket): XBeePacketParameters {
    const parameters: XBeePacketParameters = [
        ["64-bit source address", prettyHexString(address64ToString(packet.source64))],
        ["16-bit source address", prettyHexString(address16ToString(packet.source16))],
        ["AT Command", commandParameter(packet.command)],
        ["Status", `${toHexString(packet.status, 1)} (${getATCommandStatusDescription(packet.status)})`],
    ];

    if (packet.value !== undefined) {
        parameters.push(["Response", hexParameter(packet.value)]);
    }

    return parameters;
}

// #endregion
