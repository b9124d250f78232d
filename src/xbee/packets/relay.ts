import { XBeeApiFrameType } from "../frame-types.js";
import { XBEE_LOCAL_INTERFACE_NAMES, XBeeLocalInterface } from "../options.js";
import { toHexString } from "../utils.js";
import { assertMinLength, hexParameter, readRemaining, writeFrameId, type XBeePacketParameters } from "./codec.js";

export const enum RelayPacketConsts {
    /** type + frame ID + destination interface */
    USER_DATA_RELAY_MIN_LENGTH = 3,
    /** type + source interface */
    USER_DATA_RELAY_OUTPUT_MIN_LENGTH = 2,
}

/** Data relayed to another local interface (serial, BLE, MicroPython) */
export type UserDataRelayPacket = {
    frameType: XBeeApiFrameType.USER_DATA_RELAY;
    frameId: number;
    destinationInterface: XBeeLocalInterface;
    data: Buffer | undefined;
};

export type UserDataRelayOutputPacket = {
    frameType: XBeeApiFrameType.USER_DATA_RELAY_OUTPUT;
    sourceInterface: XBeeLocalInterface;
    data: Buffer | undefined;
};

function interfaceParameter(localInterface: XBeeLocalInterface): string {
    const name = XBEE_LOCAL_INTERFACE_NAMES[localInterface] ?? XBEE_LOCAL_INTERFACE_NAMES[XBeeLocalInterface.UNKNOWN];

    return `${toHexString(localInterface, 1)} (${name})`;
}

export function decodeUserDataRelayPacket(payload: Buffer): UserDataRelayPacket {
    assertMinLength(payload, RelayPacketConsts.USER_DATA_RELAY_MIN_LENGTH, XBeeApiFrameType.USER_DATA_RELAY);

    const frameId = payload.readUInt8(1);
    const destinationInterface: XBeeLocalInterface = payload.readUInt8(2);

    return { frameType: XBeeApiFrameType.USER_DATA_RELAY, frameId, destinationInterface, data: readRemaining(payload, 3) };
}

export function encodeUserDataRelayPacket(packet: UserDataRelayPacket): Buffer {
    const data = Buffer.alloc(RelayPacketConsts.USER_DATA_RELAY_MIN_LENGTH + (packet.data?.byteLength ?? 0));
    let offset = data.writeUInt8(packet.frameType, 0);
    offset = writeFrameId(data, packet.frameId, offset);
    offset = data.writeUInt8(packet.destinationInterface, offset);

    packet.data?.copy(data, offset);

    return data;
}

export function decodeUserDataRelayOutputPacket(payload: Buffer): UserDataRelayOutputPacket {
    assertMinLength(payload, RelayPacketConsts.USER_DATA_RELAY_OUTPUT_MIN_LENGTH, XBeeApiFrameType.USER_DATA_RELAY_OUTPUT);

    const sourceInterface: XBeeLocalInterface = payload.readUInt8(1);

    return { frameType: XBeeApiFrameType.USER_DATA_RELAY_OUTPUT, sourceInterface, data: readRemaining(payload, 2) };
}

export function encodeUserDataRelayOutputPacket(packet: UserDataRelayOutputPacket): Buffer {
    const data = Buffer.alloc(RelayPacketConsts.USER_DATA_RELAY_OUTPUT_MIN_LENGTH + (packet.data?.byteLength ?? 0));
    const offset = data.writeUInt8(packet.sourceInterface, data.writeUInt8(packet.frameType, 0));

    packet.data?.copy(data, offset);

    return data;
}

export function getUserDataRelayPacketParameters(packet: UserDataRelayPacket | UserDataRelayOutputPacket): XBeePacketParameters {
    const parameters: XBeePacketParameters =
        packet.frameType === XBeeApiFrameType.USER_DATA_RELAY
            ? [["Destination interface", interfaceParameter(packet.destinationInterface)]]
            : [["Source interface", interfaceParameter(packet.sourceInterface)]];

    if (packet.data !== undefined) {
        parameters.push(["Data", hexParameter(packet.data)]);
    }

    return parameters;
}
