import { XBeeApiFrameType } from "../frame-types.js";
import { hexParameter, readRemaining, type XBeePacketParameters } from "./codec.js";

/**
 * Frame type without a codec. Kept as-is so newer firmware frames do not break parsing.
 */
export type UnknownPacket = {
    frameType: XBeeApiFrameType.UNKNOWN;
    /** raw type byte as received */
    frameTypeValue: number;
    data: Buffer | undefined;
};

export function decodeUnknownPacket(payload: Buffer): UnknownPacket {
    return { frameType: XBeeApiFrameType.UNKNOWN, frameTypeValue: payload.readUInt8(0), data: readRemaining(payload, 1) };
}

export function encodeUnknownPacket(packet: UnknownPacket): Buffer {
    const data = Buffer.alloc(1 + (packet.data?.byteLength ?? 0));

    data.writeUInt8(packet.frameTypeValue, 0);
    packet.data?.copy(data, 1);

    return data;
}

export function getUnknownPacketParameters(packet: UnknownPacket): XBeePacketParameters {
    return packet.data === undefined ? [] : [["RF data", hexParameter(packet.data)]];
}
