import { XBeeApiConsts } from "../consts.js";
import { XBeeParsingError } from "../errors.js";
import { type XBeeApiFrameType, getXBeeApiFrameTypeName } from "../frame-types.js";
import { bufferToHexString, prettyHexString } from "../utils.js";

/** Ordered `[name, value]` pairs describing a packet, for display only */
export type XBeePacketParameters = [name: string, value: string][];

/**
 * @throws XBeeParsingError naming the frame type, the minimum and the actual length
 */
export function assertMinLength(payload: Buffer, minLength: number, frameType: XBeeApiFrameType): void {
    if (payload.byteLength < minLength) {
        throw new XBeeParsingError(
            `Incomplete ${getXBeeApiFrameTypeName(frameType)} packet, got ${payload.byteLength} bytes, expected at least ${minLength}`,
        );
    }
}

export function writeFrameId(data: Buffer, frameId: number, offset: number): number {
    if (frameId === XBeeApiConsts.NO_FRAME_ID) {
        return data.writeUInt8(0, offset);
    }

    if (!Number.isInteger(frameId) || frameId < 0 || frameId > XBeeApiConsts.FRAME_ID_MAX) {
        throw new Error(`Invalid frame ID, got ${frameId}, expected 0-255`);
    }

    return data.writeUInt8(frameId, offset);
}

/**
 * @returns the bytes after `offset`, undefined when there are none
 */
export function readRemaining(payload: Buffer, offset: number): Buffer | undefined {
    return offset < payload.byteLength ? payload.subarray(offset) : undefined;
}

export function readATCommand(payload: Buffer, offset: number): [string, offset: number] {
    return [payload.toString("latin1", offset, offset + 2), offset + 2];
}

export function writeATCommand(data: Buffer, command: string, offset: number): number {
    if (command.length !== 2) {
        throw new Error(`Invalid AT command, got ${command}, expected 2 characters`);
    }

    return offset + data.write(command, offset, 2, "latin1");
}

/** `48 65 6C 6C 6F` */
export function hexParameter(data: Buffer): string {
    return prettyHexString(bufferToHexString(data));
}
