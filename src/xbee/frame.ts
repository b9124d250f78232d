import { XBeeChecksum } from "./checksum.js";
import { XBeeApiConsts, XBeeOperatingMode, XBeeSpecialByte, isApiOperatingMode } from "./consts.js";
import { XBeeInvalidOperatingModeError, XBeeParsingError } from "./errors.js";
import { escapeFrame, unescapeBytes } from "./escaping.js";
import { getXBeeApiFrameTypeName, XBeeApiFrameType } from "./frame-types.js";
import { decodeXBeePacket, encodeXBeePacket, getXBeePacketParameters, needsFrameId, type XBeePacket } from "./packet.js";
import type { XBeePacketParameters } from "./packets/codec.js";
import { bufferToHexString, prettyHexString, prettyValue, toHexString } from "./utils.js";

/**
 * +-----------------+--------+---------+----------+
 * | start delimiter | length | payload | checksum |
 * |      0x7E       | 2 (BE) |   var   |    1     |
 * +-----------------+--------+---------+----------+
 *
 * Checksum is computed over the unescaped payload. When `escaped`, every reserved byte after the delimiter
 * (length and checksum included) is escaped.
 */
export function encodeXBeeFrame(packet: XBeePacket, escaped = false): Buffer {
    const payload = encodeXBeePacket(packet);
    const frame = Buffer.alloc(payload.byteLength + XBeeApiConsts.FRAME_OVERHEAD);
    let offset = frame.writeUInt8(XBeeSpecialByte.HEADER_BYTE, 0);
    offset = frame.writeUInt16BE(payload.byteLength, offset);
    offset += payload.copy(frame, offset);
    const checksum = new XBeeChecksum();

    checksum.add(payload);
    frame.writeUInt8(checksum.generate(), offset);

    return escaped ? escapeFrame(frame) : frame;
}

export function getXBeePacketLength(packet: XBeePacket): number {
    return encodeXBeePacket(packet).byteLength;
}

export function getXBeePacketChecksum(packet: XBeePacket): number {
    const checksum = new XBeeChecksum();

    checksum.add(encodeXBeePacket(packet));

    return checksum.generate();
}

/**
 * Uppercase hex of the unescaped frame, e.g. `7E0004080152495F`
 */
export function xbeePacketToString(packet: XBeePacket): string {
    return bufferToHexString(encodeXBeeFrame(packet));
}

function frameTypeParameter(packet: XBeePacket): string {
    const value = packet.frameType === XBeeApiFrameType.UNKNOWN ? packet.frameTypeValue : packet.frameType;

    return `${toHexString(value, 1)} (${getXBeeApiFrameTypeName(packet.frameType)})`;
}

/**
 * Complete field breakdown, delimiter to checksum.
 */
export function getXBeeFrameParameters(packet: XBeePacket): XBeePacketParameters {
    const length = getXBeePacketLength(packet);
    const parameters: XBeePacketParameters = [
        ["Start delimiter", toHexString(XBeeSpecialByte.HEADER_BYTE, 1)],
        ["Length", prettyValue(length, 2)],
        ["Frame type", frameTypeParameter(packet)],
    ];

    if (needsFrameId(packet)) {
        parameters.push(["Frame ID", packet.frameId === XBeeApiConsts.NO_FRAME_ID ? "(NO FRAME ID)" : prettyValue(packet.frameId, 1)]);
    }

    parameters.push(...getXBeePacketParameters(packet));
    parameters.push(["Checksum", toHexString(getXBeePacketChecksum(packet), 1)]);

    return parameters;
}

/**
 * ```
 * Packet: 7E 00 04 08 01 4E 49 5F
 * Start delimiter: 7E
 * Length: 00 04 (4)
 * ...
 * ```
 */
export function xbeePacketToPrettyString(packet: XBeePacket): string {
    let str = `Packet: ${prettyHexString(xbeePacketToString(packet))}\n`;

    for (const [name, value] of getXBeeFrameParameters(packet)) {
        str += `${name}: ${value}\n`;
    }

    return str;
}

export function xbeePacketsEqual(a: XBeePacket, b: XBeePacket): boolean {
    return encodeXBeeFrame(a).equals(encodeXBeeFrame(b));
}

/**
 * Decode a complete frame held in memory, start delimiter included.
 *
 * @throws XBeeInvalidOperatingModeError if mode is not an API mode
 * @throws XBeeParsingError on any framing, checksum or length fault
 */
export function decodeXBeeFrame(frame: Buffer, mode: XBeeOperatingMode): XBeePacket {
    if (!isApiOperatingMode(mode)) {
        throw new XBeeInvalidOperatingModeError();
    }

    if (frame.byteLength < XBeeApiConsts.FRAME_OVERHEAD) {
        throw new XBeeParsingError("Error parsing packet: Incomplete packet.");
    }

    if (frame[0] !== XBeeSpecialByte.HEADER_BYTE) {
        throw new XBeeParsingError("Invalid start delimiter.");
    }

    const body = mode === XBeeOperatingMode.API_ESCAPE ? unescapeBytes(frame.subarray(1)) : frame.subarray(1);

    if (body.byteLength < 3) {
        throw new XBeeParsingError("Error parsing packet: Incomplete packet.");
    }

    const length = body.readUInt16BE(0);

    if (body.byteLength < length + 3) {
        throw new XBeeParsingError("Error parsing packet: Incomplete packet.");
    }

    const payload = body.subarray(2, 2 + length);
    const checksum = new XBeeChecksum();

    checksum.add(payload);

    const expected = checksum.generate();

    checksum.add(body[2 + length]);

    if (!checksum.validate()) {
        throw new XBeeParsingError(`Invalid checksum (expected 0x${toHexString(expected, 1)}).`);
    }

    return decodeXBeePacket(payload);
}
