import { XBeeApiConsts, XBeeSpecialByte } from "./consts.js";
import { XBeeParsingError } from "./errors.js";
import { toHexString } from "./utils.js";

export function isSpecialByte(byte: number): boolean {
    return (
        byte === XBeeSpecialByte.HEADER_BYTE ||
        byte === XBeeSpecialByte.ESCAPE_BYTE ||
        byte === XBeeSpecialByte.XON_BYTE ||
        byte === XBeeSpecialByte.XOFF_BYTE
    );
}

/**
 * Escape every reserved byte of `data` (no start delimiter expected).
 */
export function escapeBytes(data: Buffer): Buffer {
    let specialCount = 0;

    for (const byte of data) {
        if (isSpecialByte(byte)) {
            specialCount++;
        }
    }

    if (specialCount === 0) {
        return Buffer.from(data);
    }

    const escaped = Buffer.alloc(data.byteLength + specialCount);
    let offset = 0;

    for (const byte of data) {
        if (isSpecialByte(byte)) {
            escaped.writeUInt8(XBeeSpecialByte.ESCAPE_BYTE, offset);
            offset += 1;
            escaped.writeUInt8(byte ^ XBeeApiConsts.ESCAPE_XOR, offset);
        } else {
            escaped.writeUInt8(byte, offset);
        }

        offset += 1;
    }

    return escaped;
}

/**
 * Escape a complete frame, leaving its start delimiter (byte 0) untouched.
 */
export function escapeFrame(frame: Buffer): Buffer {
    if (frame.byteLength === 0) {
        return Buffer.alloc(0);
    }

    return Buffer.concat([frame.subarray(0, 1), escapeBytes(frame.subarray(1))]);
}

/**
 * Reverse of `escapeBytes`.
 * @throws XBeeParsingError on a dangling escape marker or an unescaped reserved byte
 */
export function unescapeBytes(data: Buffer): Buffer {
    const unescaped = Buffer.alloc(data.byteLength);
    let length = 0;

    for (let i = 0; i < data.byteLength; i++) {
        const byte = data[i];

        if (byte === XBeeSpecialByte.ESCAPE_BYTE) {
            i += 1;

            if (i >= data.byteLength) {
                throw new XBeeParsingError("Error parsing packet: Incomplete packet.");
            }

            unescaped.writeUInt8(data[i] ^ XBeeApiConsts.ESCAPE_XOR, length);
        } else if (isSpecialByte(byte)) {
            throw new XBeeParsingError(`Special byte not escaped: 0x${toHexString(byte, 1)}.`);
        } else {
            unescaped.writeUInt8(byte, length);
        }

        length += 1;
    }

    return unescaped.subarray(0, length);
}
