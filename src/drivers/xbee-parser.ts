import { XBeeChecksum } from "../xbee/checksum.js";
import { XBeeApiConsts, XBeeOperatingMode, XBeeSpecialByte, isApiOperatingMode } from "../xbee/consts.js";
import { XBeeInvalidOperatingModeError, XBeeParsingError } from "../xbee/errors.js";
import { isSpecialByte } from "../xbee/escaping.js";
import { xbeeApiFrameTypeToDisplayString } from "../xbee/frame-types.js";
import { decodeXBeePacket, type XBeePacket } from "../xbee/packet.js";
import { toHexString } from "../xbee/utils.js";
import { logger } from "../utils/logger.js";
import type { XBeeByteSource } from "./xbee-connection.js";

const NS = "xbee-driver:parser";

/** Max wait for each byte of a frame, once its start delimiter was read */
export const DEFAULT_BYTE_TIMEOUT = 300;

/**
 * Rebuilds one API frame from a byte source, the start delimiter having already been consumed.
 */
export class XBeeFrameParser {
    readonly #byteTimeout: number;

    public constructor(byteTimeout = DEFAULT_BYTE_TIMEOUT) {
        this.#byteTimeout = byteTimeout;
    }

    get byteTimeout(): number {
        return this.#byteTimeout;
    }

    /**
     * @throws XBeeInvalidOperatingModeError if mode is not an API mode
     * @throws XBeeParsingError on timeout, closed source, unescaped reserved byte, checksum or length fault
     */
    public async parseOne(source: XBeeByteSource, mode: XBeeOperatingMode): Promise<XBeePacket> {
        if (!isApiOperatingMode(mode)) {
            throw new XBeeInvalidOperatingModeError();
        }

        const escaped = mode === XBeeOperatingMode.API_ESCAPE;
        const lengthMSB = await this.#readByte(source, escaped);
        const lengthLSB = await this.#readByte(source, escaped);
        const length = (lengthMSB << 8) | lengthLSB;
        const payload = Buffer.alloc(length);

        for (let i = 0; i < length; i++) {
            payload[i] = await this.#readByte(source, escaped);
        }

        const checksum = new XBeeChecksum();

        checksum.add(payload);

        const expected = checksum.generate();

        checksum.add(await this.#readByte(source, escaped));

        if (!checksum.validate()) {
            throw new XBeeParsingError(`Invalid checksum (expected 0x${toHexString(expected, 1)}).`);
        }

        logger.debug(() => `<<< FRAME[7e${toHexString(length, 2).toLowerCase()}${payload.toString("hex")}${toHexString(expected, 1).toLowerCase()}]`, NS);

        const packet = decodeXBeePacket(payload);

        logger.debug(() => `<--- PACKET[${xbeeApiFrameTypeToDisplayString(packet.frameType)} len=${length}]`, NS);

        return packet;
    }

    async #readRawByte(source: XBeeByteSource): Promise<number> {
        let byte = source.readByte();

        if (byte === undefined) {
            if (!source.isClosed) {
                await source.waitForData(this.#byteTimeout);
            }

            byte = source.readByte();

            if (byte === undefined) {
                throw new XBeeParsingError("Error parsing packet: Incomplete packet.");
            }
        }

        return byte;
    }

    async #readByte(source: XBeeByteSource, escaped: boolean): Promise<number> {
        const byte = await this.#readRawByte(source);

        if (!escaped) {
            return byte;
        }

        if (byte === XBeeSpecialByte.ESCAPE_BYTE) {
            return (await this.#readRawByte(source)) ^ XBeeApiConsts.ESCAPE_XOR;
        }

        if (isSpecialByte(byte)) {
            throw new XBeeParsingError(`Special byte not escaped: 0x${toHexString(byte, 1)}.`);
        }

        return byte;
    }
}
