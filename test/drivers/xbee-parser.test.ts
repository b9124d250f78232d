import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { XBeeByteBuffer } from "../../src/drivers/xbee-byte-buffer.js";
import { DEFAULT_BYTE_TIMEOUT, XBeeFrameParser } from "../../src/drivers/xbee-parser.js";
import { XBeeOperatingMode } from "../../src/xbee/consts.js";
import { XBeeInvalidOperatingModeError, XBeeParsingError } from "../../src/xbee/errors.js";
import { XBeeApiFrameType } from "../../src/xbee/frame-types.js";

describe("XBee frame parser", () => {
    let source: XBeeByteBuffer;
    let parser: XBeeFrameParser;

    beforeEach(() => {
        source = new XBeeByteBuffer();
        parser = new XBeeFrameParser();
    });

    it("defaults to a 300ms byte timeout", () => {
        expect(DEFAULT_BYTE_TIMEOUT).toStrictEqual(300);
        expect(parser.byteTimeout).toStrictEqual(300);
    });

    it("parses a frame after its start delimiter", async () => {
        source.append(Buffer.from("000408014e495f", "hex"));

        await expect(parser.parseOne(source, XBeeOperatingMode.API)).resolves.toStrictEqual({
            frameType: XBeeApiFrameType.AT_COMMAND,
            frameId: 1,
            command: "NI",
            parameter: undefined,
        });
        expect(source.available).toStrictEqual(0);
    });

    it("only consumes the bytes of one frame", async () => {
        source.append(Buffer.from("000408014e495f7e", "hex"));

        await parser.parseOne(source, XBeeOperatingMode.API);

        expect(source.available).toStrictEqual(1);
    });

    it("unescapes in API escaped mode", async () => {
        source.append(Buffer.from("0004087d314e494f", "hex"));

        await expect(parser.parseOne(source, XBeeOperatingMode.API_ESCAPE)).resolves.toMatchObject({ frameId: 0x11 });
    });

    it("does not unescape in API mode", async () => {
        // 0x7D read as a plain frame ID, so the checksum no longer matches
        source.append(Buffer.from("0004087d4e494f", "hex"));

        await expect(parser.parseOne(source, XBeeOperatingMode.API)).rejects.toThrow(new XBeeParsingError("Invalid checksum (expected 0xE3)."));
    });

    it("rejects an unescaped reserved byte in API escaped mode", async () => {
        source.append(Buffer.from("000408114e494f", "hex"));

        await expect(parser.parseOne(source, XBeeOperatingMode.API_ESCAPE)).rejects.toThrow(
            new XBeeParsingError("Special byte not escaped: 0x11."),
        );
    });

    it("rejects a wrong checksum", async () => {
        source.append(Buffer.from("000408014e4900", "hex"));

        await expect(parser.parseOne(source, XBeeOperatingMode.API)).rejects.toThrow(new XBeeParsingError("Invalid checksum (expected 0x5F)."));
    });

    it("rejects non-API modes", async () => {
        await expect(parser.parseOne(source, XBeeOperatingMode.AT)).rejects.toThrow(XBeeInvalidOperatingModeError);
    });

    it("fails right away on a closed source", async () => {
        source.append(Buffer.from("0004", "hex"));
        source.close();

        await expect(parser.parseOne(source, XBeeOperatingMode.API)).rejects.toThrow(
            new XBeeParsingError("Error parsing packet: Incomplete packet."),
        );
    });

    describe("byte timeout", () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it("fails when a byte takes longer than the timeout", async () => {
            source.append(Buffer.from("000408", "hex"));

            const parsing = expect(parser.parseOne(source, XBeeOperatingMode.API)).rejects.toThrow(
                new XBeeParsingError("Error parsing packet: Incomplete packet."),
            );

            await vi.advanceTimersByTimeAsync(DEFAULT_BYTE_TIMEOUT);
            await parsing;
        });

        it("waits for bytes arriving within the timeout", async () => {
            source.append(Buffer.from("000408", "hex"));

            const parsing = parser.parseOne(source, XBeeOperatingMode.API);

            await vi.advanceTimersByTimeAsync(DEFAULT_BYTE_TIMEOUT - 100);
            source.append(Buffer.from("01", "hex"));
            await vi.advanceTimersByTimeAsync(DEFAULT_BYTE_TIMEOUT - 100);
            source.append(Buffer.from("4e495f", "hex"));

            await expect(parsing).resolves.toMatchObject({ frameType: XBeeApiFrameType.AT_COMMAND, frameId: 1 });
        });

        it("applies a custom timeout", async () => {
            const fastParser = new XBeeFrameParser(50);

            source.append(Buffer.from("00", "hex"));

            const parsing = expect(fastParser.parseOne(source, XBeeOperatingMode.API)).rejects.toThrow(XBeeParsingError);

            await vi.advanceTimersByTimeAsync(50);
            await parsing;
        });
    });
});
