/**
 * Reserved bytes of the XBee API framing.
 *
 * In escaped API mode (API2), any of these found after the start delimiter is sent as
 * `ESCAPE_BYTE` followed by the byte XOR `ESCAPE_XOR`.
 */
export const enum XBeeSpecialByte {
    /** Start delimiter, never escaped */
    HEADER_BYTE = 0x7e,
    ESCAPE_BYTE = 0x7d,
    /** Software flow control: resume */
    XON_BYTE = 0x11,
    /** Software flow control: pause */
    XOFF_BYTE = 0x13,
}

export const enum XBeeApiConsts {
    ESCAPE_XOR = 0x20,
    /** delimiter + 2 length bytes + checksum */
    FRAME_OVERHEAD = 4,
    FRAME_ID_MAX = 0xff,
    /**
     * Sentinel for "no frame ID assigned yet". Outside the 0-255 range a frame ID byte can take.
     * Sent as 0x00 on the wire (no response requested).
     */
    NO_FRAME_ID = 9999,
}

export enum XBeeOperatingMode {
    /** Transparent mode, frames are not used */
    AT = 0,
    API = 1,
    /** API with escaped reserved bytes (API2) */
    API_ESCAPE = 2,
    UNKNOWN = 3,
}

export const XBEE_OPERATING_MODE_NAMES: Record<XBeeOperatingMode, string> = {
    [XBeeOperatingMode.AT]: "AT mode",
    [XBeeOperatingMode.API]: "API mode",
    [XBeeOperatingMode.API_ESCAPE]: "API mode with escaped characters",
    [XBeeOperatingMode.UNKNOWN]: "Unknown",
};

export function isApiOperatingMode(mode: XBeeOperatingMode): boolean {
    return mode === XBeeOperatingMode.API || mode === XBeeOperatingMode.API_ESCAPE;
}
