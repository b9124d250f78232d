import { toHexString } from "./utils.js";

/** API frame type codes (payload byte 0) */
export enum XBeeApiFrameType {
    TX_64 = 0x00,
    TX_16 = 0x01,
    AT_COMMAND = 0x08,
    AT_COMMAND_QUEUE = 0x09,
    TRANSMIT_REQUEST = 0x10,
    EXPLICIT_ADDRESSING_COMMAND_FRAME = 0x11,
    REMOTE_AT_COMMAND_REQUEST = 0x17,
    TX_SMS = 0x1f,
    TX_IPV4 = 0x20,
    USER_DATA_RELAY = 0x2d,
    RX_64 = 0x80,
    RX_16 = 0x81,
    RX_IO_64 = 0x82,
    RX_IO_16 = 0x83,
    AT_COMMAND_RESPONSE = 0x88,
    TX_STATUS = 0x89,
    MODEM_STATUS = 0x8a,
    TRANSMIT_STATUS = 0x8b,
    RECEIVE_PACKET = 0x90,
    EXPLICIT_RX_INDICATOR = 0x91,
    IO_DATA_SAMPLE_RX_INDICATOR = 0x92,
    REMOTE_AT_COMMAND_RESPONSE = 0x97,
    RX_SMS = 0x9f,
    USER_DATA_RELAY_OUTPUT = 0xad,
    RX_IPV4 = 0xb0,
    /** Fallback for any code without a codec */
    UNKNOWN = 0xff,
}

const FRAME_TYPE_NAMES: Record<XBeeApiFrameType, string> = {
    [XBeeApiFrameType.TX_64]: "TX (Transmit) Request 64-bit address",
    [XBeeApiFrameType.TX_16]: "TX (Transmit) Request 16-bit address",
    [XBeeApiFrameType.AT_COMMAND]: "AT Command",
    [XBeeApiFrameType.AT_COMMAND_QUEUE]: "AT Command Queue",
    [XBeeApiFrameType.TRANSMIT_REQUEST]: "Transmit Request",
    [XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME]: "Explicit Addressing Command Frame",
    [XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST]: "Remote AT Command Request",
    [XBeeApiFrameType.TX_SMS]: "TX SMS",
    [XBeeApiFrameType.TX_IPV4]: "TX IPv4",
    [XBeeApiFrameType.USER_DATA_RELAY]: "User Data Relay",
    [XBeeApiFrameType.RX_64]: "RX (Receive) Packet 64-bit Address",
    [XBeeApiFrameType.RX_16]: "RX (Receive) Packet 16-bit Address",
    [XBeeApiFrameType.RX_IO_64]: "IO Data Sample RX 64-bit Address Indicator",
    [XBeeApiFrameType.RX_IO_16]: "IO Data Sample RX 16-bit Address Indicator",
    [XBeeApiFrameType.AT_COMMAND_RESPONSE]: "AT Command Response",
    [XBeeApiFrameType.TX_STATUS]: "TX (Transmit) Status",
    [XBeeApiFrameType.MODEM_STATUS]: "Modem Status",
    [XBeeApiFrameType.TRANSMIT_STATUS]: "Transmit Status",
    [XBeeApiFrameType.RECEIVE_PACKET]: "Receive Packet",
    [XBeeApiFrameType.EXPLICIT_RX_INDICATOR]: "Explicit RX Indicator",
    [XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR]: "IO Data Sample RX Indicator",
    [XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE]: "Remote Command Response",
    [XBeeApiFrameType.RX_SMS]: "RX SMS",
    [XBeeApiFrameType.USER_DATA_RELAY_OUTPUT]: "User Data Relay Output",
    [XBeeApiFrameType.RX_IPV4]: "RX IPv4",
    [XBeeApiFrameType.UNKNOWN]: "Unknown",
};

/**
 * @returns the frame type for the given code, UNKNOWN if no codec handles it
 */
export function getXBeeApiFrameType(value: number): XBeeApiFrameType {
    for (const type of Object.values(XBeeApiFrameType)) {
        if (typeof type === "number" && type === value) {
            return type;
        }
    }

    return XBeeApiFrameType.UNKNOWN;
}

export function getXBeeApiFrameTypeName(type: XBeeApiFrameType): string {
    return FRAME_TYPE_NAMES[type];
}

/**
 * e.g. `(08) AT Command`
 */
export function xbeeApiFrameTypeToDisplayString(type: XBeeApiFrameType): string {
    return `(${toHexString(type, 1)}) ${FRAME_TYPE_NAMES[type]}`;
}
