import { XBEE_64_BROADCAST, XBee16BitAddress } from "./address.js";
import { XBeeParsingError } from "./errors.js";
import { getXBeeApiFrameType, XBeeApiFrameType } from "./frame-types.js";
import {
    type ATCommandPacket,
    type ATCommandResponsePacket,
    decodeATCommandPacket,
    decodeATCommandResponsePacket,
    decodeRemoteATCommandRequestPacket,
    decodeRemoteATCommandResponsePacket,
    encodeATCommandPacket,
    encodeATCommandResponsePacket,
    encodeRemoteATCommandRequestPacket,
    encodeRemoteATCommandResponsePacket,
    getATCommandPacketParameters,
    getATCommandResponsePacketParameters,
    getRemoteATCommandRequestPacketParameters,
    getRemoteATCommandResponsePacketParameters,
    isRemoteATCommandRequestBroadcast,
    type RemoteATCommandRequestPacket,
    type RemoteATCommandResponsePacket,
} from "./packets/at-command.js";
import type { XBeePacketParameters } from "./packets/codec.js";
import {
    decodeRXIPv4Packet,
    decodeRXSMSPacket,
    decodeTXIPv4Packet,
    decodeTXSMSPacket,
    encodeRXIPv4Packet,
    encodeRXSMSPacket,
    encodeTXIPv4Packet,
    encodeTXSMSPacket,
    getRXIPv4PacketParameters,
    getSMSPacketParameters,
    getTXIPv4PacketParameters,
    type RXIPv4Packet,
    type RXSMSPacket,
    type TXIPv4Packet,
    type TXSMSPacket,
} from "./packets/ip.js";
import {
    decodeExplicitRxIndicatorPacket,
    decodeIODataSampleRxIndicatorPacket,
    decodeModemStatusPacket,
    decodeReceivePacket,
    decodeRX16IOPacket,
    decodeRX16Packet,
    decodeRX64IOPacket,
    decodeRX64Packet,
    encodeExplicitRxIndicatorPacket,
    encodeIODataSampleRxIndicatorPacket,
    encodeModemStatusPacket,
    encodeReceivePacket,
    encodeRX16IOPacket,
    encodeRX16Packet,
    encodeRX64IOPacket,
    encodeRX64Packet,
    type ExplicitRxIndicatorPacket,
    getExplicitRxIndicatorPacketParameters,
    getIODataSampleRxIndicatorPacketParameters,
    getModemStatusPacketParameters,
    getRawReceivePacketParameters,
    getReceivePacketParameters,
    type IODataSampleRxIndicatorPacket,
    isRawReceiveOptionsBroadcast,
    isReceiveOptionsBroadcast,
    type ModemStatusPacket,
    type ReceivePacket,
    type RX16IOPacket,
    type RX16Packet,
    type RX64IOPacket,
    type RX64Packet,
} from "./packets/receive.js";
import {
    decodeUserDataRelayOutputPacket,
    decodeUserDataRelayPacket,
    encodeUserDataRelayOutputPacket,
    encodeUserDataRelayPacket,
    getUserDataRelayPacketParameters,
    type UserDataRelayOutputPacket,
    type UserDataRelayPacket,
} from "./packets/relay.js";
import {
    decodeExplicitAddressingPacket,
    decodeTransmitRequestPacket,
    decodeTransmitStatusPacket,
    decodeTX16Packet,
    decodeTX64Packet,
    decodeTXStatusPacket,
    encodeExplicitAddressingPacket,
    encodeTransmitRequestPacket,
    encodeTransmitStatusPacket,
    encodeTX16Packet,
    encodeTX64Packet,
    encodeTXStatusPacket,
    type ExplicitAddressingPacket,
    getExplicitAddressingPacketParameters,
    getTransmitRequestPacketParameters,
    getTransmitStatusPacketParameters,
    getTX16PacketParameters,
    getTX64PacketParameters,
    getTXStatusPacketParameters,
    isTransmitBroadcast,
    type TransmitRequestPacket,
    type TransmitStatusPacket,
    type TX16Packet,
    type TX64Packet,
    type TXStatusPacket,
} from "./packets/transmit.js";
import { decodeUnknownPacket, encodeUnknownPacket, getUnknownPacketParameters, type UnknownPacket } from "./packets/unknown.js";

/**
 * Every API frame this library knows, discriminated by `frameType`.
 */
export type XBeePacket =
    | TX64Packet
    | TX16Packet
    | ATCommandPacket
    | TransmitRequestPacket
    | ExplicitAddressingPacket
    | RemoteATCommandRequestPacket
    | TXSMSPacket
    | TXIPv4Packet
    | UserDataRelayPacket
    | RX64Packet
    | RX16Packet
    | RX64IOPacket
    | RX16IOPacket
    | ATCommandResponsePacket
    | TXStatusPacket
    | ModemStatusPacket
    | TransmitStatusPacket
    | ReceivePacket
    | ExplicitRxIndicatorPacket
    | IODataSampleRxIndicatorPacket
    | RemoteATCommandResponsePacket
    | RXSMSPacket
    | UserDataRelayOutputPacket
    | RXIPv4Packet
    | UnknownPacket;

export type XBeePacketWithFrameId = Extract<XBeePacket, { frameId: number }>;

/** Narrow the union to the variant of a given frame type */
export type XBeePacketOfType<T extends XBeeApiFrameType> = Extract<XBeePacket, { frameType: T }>;

function assertNever(value: never): never {
    throw new Error(`Unhandled packet ${JSON.stringify(value)}`);
}

/**
 * Decode an unescaped API frame payload (frame type byte first, no delimiter, length or checksum).
 * Types without a codec decode to `UnknownPacket`.
 *
 * @throws XBeeParsingError on an empty payload or one shorter than its type's minimum
 */
export function decodeXBeePacket(payload: Buffer): XBeePacket {
    if (payload.byteLength === 0) {
        throw new XBeeParsingError("Error parsing packet: Empty payload.");
    }

    const frameType = getXBeeApiFrameType(payload.readUInt8(0));

    switch (frameType) {
        case XBeeApiFrameType.TX_64:
            return decodeTX64Packet(payload);
        case XBeeApiFrameType.TX_16:
            return decodeTX16Packet(payload);
        case XBeeApiFrameType.AT_COMMAND:
        case XBeeApiFrameType.AT_COMMAND_QUEUE:
            return decodeATCommandPacket(payload);
        case XBeeApiFrameType.TRANSMIT_REQUEST:
            return decodeTransmitRequestPacket(payload);
        case XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME:
            return decodeExplicitAddressingPacket(payload);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST:
            return decodeRemoteATCommandRequestPacket(payload);
        case XBeeApiFrameType.TX_SMS:
            return decodeTXSMSPacket(payload);
        case XBeeApiFrameType.TX_IPV4:
            return decodeTXIPv4Packet(payload);
        case XBeeApiFrameType.USER_DATA_RELAY:
            return decodeUserDataRelayPacket(payload);
        case XBeeApiFrameType.RX_64:
            return decodeRX64Packet(payload);
        case XBeeApiFrameType.RX_16:
            return decodeRX16Packet(payload);
        case XBeeApiFrameType.RX_IO_64:
            return decodeRX64IOPacket(payload);
        case XBeeApiFrameType.RX_IO_16:
            return decodeRX16IOPacket(payload);
        case XBeeApiFrameType.AT_COMMAND_RESPONSE:
            return decodeATCommandResponsePacket(payload);
        case XBeeApiFrameType.TX_STATUS:
            return decodeTXStatusPacket(payload);
        case XBeeApiFrameType.MODEM_STATUS:
            return decodeModemStatusPacket(payload);
        case XBeeApiFrameType.TRANSMIT_STATUS:
            return decodeTransmitStatusPacket(payload);
        case XBeeApiFrameType.RECEIVE_PACKET:
            return decodeReceivePacket(payload);
        case XBeeApiFrameType.EXPLICIT_RX_INDICATOR:
            return decodeExplicitRxIndicatorPacket(payload);
        case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR:
            return decodeIODataSampleRxIndicatorPacket(payload);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE:
            return decodeRemoteATCommandResponsePacket(payload);
        case XBeeApiFrameType.RX_SMS:
            return decodeRXSMSPacket(payload);
        case XBeeApiFrameType.USER_DATA_RELAY_OUTPUT:
            return decodeUserDataRelayOutputPacket(payload);
        case XBeeApiFrameType.RX_IPV4:
            return decodeRXIPv4Packet(payload);
        case XBeeApiFrameType.UNKNOWN:
            return decodeUnknownPacket(payload);
    }
}

/**
 * @returns the unescaped API payload: frame type, frame ID when the type has one, type-specific data
 */
export function encodeXBeePacket(packet: XBeePacket): Buffer {
    switch (packet.frameType) {
        case XBeeApiFrameType.TX_64:
            return encodeTX64Packet(packet);
        case XBeeApiFrameType.TX_16:
            return encodeTX16Packet(packet);
        case XBeeApiFrameType.AT_COMMAND:
        case XBeeApiFrameType.AT_COMMAND_QUEUE:
            return encodeATCommandPacket(packet);
        case XBeeApiFrameType.TRANSMIT_REQUEST:
            return encodeTransmitRequestPacket(packet);
        case XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME:
            return encodeExplicitAddressingPacket(packet);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST:
            return encodeRemoteATCommandRequestPacket(packet);
        case XBeeApiFrameType.TX_SMS:
            return encodeTXSMSPacket(packet);
        case XBeeApiFrameType.TX_IPV4:
            return encodeTXIPv4Packet(packet);
        case XBeeApiFrameType.USER_DATA_RELAY:
            return encodeUserDataRelayPacket(packet);
        case XBeeApiFrameType.RX_64:
            return encodeRX64Packet(packet);
        case XBeeApiFrameType.RX_16:
            return encodeRX16Packet(packet);
        case XBeeApiFrameType.RX_IO_64:
            return encodeRX64IOPacket(packet);
        case XBeeApiFrameType.RX_IO_16:
            return encodeRX16IOPacket(packet);
        case XBeeApiFrameType.AT_COMMAND_RESPONSE:
            return encodeATCommandResponsePacket(packet);
        case XBeeApiFrameType.TX_STATUS:
            return encodeTXStatusPacket(packet);
        case XBeeApiFrameType.MODEM_STATUS:
            return encodeModemStatusPacket(packet);
        case XBeeApiFrameType.TRANSMIT_STATUS:
            return encodeTransmitStatusPacket(packet);
        case XBeeApiFrameType.RECEIVE_PACKET:
            return encodeReceivePacket(packet);
        case XBeeApiFrameType.EXPLICIT_RX_INDICATOR:
            return encodeExplicitRxIndicatorPacket(packet);
        case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR:
            return encodeIODataSampleRxIndicatorPacket(packet);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE:
            return encodeRemoteATCommandResponsePacket(packet);
        case XBeeApiFrameType.RX_SMS:
            return encodeRXSMSPacket(packet);
        case XBeeApiFrameType.USER_DATA_RELAY_OUTPUT:
            return encodeUserDataRelayOutputPacket(packet);
        case XBeeApiFrameType.RX_IPV4:
            return encodeRXIPv4Packet(packet);
        case XBeeApiFrameType.UNKNOWN:
            return encodeUnknownPacket(packet);
        default:
            return assertNever(packet);
    }
}

/**
 * Whether the packet carries a frame ID byte (outbound requests and their direct responses).
 */
export function needsFrameId(packet: XBeePacket): packet is XBeePacketWithFrameId {
    return "frameId" in packet;
}

/**
 * @returns the frame ID, undefined for types without one
 */
export function getFrameId(packet: XBeePacket): number | undefined {
    return needsFrameId(packet) ? packet.frameId : undefined;
}

export function isBroadcast(packet: XBeePacket): boolean {
    switch (packet.frameType) {
        case XBeeApiFrameType.TRANSMIT_REQUEST:
        case XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME:
            return isTransmitBroadcast(packet);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST:
            return isRemoteATCommandRequestBroadcast(packet);
        case XBeeApiFrameType.TX_64:
            return packet.destination64 === XBEE_64_BROADCAST;
        case XBeeApiFrameType.TX_16:
            return packet.destination16 === XBee16BitAddress.BROADCAST;
        case XBeeApiFrameType.RECEIVE_PACKET:
        case XBeeApiFrameType.EXPLICIT_RX_INDICATOR:
        case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR:
            return isReceiveOptionsBroadcast(packet.receiveOptions);
        case XBeeApiFrameType.RX_64:
        case XBeeApiFrameType.RX_16:
        case XBeeApiFrameType.RX_IO_64:
        case XBeeApiFrameType.RX_IO_16:
            return isRawReceiveOptionsBroadcast(packet.receiveOptions);
        default:
            return false;
    }
}

/**
 * @returns the 64-bit address of the remote node that sent the packet, undefined if it carries none
 */
export function getXBeePacketSource64(packet: XBeePacket): bigint | undefined {
    switch (packet.frameType) {
        case XBeeApiFrameType.RECEIVE_PACKET:
        case XBeeApiFrameType.EXPLICIT_RX_INDICATOR:
        case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR:
        case XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE:
        case XBeeApiFrameType.RX_64:
        case XBeeApiFrameType.RX_IO_64:
            return packet.source64;
        default:
            return undefined;
    }
}

/**
 * Type-specific fields, in wire order, for display.
 */
export function getXBeePacketParameters(packet: XBeePacket): XBeePacketParameters {
    switch (packet.frameType) {
        case XBeeApiFrameType.TX_64:
            return getTX64PacketParameters(packet);
        case XBeeApiFrameType.TX_16:
            return getTX16PacketParameters(packet);
        case XBeeApiFrameType.AT_COMMAND:
        case XBeeApiFrameType.AT_COMMAND_QUEUE:
            return getATCommandPacketParameters(packet);
        case XBeeApiFrameType.TRANSMIT_REQUEST:
            return getTransmitRequestPacketParameters(packet);
        case XBeeApiFrameType.EXPLICIT_ADDRESSING_COMMAND_FRAME:
            return getExplicitAddressingPacketParameters(packet);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST:
            return getRemoteATCommandRequestPacketParameters(packet);
        case XBeeApiFrameType.TX_SMS:
        case XBeeApiFrameType.RX_SMS:
            return getSMSPacketParameters(packet);
        case XBeeApiFrameType.TX_IPV4:
            return getTXIPv4PacketParameters(packet);
        case XBeeApiFrameType.USER_DATA_RELAY:
        case XBeeApiFrameType.USER_DATA_RELAY_OUTPUT:
            return getUserDataRelayPacketParameters(packet);
        case XBeeApiFrameType.RX_64:
        case XBeeApiFrameType.RX_16:
        case XBeeApiFrameType.RX_IO_64:
        case XBeeApiFrameType.RX_IO_16:
            return getRawReceivePacketParameters(packet);
        case XBeeApiFrameType.AT_COMMAND_RESPONSE:
            return getATCommandResponsePacketParameters(packet);
        case XBeeApiFrameType.TX_STATUS:
            return getTXStatusPacketParameters(packet);
        case XBeeApiFrameType.MODEM_STATUS:
            return getModemStatusPacketParameters(packet);
        case XBeeApiFrameType.TRANSMIT_STATUS:
            return getTransmitStatusPacketParameters(packet);
        case XBeeApiFrameType.RECEIVE_PACKET:
            return getReceivePacketParameters(packet);
        case XBeeApiFrameType.EXPLICIT_RX_INDICATOR:
            return getExplicitRxIndicatorPacketParameters(packet);
        case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR:
            return getIODataSampleRxIndicatorPacketParameters(packet);
        case XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE:
            return getRemoteATCommandResponsePacketParameters(packet);
        case XBeeApiFrameType.RX_IPV4:
            return getRXIPv4PacketParameters(packet);
        case XBeeApiFrameType.UNKNOWN:
            return getUnknownPacketParameters(packet);
        default:
            return assertNever(packet);
    }
}
