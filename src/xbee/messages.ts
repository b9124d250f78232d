import type { XBeeIOSample } from "./io-sample.js";
import type { XBeeIPProtocol, XBeeLocalInterface } from "./options.js";
import { XBeeDigiDataConsts } from "./options.js";
import { XBeeApiFrameType } from "./frame-types.js";
import { isBroadcast } from "./packet.js";
import type { ExplicitRxIndicatorPacket, ReceivePacket, RX16Packet, RX64Packet } from "./packets/receive.js";

/** RF data received from a remote node, with its addressing */
export type XBeeMessage = {
    /** undefined for 16-bit addressed 802.15.4 frames */
    remote64: bigint | undefined;
    /** undefined for 64-bit addressed 802.15.4 frames */
    remote16: number | undefined;
    data: Buffer;
    isBroadcast: boolean;
};

export type XBeeExplicitMessage = XBeeMessage & {
    sourceEndpoint: number;
    destinationEndpoint: number;
    clusterId: number;
    profileId: number;
};

export type XBeeIOSampleMessage = {
    remote64: bigint | undefined;
    remote16: number | undefined;
    ioSample: XBeeIOSample;
};

export type XBeeIPMessage = {
    sourceAddress: string;
    sourcePort: number;
    destinationPort: number;
    protocol: XBeeIPProtocol;
    data: Buffer;
};

export type XBeeSMSMessage = {
    phoneNumber: string;
    data: string | undefined;
};

export type XBeeUserDataRelayMessage = {
    sourceInterface: XBeeLocalInterface;
    data: Buffer | undefined;
};

export type XBeeDataPacket = ReceivePacket | RX64Packet | RX16Packet;

export function toXBeeMessage(packet: XBeeDataPacket): XBeeMessage {
    switch (packet.frameType) {
        case XBeeApiFrameType.RECEIVE_PACKET:
            return { remote64: packet.source64, remote16: packet.source16, data: packet.rfData, isBroadcast: isBroadcast(packet) };
        case XBeeApiFrameType.RX_64:
            return { remote64: packet.source64, remote16: undefined, data: packet.rfData, isBroadcast: isBroadcast(packet) };
        case XBeeApiFrameType.RX_16:
            return { remote64: undefined, remote16: packet.source16, data: packet.rfData, isBroadcast: isBroadcast(packet) };
    }
}

export function toXBeeExplicitMessage(packet: ExplicitRxIndicatorPacket): XBeeExplicitMessage {
    return {
        remote64: packet.source64,
        remote16: packet.source16,
        data: packet.rfData,
        isBroadcast: isBroadcast(packet),
        sourceEndpoint: packet.sourceEndpoint,
        destinationEndpoint: packet.destinationEndpoint,
        clusterId: packet.clusterId,
        profileId: packet.profileId,
    };
}

/**
 * Explicit frames on the Digi data endpoint/cluster/profile carry plain application data.
 */
export function isDigiDataPacket(packet: ExplicitRxIndicatorPacket): boolean {
    return (
        packet.sourceEndpoint === XBeeDigiDataConsts.ENDPOINT &&
        packet.destinationEndpoint === XBeeDigiDataConsts.ENDPOINT &&
        packet.clusterId === XBeeDigiDataConsts.CLUSTER_ID &&
        packet.profileId === XBeeDigiDataConsts.PROFILE_ID
    );
}

export function explicitToReceivePacket(packet: ExplicitRxIndicatorPacket): ReceivePacket {
    return {
        frameType: XBeeApiFrameType.RECEIVE_PACKET,
        source64: packet.source64,
        source16: packet.source16,
        receiveOptions: packet.receiveOptions,
        rfData: packet.rfData,
    };
}
