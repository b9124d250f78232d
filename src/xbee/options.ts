/** Receive options bitfield of Receive Packet, Explicit RX Indicator and IO Data Sample RX Indicator */
export const enum XBeeReceiveOptions {
    NONE = 0x00,
    PACKET_ACKNOWLEDGED = 0x01,
    BROADCAST_PACKET = 0x02,
    APS_ENCRYPTED = 0x20,
    SENT_FROM_END_DEVICE = 0x40,
}

/** Options bitfield of RX 64/16 and RX IO 64/16 (802.15.4) */
export const enum XBeeRawReceiveOptions {
    ADDRESS_BROADCAST = 0x02,
    PAN_BROADCAST = 0x04,
}

export const enum XBeeTransmitOptions {
    NONE = 0x00,
    DISABLE_ACK = 0x01,
    ENABLE_APS_ENCRYPTION = 0x20,
    USE_EXTENDED_TIMEOUT = 0x40,
}

export const enum RemoteATCommandOptions {
    OPTION_NONE = 0x00,
    OPTION_DISABLE_ACK = 0x01,
    /** Apply changes in the remote device, otherwise an AC command must be sent */
    OPTION_APPLY_CHANGES = 0x02,
    OPTION_EXTENDED_TIMEOUT = 0x40,
}

/** TX IPv4 transmit options */
export const enum XBeeIPTransmitOptions {
    LEAVE_SOCKET_OPEN = 0x00,
    CLOSE_SOCKET = 0x02,
}

export enum XBeeIPProtocol {
    UDP = 0,
    TCP = 1,
    TCP_SSL = 4,
    UNKNOWN = 99,
}

export const XBEE_IP_PROTOCOL_NAMES: Record<XBeeIPProtocol, string> = {
    [XBeeIPProtocol.UDP]: "UDP",
    [XBeeIPProtocol.TCP]: "TCP",
    [XBeeIPProtocol.TCP_SSL]: "TCP SSL",
    [XBeeIPProtocol.UNKNOWN]: "UNKNOWN",
};

/** Interfaces of the User Data Relay frames */
export enum XBeeLocalInterface {
    SERIAL = 0x00,
    BLUETOOTH = 0x01,
    MICROPYTHON = 0x02,
    UNKNOWN = 0xff,
}

export const XBEE_LOCAL_INTERFACE_NAMES: Record<XBeeLocalInterface, string> = {
    [XBeeLocalInterface.SERIAL]: "Serial port (UART when in API mode, or SPI interface)",
    [XBeeLocalInterface.BLUETOOTH]: "BLE API interface (on XBee devices which support BLE)",
    [XBeeLocalInterface.MICROPYTHON]: "MicroPython",
    [XBeeLocalInterface.UNKNOWN]: "Unknown",
};

/** Digi data endpoint/cluster/profile: explicit frames on these are plain data */
export const enum XBeeDigiDataConsts {
    ENDPOINT = 0xe8,
    CLUSTER_ID = 0x0011,
    PROFILE_ID = 0xc105,
}
