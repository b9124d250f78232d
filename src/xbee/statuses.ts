import modemStatuses from "./data/modem-statuses.json" with { type: "json" };
import transmitStatuses from "./data/transmit-statuses.json" with { type: "json" };
import { toHexString } from "./utils.js";

const MODEM_STATUS_DESCRIPTIONS: Record<string, string> = modemStatuses;
const TRANSMIT_STATUS_DESCRIPTIONS: Record<string, string> = transmitStatuses;

/** Status byte of AT Command Response and Remote AT Command Response */
export enum ATCommandStatus {
    OK = 0,
    ERROR = 1,
    INVALID_COMMAND = 2,
    INVALID_PARAMETER = 3,
    TX_FAILURE = 4,
    UNKNOWN = 255,
}

const AT_COMMAND_STATUS_DESCRIPTIONS: Record<ATCommandStatus, string> = {
    [ATCommandStatus.OK]: "Status OK",
    [ATCommandStatus.ERROR]: "Status Error",
    [ATCommandStatus.INVALID_COMMAND]: "Invalid command",
    [ATCommandStatus.INVALID_PARAMETER]: "Invalid parameter",
    [ATCommandStatus.TX_FAILURE]: "TX failure",
    [ATCommandStatus.UNKNOWN]: "Unknown status",
};

export function getATCommandStatusDescription(status: ATCommandStatus): string {
    return AT_COMMAND_STATUS_DESCRIPTIONS[status] ?? AT_COMMAND_STATUS_DESCRIPTIONS[ATCommandStatus.UNKNOWN];
}

/** Delivery status of Transmit Status and TX Status frames */
export enum XBeeTransmitStatus {
    SUCCESS = 0x00,
    NO_ACK = 0x01,
    CCA_FAILURE = 0x02,
    PURGED = 0x03,
    WIFI_PHYSICAL_ERROR = 0x04,
    INVALID_DESTINATION = 0x15,
    NO_BUFFERS = 0x18,
    NETWORK_ACK_FAILURE = 0x21,
    NOT_JOINED_NETWORK = 0x22,
    SELF_ADDRESSED = 0x23,
    ADDRESS_NOT_FOUND = 0x24,
    ROUTE_NOT_FOUND = 0x25,
    BROADCAST_FAILED = 0x26,
    INVALID_BINDING_TABLE_INDEX = 0x2b,
    INVALID_ENDPOINT = 0x2c,
    BROADCAST_ERROR_APS = 0x2d,
    BROADCAST_ERROR_APS_EE0 = 0x2e,
    SOFTWARE_ERROR = 0x31,
    RESOURCE_ERROR = 0x32,
    PAYLOAD_TOO_LARGE = 0x74,
    INDIRECT_MESSAGE_UNREQUESTED = 0x75,
    SOCKET_CREATION_FAILED = 0x76,
    IP_PORT_NOT_EXIST = 0x77,
    INVALID_UDP_PORT = 0x78,
    INVALID_TCP_PORT = 0x79,
    INVALID_HOST = 0x7a,
    INVALID_DATA_MODE = 0x7b,
    INVALID_INTERFACE = 0x7c,
    NOT_ACCEPT_FRAMES = 0x7d,
    CONNECTION_REFUSED = 0x80,
    CONNECTION_LOST = 0x81,
    NO_SERVER = 0x82,
    SOCKET_CLOSED = 0x83,
    UNKNOWN_SERVER = 0x84,
    UNKNOWN_ERROR = 0x85,
    KEY_NOT_AUTHORIZED = 0xbb,
    UNKNOWN = 0xff,
}

export function getXBeeTransmitStatusDescription(status: number): string {
    return TRANSMIT_STATUS_DESCRIPTIONS[status] ?? TRANSMIT_STATUS_DESCRIPTIONS[XBeeTransmitStatus.UNKNOWN];
}

export enum XBeeDiscoveryStatus {
    NO_DISCOVERY_OVERHEAD = 0x00,
    ADDRESS_DISCOVERY = 0x01,
    ROUTE_DISCOVERY = 0x02,
    ADDRESS_AND_ROUTE = 0x03,
    EXTENDED_TIMEOUT_DISCOVERY = 0x40,
    UNKNOWN = 0xff,
}

const DISCOVERY_STATUS_DESCRIPTIONS: Record<XBeeDiscoveryStatus, string> = {
    [XBeeDiscoveryStatus.NO_DISCOVERY_OVERHEAD]: "No discovery overhead",
    [XBeeDiscoveryStatus.ADDRESS_DISCOVERY]: "Address discovery",
    [XBeeDiscoveryStatus.ROUTE_DISCOVERY]: "Route discovery",
    [XBeeDiscoveryStatus.ADDRESS_AND_ROUTE]: "Address and route",
    [XBeeDiscoveryStatus.EXTENDED_TIMEOUT_DISCOVERY]: "Extended timeout discovery",
    [XBeeDiscoveryStatus.UNKNOWN]: "Unknown",
};

export function getXBeeDiscoveryStatusDescription(status: XBeeDiscoveryStatus): string {
    return DISCOVERY_STATUS_DESCRIPTIONS[status] ?? DISCOVERY_STATUS_DESCRIPTIONS[XBeeDiscoveryStatus.UNKNOWN];
}

/** Modem status codes, more in the descriptions table */
export enum XBeeModemStatus {
    HARDWARE_RESET = 0x00,
    WATCHDOG_TIMER_RESET = 0x01,
    JOINED_NETWORK = 0x02,
    DISASSOCIATED = 0x03,
    ERROR_SYNCHRONIZATION_LOST = 0x04,
    COORDINATOR_REALIGNMENT = 0x05,
    COORDINATOR_STARTED = 0x06,
    NETWORK_SECURITY_KEY_UPDATED = 0x07,
    NETWORK_WOKE_UP = 0x0b,
    NETWORK_WENT_TO_SLEEP = 0x0c,
    VOLTAGE_SUPPLY_LIMIT_EXCEEDED = 0x0d,
    MODEM_CONFIG_CHANGED_WHILE_JOINING = 0x11,
    ERROR_STACK = 0x80,
    UNKNOWN = 0xff,
}

export function getXBeeModemStatusDescription(status: number): string {
    return MODEM_STATUS_DESCRIPTIONS[status] ?? MODEM_STATUS_DESCRIPTIONS[XBeeModemStatus.UNKNOWN];
}

/** e.g. `Device joined to network (0x02)` */
export function xbeeModemStatusToDisplayString(status: number): string {
    return `${getXBeeModemStatusDescription(status)} (0x${toHexString(status, 1)})`;
}
