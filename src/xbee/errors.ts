import type { ATCommandStatus, XBeeTransmitStatus } from "./statuses.js";
import { getATCommandStatusDescription, getXBeeTransmitStatusDescription } from "./statuses.js";

export class XBeeError extends Error {
    public constructor(message: string, options?: ErrorOptions) {
        super(message, options);

        this.name = new.target.name;
    }
}

/** Framing, checksum or length fault. Fatal to one frame, never to the connection. */
export class XBeeParsingError extends XBeeError {}

export class XBeeInvalidOperatingModeError extends XBeeError {
    public constructor(message = "Operating mode must be API or API Escaped.", options?: ErrorOptions) {
        super(message, options);
    }
}

/** A synchronous send or wait exceeded its deadline. */
export class XBeeTimeoutError extends XBeeError {}

export class XBeeInterfaceNotOpenError extends XBeeError {
    public constructor(message = "The connection interface is not open.", options?: ErrorOptions) {
        super(message, options);
    }
}

export class XBeeATCommandError extends XBeeError {
    public readonly status: ATCommandStatus;

    public constructor(command: string, status: ATCommandStatus) {
        super(`AT command ${command} failed: ${getATCommandStatusDescription(status)}`, { cause: status });

        this.status = status;
    }
}

export class XBeeTransmitError extends XBeeError {
    public readonly status: XBeeTransmitStatus;

    public constructor(status: XBeeTransmitStatus) {
        super(`There was a problem transmitting the XBee API packet: ${getXBeeTransmitStatusDescription(status)}`, { cause: status });

        this.status = status;
    }
}
