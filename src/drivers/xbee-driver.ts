import { XBEE_64_BROADCAST, XBee16BitAddress } from "../xbee/address.js";
import { XBEE_OPERATING_MODE_NAMES, XBeeApiConsts, XBeeOperatingMode, isApiOperatingMode } from "../xbee/consts.js";
import {
    XBeeATCommandError,
    XBeeError,
    XBeeInterfaceNotOpenError,
    XBeeInvalidOperatingModeError,
    XBeeTimeoutError,
    XBeeTransmitError,
} from "../xbee/errors.js";
import { encodeXBeeFrame } from "../xbee/frame.js";
import { XBeeApiFrameType, xbeeApiFrameTypeToDisplayString } from "../xbee/frame-types.js";
import { toXBeeMessage, type XBeeMessage } from "../xbee/messages.js";
import { RemoteATCommandOptions, XBeeTransmitOptions } from "../xbee/options.js";
import { needsFrameId, type XBeePacket, type XBeePacketWithFrameId } from "../xbee/packet.js";
import type { TransmitRequestPacket, TransmitStatusPacket } from "../xbee/packets/transmit.js";
import { ATCommandStatus, XBeeTransmitStatus } from "../xbee/statuses.js";
import { logger } from "../utils/logger.js";
import type { XBeeConnection } from "./xbee-connection.js";
import { XBeeDataReader } from "./xbee-data-reader.js";
import { DEFAULT_BYTE_TIMEOUT } from "./xbee-parser.js";
import { DEFAULT_QUEUE_MAX_SIZE } from "./xbee-packets-queue.js";

const NS = "xbee-driver";

export const DEFAULT_RECEIVE_TIMEOUT = 2000;

export type XBeeDriverOptions = {
    /** API or API_ESCAPE, default API */
    operatingMode?: XBeeOperatingMode;
    /** ms, default timeout of synchronous operations */
    receiveTimeout?: number;
    queueMaxSize?: number;
    /** ms */
    byteTimeout?: number;
};

type FrameIdWaiter = {
    timer: NodeJS.Timeout | undefined;
    resolve: (packet: XBeePacket) => void;
    reject: (error: Error) => void;
};

/**
 * Whether `response` answers `request`.
 * Frames identical to the one sent are local echoes (e.g. loopback transport) and never match.
 */
function isResponseTo(request: XBeePacketWithFrameId, sentFrame: Buffer, response: XBeePacketWithFrameId): boolean {
    if (encodeXBeeFrame(response).equals(sentFrame)) {
        return false;
    }

    switch (request.frameType) {
        case XBeeApiFrameType.AT_COMMAND:
        case XBeeApiFrameType.AT_COMMAND_QUEUE:
            return response.frameType === XBeeApiFrameType.AT_COMMAND_RESPONSE && response.command.toUpperCase() === request.command.toUpperCase();
        case XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST:
            return (
                response.frameType === XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE &&
                response.command.toUpperCase() === request.command.toUpperCase()
            );
        default:
            return true;
    }
}

export class XBeeDriver {
    readonly connection: XBeeConnection;
    readonly reader: XBeeDataReader;
    readonly #operatingMode: XBeeOperatingMode;
    #receiveTimeout: number;

    /**
     * Last frame ID handed out.
     *
     * NOTE: 0 means "no response requested" to the module, never allocated.
     */
    #frameId: number;
    /**
     * Synchronous sends currently awaiting their response.
     * Several may share a frame ID (explicit IDs, counter wrap), each is settled on its own.
     */
    readonly #frameIdWaiters: Set<FrameIdWaiter>;

    public constructor(connection: XBeeConnection, options: XBeeDriverOptions = {}) {
        this.connection = connection;
        this.#operatingMode = options.operatingMode ?? XBeeOperatingMode.API;
        this.#receiveTimeout = options.receiveTimeout ?? DEFAULT_RECEIVE_TIMEOUT;
        this.reader = new XBeeDataReader(connection, {
            operatingMode: this.#operatingMode,
            queueMaxSize: options.queueMaxSize ?? DEFAULT_QUEUE_MAX_SIZE,
            byteTimeout: options.byteTimeout ?? DEFAULT_BYTE_TIMEOUT,
        });
        this.#frameId = 0; // first nextFrameId() call returns 1
        this.#frameIdWaiters = new Set();
    }

    get operatingMode(): XBeeOperatingMode {
        return this.#operatingMode;
    }

    get receiveTimeout(): number {
        return this.#receiveTimeout;
    }

    set receiveTimeout(timeout: number) {
        this.#receiveTimeout = timeout;
    }

    get isOpen(): boolean {
        return this.connection.isOpen;
    }

    // #region Lifecycle

    /**
     * @throws XBeeInvalidOperatingModeError if the configured mode is not an API mode
     */
    public async open(): Promise<void> {
        if (!isApiOperatingMode(this.#operatingMode)) {
            throw new XBeeInvalidOperatingModeError();
        }

        logger.info(`======== Driver opening (${XBEE_OPERATING_MODE_NAMES[this.#operatingMode]}) ========`, NS);

        await this.connection.open();
        this.reader.start();

        logger.info("======== Driver opened ========", NS);
    }

    public async close(): Promise<void> {
        logger.info("======== Driver closing ========", NS);

        for (const waiter of this.#frameIdWaiters) {
            clearTimeout(waiter.timer);
            waiter.timer = undefined;

            waiter.reject(new XBeeInterfaceNotOpenError());
        }

        this.#frameIdWaiters.clear();

        await this.reader.stop();

        if (this.connection.isOpen) {
            await this.connection.close();
        }

        logger.info("======== Driver closed ========", NS);
    }

    // #endregion

    // #region Frame IDs

    /**
     * @returns next frame ID, cycling 1..255
     */
    public nextFrameId(): number {
        this.#frameId = (this.#frameId % XBeeApiConsts.FRAME_ID_MAX) + 1;

        return this.#frameId;
    }

    #assignFrameId(packet: XBeePacketWithFrameId): void {
        if (packet.frameId === XBeeApiConsts.NO_FRAME_ID) {
            packet.frameId = this.nextFrameId();
        }
    }

    // #endregion

    // #region Send

    #assertOpen(): void {
        if (!this.connection.isOpen) {
            throw new XBeeInterfaceNotOpenError();
        }
    }

    async #writePacket(packet: XBeePacket): Promise<void> {
        logger.debug(
            () => `---> PACKET[${xbeeApiFrameTypeToDisplayString(packet.frameType)}${needsFrameId(packet) ? ` frameId=${packet.frameId}` : ""}]`,
            NS,
        );

        await this.connection.write(encodeXBeeFrame(packet, this.#operatingMode === XBeeOperatingMode.API_ESCAPE));
    }

    /**
     * Send without waiting for any response. A missing frame ID is assigned.
     *
     * @throws XBeeInterfaceNotOpenError
     */
    public async sendPacketAsync(packet: XBeePacket): Promise<void> {
        this.#assertOpen();

        if (needsFrameId(packet)) {
            this.#assignFrameId(packet);
        }

        await this.#writePacket(packet);
    }

    /**
     * Send and wait for the response carrying the same frame ID.
     * Packets without a frame ID are sent asynchronously and resolve `undefined`.
     *
     * @param timeout ms, defaults to `receiveTimeout`
     * @throws XBeeInterfaceNotOpenError if not open, or if the driver is closed while waiting
     * @throws XBeeTimeoutError if no response arrived in time
     */
    public async sendPacket(packet: XBeePacket, timeout = this.#receiveTimeout): Promise<XBeePacket | undefined> {
        if (!needsFrameId(packet)) {
            await this.sendPacketAsync(packet);

            return undefined;
        }

        this.#assertOpen();

        const request = packet;

        this.#assignFrameId(request);

        const frameId = request.frameId;
        const sentFrame = encodeXBeeFrame(request);
        const waiter: FrameIdWaiter = { timer: undefined, resolve: () => {}, reject: () => {} };
        const listener = (response: XBeePacketWithFrameId): boolean => {
            if (!isResponseTo(request, sentFrame, response)) {
                return false;
            }

            waiter.resolve(response);

            return true;
        };

        this.reader.addFrameIdListener(frameId, listener);

        try {
            return await new Promise<XBeePacket>((resolve, reject) => {
                waiter.resolve = resolve;
                waiter.reject = reject;

                this.#frameIdWaiters.add(waiter);

                // timer armed once written, so a slow write does not eat into the response time
                this.#writePacket(request).then(() => {
                    if (this.#frameIdWaiters.has(waiter)) {
                        waiter.timer = setTimeout(
                            reject.bind(this, new XBeeTimeoutError(`-x-> PACKET[frameId=${frameId}] Timeout after ${timeout}ms`)),
                            timeout,
                        );
                    }
                }, reject);
            });
        } finally {
            clearTimeout(waiter.timer);
            this.#frameIdWaiters.delete(waiter);
            this.reader.removeFrameIdListener(frameId, listener);
        }
    }

    // #endregion

    // #region AT commands

    /**
     * @returns the response value, undefined when the command returns none
     * @throws XBeeATCommandError if the response status is not OK
     */
    public async sendATCommand(command: string, parameter?: Buffer, timeout = this.#receiveTimeout): Promise<Buffer | undefined> {
        const response = await this.sendPacket(
            { frameType: XBeeApiFrameType.AT_COMMAND, frameId: XBeeApiConsts.NO_FRAME_ID, command, parameter },
            timeout,
        );

        if (response?.frameType !== XBeeApiFrameType.AT_COMMAND_RESPONSE) {
            throw new XBeeError(`Unexpected response to AT command ${command}`);
        }

        if (response.status !== ATCommandStatus.OK) {
            throw new XBeeATCommandError(command, response.status);
        }

        return response.value;
    }

    /**
     * With `OPTION_DISABLE_ACK` the request is sent asynchronously and resolves undefined.
     *
     * @throws XBeeATCommandError if the response status is not OK
     */
    public async sendRemoteATCommand(
        destination64: bigint,
        destination16: number,
        command: string,
        parameter?: Buffer,
        options: number = RemoteATCommandOptions.OPTION_APPLY_CHANGES,
        timeout = this.#receiveTimeout,
    ): Promise<Buffer | undefined> {
        const packet: XBeePacket = {
            frameType: XBeeApiFrameType.REMOTE_AT_COMMAND_REQUEST,
            frameId: XBeeApiConsts.NO_FRAME_ID,
            destination64,
            destination16,
            options,
            command,
            parameter,
        };

        if (options & RemoteATCommandOptions.OPTION_DISABLE_ACK) {
            await this.sendPacketAsync(packet);

            return undefined;
        }

        const response = await this.sendPacket(packet, timeout);

        if (response?.frameType !== XBeeApiFrameType.REMOTE_AT_COMMAND_RESPONSE) {
            throw new XBeeError(`Unexpected response to remote AT command ${command}`);
        }

        if (response.status !== ATCommandStatus.OK) {
            throw new XBeeATCommandError(command, response.status);
        }

        return response.value;
    }

    // #endregion

    // #region Data

    #createTransmitRequest(destination64: bigint, destination16: number, data: Buffer): TransmitRequestPacket {
        return {
            frameType: XBeeApiFrameType.TRANSMIT_REQUEST,
            frameId: XBeeApiConsts.NO_FRAME_ID,
            destination64,
            destination16,
            broadcastRadius: 0,
            options: XBeeTransmitOptions.NONE,
            rfData: data,
        };
    }

    /**
     * Send data and wait for its Transmit Status.
     *
     * @throws XBeeTransmitError if the delivery status is not SUCCESS
     */
    public async sendData(
        destination64: bigint,
        destination16: number,
        data: Buffer,
        timeout = this.#receiveTimeout,
    ): Promise<TransmitStatusPacket> {
        const response = await this.sendPacket(this.#createTransmitRequest(destination64, destination16, data), timeout);

        if (response?.frameType !== XBeeApiFrameType.TRANSMIT_STATUS) {
            throw new XBeeError("Unexpected response to transmit request");
        }

        if (response.deliveryStatus !== XBeeTransmitStatus.SUCCESS) {
            throw new XBeeTransmitError(response.deliveryStatus);
        }

        return response;
    }

    public async sendBroadcastData(data: Buffer, timeout = this.#receiveTimeout): Promise<TransmitStatusPacket> {
        return await this.sendData(XBEE_64_BROADCAST, XBee16BitAddress.UNKNOWN, data, timeout);
    }

    public async sendDataAsync(destination64: bigint, destination16: number, data: Buffer): Promise<void> {
        await this.sendPacketAsync(this.#createTransmitRequest(destination64, destination16, data));
    }

    /**
     * @param timeout ms, 0 to only look at what was already received
     * @returns first data received, undefined if none
     */
    public async readData(timeout = 0): Promise<XBeeMessage | undefined> {
        const packet = await this.reader.queue.getFirstDataPacket(timeout);

        return packet === undefined ? undefined : toXBeeMessage(packet);
    }

    public async readDataFrom(address64: bigint, timeout = 0): Promise<XBeeMessage | undefined> {
        const packet = await this.reader.queue.getFirstDataPacketFrom(address64, timeout);

        return packet === undefined ? undefined : toXBeeMessage(packet);
    }

    // #endregion
}
