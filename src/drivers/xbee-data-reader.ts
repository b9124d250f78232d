import { XBeeOperatingMode, XBeeSpecialByte } from "../xbee/consts.js";
import { XBeeParsingError } from "../xbee/errors.js";
import { XBeeApiFrameType, xbeeApiFrameTypeToDisplayString } from "../xbee/frame-types.js";
import {
    explicitToReceivePacket,
    isDigiDataPacket,
    toXBeeExplicitMessage,
    toXBeeMessage,
    type XBeeExplicitMessage,
    type XBeeIOSampleMessage,
    type XBeeIPMessage,
    type XBeeMessage,
    type XBeeSMSMessage,
    type XBeeUserDataRelayMessage,
} from "../xbee/messages.js";
import { needsFrameId, type XBeePacket, type XBeePacketWithFrameId } from "../xbee/packet.js";
import type { XBeeModemStatus } from "../xbee/statuses.js";
import { ListenerList } from "../utils/listener-list.js";
import { logger } from "../utils/logger.js";
import type { XBeeConnection } from "./xbee-connection.js";
import { XBeeFrameParser } from "./xbee-parser.js";
import { XBeePacketsQueue } from "./xbee-packets-queue.js";

const NS = "xbee-driver:reader";

export enum XBeeDataReaderState {
    IDLE = 0,
    RUNNING = 1,
    STOPPING = 2,
    STOPPED = 3,
}

/**
 * One-shot listener for a frame ID.
 * Removed after it is called, unless it returns `false` (packet not the one it was waiting for).
 */
export type FrameIdListener = (packet: XBeePacketWithFrameId) => boolean | void;

type FrameIdListenerEntry = {
    frameId: number;
    listener: FrameIdListener;
};

export type XBeeDataReaderOptions = {
    operatingMode: XBeeOperatingMode;
    queueMaxSize?: number;
    /** ms, per-byte timeout of the frame parser */
    byteTimeout?: number;
};

function errorToString(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Pulls bytes from the connection, parses API frames and fans them out to the queue and listeners.
 * Runs on the event loop as a single background task between `start` and `stop`.
 */
export class XBeeDataReader {
    readonly #connection: XBeeConnection;
    readonly #operatingMode: XBeeOperatingMode;
    readonly #parser: XBeeFrameParser;
    readonly #frameIdListeners: FrameIdListenerEntry[];
    #state: XBeeDataReaderState;
    #loop: Promise<void> | undefined;

    readonly queue: XBeePacketsQueue;

    readonly packetReceived = new ListenerList<XBeePacket>("packet received", NS);
    readonly dataReceived = new ListenerList<XBeeMessage>("data received", NS);
    readonly explicitDataReceived = new ListenerList<XBeeExplicitMessage>("explicit data received", NS);
    readonly ioSampleReceived = new ListenerList<XBeeIOSampleMessage>("IO sample received", NS);
    readonly modemStatusReceived = new ListenerList<XBeeModemStatus>("modem status received", NS);
    readonly userDataRelayReceived = new ListenerList<XBeeUserDataRelayMessage>("user data relay received", NS);
    readonly ipDataReceived = new ListenerList<XBeeIPMessage>("IP data received", NS);
    readonly smsReceived = new ListenerList<XBeeSMSMessage>("SMS received", NS);

    public constructor(connection: XBeeConnection, options: XBeeDataReaderOptions) {
        this.#connection = connection;
        this.#operatingMode = options.operatingMode;
        this.#parser = new XBeeFrameParser(options.byteTimeout);
        this.#frameIdListeners = [];
        this.#state = XBeeDataReaderState.IDLE;
        this.#loop = undefined;
        this.queue = new XBeePacketsQueue(options.queueMaxSize);
    }

    get state(): XBeeDataReaderState {
        return this.#state;
    }

    get isRunning(): boolean {
        return this.#state === XBeeDataReaderState.RUNNING;
    }

    // #region Listeners

    public addFrameIdListener(frameId: number, listener: FrameIdListener): void {
        this.#frameIdListeners.push({ frameId, listener });
    }

    public removeFrameIdListener(frameId: number, listener: FrameIdListener): void {
        const index = this.#frameIdListeners.findIndex((entry) => entry.frameId === frameId && entry.listener === listener);

        if (index !== -1) {
            this.#frameIdListeners.splice(index, 1);
        }
    }

    get frameIdListenerCount(): number {
        return this.#frameIdListeners.length;
    }

    // #endregion

    // #region Lifecycle

    public start(): void {
        if (this.#state === XBeeDataReaderState.RUNNING || this.#state === XBeeDataReaderState.STOPPING) {
            return;
        }

        logger.debug(() => "Reader starting", NS);

        this.#state = XBeeDataReaderState.RUNNING;

        this.queue.clear();

        this.#loop = this.#run();
    }

    /**
     * Stop the loop and wait for it to exit. The connection is closed on the way out.
     */
    public async stop(): Promise<void> {
        if (this.#state === XBeeDataReaderState.RUNNING) {
            logger.debug(() => "Reader stopping", NS);

            this.#state = XBeeDataReaderState.STOPPING;

            this.#connection.wake();
        }

        await this.#loop;
    }

    async #run(): Promise<void> {
        try {
            while (this.#state === XBeeDataReaderState.RUNNING) {
                if (this.#connection.available === 0) {
                    if (this.#connection.isClosed || !this.#connection.isOpen) {
                        logger.info("Connection closed, reader exiting", NS);
                        break;
                    }

                    await this.#connection.waitForData();
                    continue;
                }

                // resync: anything before a start delimiter is noise
                if (this.#connection.readByte() !== XBeeSpecialByte.HEADER_BYTE) {
                    continue;
                }

                let packet: XBeePacket;

                try {
                    packet = await this.#parser.parseOne(this.#connection, this.#operatingMode);
                } catch (error) {
                    if (!(error instanceof XBeeParsingError)) {
                        throw error;
                    }

                    if (this.#state === XBeeDataReaderState.RUNNING) {
                        logger.error(`Error parsing the API packet. ${error.message}`, NS);
                    }

                    continue;
                }

                this.#dispatch(packet);
            }
        } catch (error) {
            logger.error(`Reader failed: ${errorToString(error)}`, NS);
        } finally {
            this.#state = XBeeDataReaderState.STOPPED;

            if (this.#connection.isOpen) {
                try {
                    await this.#connection.close();
                } catch (error) {
                    logger.error(`Failed to close connection: ${errorToString(error)}`, NS);
                }
            }

            logger.debug(() => "Reader stopped", NS);
        }
    }

    // #endregion

    // #region Dispatch

    #dispatch(packet: XBeePacket): void {
        logger.debug(() => `<--- PACKET[${xbeeApiFrameTypeToDisplayString(packet.frameType)}] dispatching`, NS);

        this.queue.add(packet);

        if (needsFrameId(packet)) {
            this.#notifyFrameIdListeners(packet);
        }

        this.packetReceived.emit(packet);

        switch (packet.frameType) {
            case XBeeApiFrameType.RECEIVE_PACKET:
            case XBeeApiFrameType.RX_64:
            case XBeeApiFrameType.RX_16: {
                this.dataReceived.emit(toXBeeMessage(packet));
                break;
            }
            case XBeeApiFrameType.EXPLICIT_RX_INDICATOR: {
                this.explicitDataReceived.emit(toXBeeExplicitMessage(packet));

                if (isDigiDataPacket(packet)) {
                    const receivePacket = explicitToReceivePacket(packet);

                    this.queue.add(receivePacket);
                    this.dataReceived.emit(toXBeeMessage(receivePacket));
                }

                break;
            }
            case XBeeApiFrameType.IO_DATA_SAMPLE_RX_INDICATOR: {
                if (packet.ioSample !== undefined) {
                    this.ioSampleReceived.emit({ remote64: packet.source64, remote16: packet.source16, ioSample: packet.ioSample });
                }

                break;
            }
            case XBeeApiFrameType.RX_IO_64: {
                if (packet.ioSample !== undefined) {
                    this.ioSampleReceived.emit({ remote64: packet.source64, remote16: undefined, ioSample: packet.ioSample });
                }

                break;
            }
            case XBeeApiFrameType.RX_IO_16: {
                if (packet.ioSample !== undefined) {
                    this.ioSampleReceived.emit({ remote64: undefined, remote16: packet.source16, ioSample: packet.ioSample });
                }

                break;
            }
            case XBeeApiFrameType.MODEM_STATUS: {
                this.modemStatusReceived.emit(packet.status);
                break;
            }
            case XBeeApiFrameType.USER_DATA_RELAY_OUTPUT: {
                this.userDataRelayReceived.emit({ sourceInterface: packet.sourceInterface, data: packet.data });
                break;
            }
            case XBeeApiFrameType.RX_IPV4: {
                this.ipDataReceived.emit({
                    sourceAddress: packet.sourceAddress,
                    sourcePort: packet.sourcePort,
                    destinationPort: packet.destinationPort,
                    protocol: packet.protocol,
                    data: packet.data,
                });
                break;
            }
            case XBeeApiFrameType.RX_SMS: {
                this.smsReceived.emit({ phoneNumber: packet.phoneNumber, data: packet.data });
                break;
            }
        }
    }

    #notifyFrameIdListeners(packet: XBeePacketWithFrameId): void {
        for (const entry of [...this.#frameIdListeners]) {
            if (entry.frameId !== packet.frameId) {
                continue;
            }

            let keep = false;

            try {
                keep = entry.listener(packet) === false;
            } catch (error) {
                logger.error(`Error in frame ID ${packet.frameId} listener: ${errorToString(error)}`, NS);
            }

            if (!keep) {
                this.removeFrameIdListener(entry.frameId, entry.listener);
            }
        }
    }

    // #endregion
}
