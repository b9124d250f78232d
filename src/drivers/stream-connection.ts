import type { Duplex } from "node:stream";
import { XBeeInterfaceNotOpenError } from "../xbee/errors.js";
import { logger } from "../utils/logger.js";
import { XBeeByteBuffer } from "./xbee-byte-buffer.js";
import type { XBeeConnection } from "./xbee-connection.js";

const NS = "xbee-driver:connection";

export type StreamConnectionOptions = {
    /** Create the transport, resolved once it is ready for I/O */
    open: () => Promise<Duplex>;
    /** Release the transport, defaults to destroying the stream */
    close?: (stream: Duplex) => Promise<void>;
};

/**
 * `XBeeConnection` over any duplex stream: serial port, TCP socket, in-memory test stream.
 */
export class StreamConnection implements XBeeConnection {
    readonly #options: StreamConnectionOptions;
    readonly #buffer: XBeeByteBuffer;
    #stream: Duplex | undefined;
    /** True when the stream is currently closing */
    #closing: boolean;

    public constructor(options: StreamConnectionOptions) {
        this.#options = options;
        this.#buffer = new XBeeByteBuffer();
        this.#stream = undefined;
        this.#closing = false;
    }

    get isOpen(): boolean {
        if (this.#closing || this.#stream === undefined) {
            return false;
        }

        return !this.#stream.destroyed;
    }

    get available(): number {
        return this.#buffer.available;
    }

    get isClosed(): boolean {
        return this.#buffer.isClosed;
    }

    public readByte(): number | undefined {
        return this.#buffer.readByte();
    }

    public async waitForData(timeout?: number): Promise<boolean> {
        return await this.#buffer.waitForData(timeout);
    }

    public wake(): void {
        this.#buffer.wake();
    }

    public async open(): Promise<void> {
        if (this.isOpen) {
            return;
        }

        const stream = await this.#options.open();

        this.#buffer.reopen();
        stream.pipe(this.#buffer, { end: false });
        stream.on("error", this.#onStreamError.bind(this));
        stream.once("close", this.#onStreamClose.bind(this, stream));

        this.#stream = stream;

        logger.info("Connection opened", NS);
    }

    public async close(): Promise<void> {
        const stream = this.#stream;

        if (stream === undefined || this.#closing) {
            return;
        }

        this.#closing = true;

        try {
            stream.unpipe(this.#buffer);

            if (this.#options.close) {
                await this.#options.close(stream);
            } else {
                stream.destroy();
            }
        } finally {
            this.#stream = undefined;
            this.#closing = false;

            this.#buffer.close();
        }

        logger.info("Connection closed", NS);
    }

    /**
     * @throws XBeeInterfaceNotOpenError
     */
    public async write(data: Buffer): Promise<void> {
        const stream = this.#stream;

        if (stream === undefined || !this.isOpen) {
            throw new XBeeInterfaceNotOpenError();
        }

        logger.debug(() => `>>> FRAME[${data.toString("hex")}]`, NS);

        await new Promise<void>((resolve, reject): void => {
            stream.write(data, (error) => (error ? reject(error) : resolve()));
        });
    }

    #onStreamError(error: Error): void {
        logger.error(`Stream ${error}`, NS);
    }

    #onStreamClose(stream: Duplex): void {
        if (this.#stream !== stream) {
            return;
        }

        logger.error("Stream closed unexpectedly.", NS);

        this.#stream = undefined;

        this.#buffer.close();
    }
}
