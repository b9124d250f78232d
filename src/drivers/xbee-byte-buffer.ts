import { Writable, type WritableOptions } from "node:stream";
import { logger } from "../utils/logger.js";
import type { XBeeByteSource } from "./xbee-connection.js";

const NS = "xbee-driver:buffer";

type DataWaiter = {
    timer: NodeJS.Timeout | undefined;
    resolve: (hasData: boolean) => void;
};

/**
 * Sink of the transport's readable side. Accumulates raw bytes for the frame parser to pull.
 */
export class XBeeByteBuffer extends Writable implements XBeeByteSource {
    #buffer: Buffer;
    #closed: boolean;
    readonly #waiters: Set<DataWaiter>;

    public constructor(opts?: WritableOptions) {
        super(opts);

        this.#buffer = Buffer.alloc(0);
        this.#closed = false;
        this.#waiters = new Set();
    }

    get available(): number {
        return this.#buffer.byteLength;
    }

    get isClosed(): boolean {
        return this.#closed;
    }

    override _write(chunk: Buffer, _encoding: BufferEncoding, cb: (error?: Error | null) => void): void {
        this.append(chunk);
        cb();
    }

    override _final(cb: (error?: Error | null) => void): void {
        this.close();
        cb();
    }

    public append(chunk: Buffer): void {
        logger.debug(() => `<<< RAW[${chunk.toString("hex")}]`, NS);

        this.#buffer = this.#buffer.byteLength === 0 ? chunk : Buffer.concat([this.#buffer, chunk]);

        this.#release();
    }

    public readByte(): number | undefined {
        if (this.#buffer.byteLength === 0) {
            return undefined;
        }

        const byte = this.#buffer[0];
        this.#buffer = this.#buffer.subarray(1);

        return byte;
    }

    public async waitForData(timeout?: number): Promise<boolean> {
        if (this.#buffer.byteLength > 0) {
            return true;
        }

        if (this.#closed) {
            return false;
        }

        return await new Promise<boolean>((resolve) => {
            const waiter: DataWaiter = { timer: undefined, resolve };

            if (timeout !== undefined) {
                waiter.timer = setTimeout(() => {
                    this.#waiters.delete(waiter);
                    resolve(false);
                }, timeout);
            }

            this.#waiters.add(waiter);
        });
    }

    public wake(): void {
        this.#release();
    }

    /** Drop any unread bytes */
    public clear(): void {
        this.#buffer = Buffer.alloc(0);
    }

    /** Mark as closed, pending and future waits resolve immediately */
    public close(): void {
        this.#closed = true;

        this.#release();
    }

    /** Re-arm after a close, for a transport that is re-opened */
    public reopen(): void {
        this.#closed = false;
        this.#buffer = Buffer.alloc(0);
    }

    #release(): void {
        const hasData = this.#buffer.byteLength > 0;

        for (const waiter of this.#waiters) {
            clearTimeout(waiter.timer);
            waiter.resolve(hasData);
        }

        this.#waiters.clear();
    }
}
