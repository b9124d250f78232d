import { XBeeByteBuffer } from "../src/drivers/xbee-byte-buffer.js";
import type { XBeeConnection } from "../src/drivers/xbee-connection.js";
import { XBeeInterfaceNotOpenError } from "../src/xbee/errors.js";

/** Build a complete unescaped frame around a payload given as hex */
export function makeFrame(payloadHex: string): Buffer {
    const payload = Buffer.from(payloadHex, "hex");
    let sum = 0;

    for (const byte of payload) {
        sum += byte;
    }

    const frame = Buffer.alloc(payload.byteLength + 4);

    frame.writeUInt8(0x7e, 0);
    frame.writeUInt16BE(payload.byteLength, 1);
    payload.copy(frame, 3);
    frame.writeUInt8(0xff - (sum & 0xff), 3 + payload.byteLength);

    return frame;
}

/** Let the reader loop consume whatever was fed */
export async function flushReader(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * In-process connection: bytes "received" are fed with `feed`, bytes written are recorded in `written`.
 */
export class MockConnection implements XBeeConnection {
    readonly buffer = new XBeeByteBuffer();
    readonly written: Buffer[] = [];
    /** Called after each write, e.g. to feed back a response */
    onWrite: ((data: Buffer) => void) | undefined;
    #open = false;

    get isOpen(): boolean {
        return this.#open;
    }

    get available(): number {
        return this.buffer.available;
    }

    get isClosed(): boolean {
        return this.buffer.isClosed;
    }

    public readByte(): number | undefined {
        return this.buffer.readByte();
    }

    public async waitForData(timeout?: number): Promise<boolean> {
        return await this.buffer.waitForData(timeout);
    }

    public wake(): void {
        this.buffer.wake();
    }

    public async open(): Promise<void> {
        this.buffer.reopen();

        this.#open = true;
    }

    public async close(): Promise<void> {
        this.#open = false;

        this.buffer.close();
    }

    public async write(data: Buffer): Promise<void> {
        if (!this.#open) {
            throw new XBeeInterfaceNotOpenError();
        }

        this.written.push(Buffer.from(data));
        this.onWrite?.(data);
    }

    public feed(data: Buffer): void {
        this.buffer.append(data);
    }
}
