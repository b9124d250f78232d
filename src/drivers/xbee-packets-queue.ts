import { XBeeApiFrameType } from "../xbee/frame-types.js";
import type { XBeeDataPacket } from "../xbee/messages.js";
import { getXBeePacketSource64, type XBeePacket } from "../xbee/packet.js";
import type { RXIPv4Packet } from "../xbee/packets/ip.js";
import type { ExplicitRxIndicatorPacket } from "../xbee/packets/receive.js";
import { logger } from "../utils/logger.js";

const NS = "xbee-driver:queue";

export const DEFAULT_QUEUE_MAX_SIZE = 50;

function isDataPacket(packet: XBeePacket): packet is XBeeDataPacket {
    return (
        packet.frameType === XBeeApiFrameType.RECEIVE_PACKET ||
        packet.frameType === XBeeApiFrameType.RX_64 ||
        packet.frameType === XBeeApiFrameType.RX_16
    );
}

function isExplicitDataPacket(packet: XBeePacket): packet is ExplicitRxIndicatorPacket {
    return packet.frameType === XBeeApiFrameType.EXPLICIT_RX_INDICATOR;
}

function isIPDataPacket(packet: XBeePacket): packet is RXIPv4Packet {
    return packet.frameType === XBeeApiFrameType.RX_IPV4;
}

/**
 * Bounded FIFO of received packets. When full, the oldest packet is dropped to make room.
 *
 * All `getFirst*` take a timeout in ms: 0 only looks at what is already queued,
 * otherwise waits for a matching packet up to the timeout. `undefined` means nothing matched.
 */
export class XBeePacketsQueue {
    readonly #maxSize: number;
    #packets: XBeePacket[];
    readonly #waiters: Set<() => void>;

    public constructor(maxSize = DEFAULT_QUEUE_MAX_SIZE) {
        if (!Number.isInteger(maxSize) || maxSize < 1) {
            throw new Error(`Invalid queue size, got ${maxSize}, expected a positive integer`);
        }

        this.#maxSize = maxSize;
        this.#packets = [];
        this.#waiters = new Set();
    }

    get size(): number {
        return this.#packets.length;
    }

    get maxSize(): number {
        return this.#maxSize;
    }

    public isFull(): boolean {
        return this.#packets.length >= this.#maxSize;
    }

    public add(packet: XBeePacket): void {
        if (this.isFull()) {
            const dropped = this.#packets.shift();

            logger.debug(() => `Queue full, dropped oldest packet (type=${dropped?.frameType})`, NS);
        }

        this.#packets.push(packet);

        for (const waiter of [...this.#waiters]) {
            waiter();
        }
    }

    public clear(): void {
        this.#packets = [];
    }

    public async getFirstPacket(timeout = 0): Promise<XBeePacket | undefined> {
        return await this.#getFirst((_packet): _packet is XBeePacket => true, timeout);
    }

    public async getFirstPacketFrom(address64: bigint, timeout = 0): Promise<XBeePacket | undefined> {
        return await this.#getFirst((packet): packet is XBeePacket => getXBeePacketSource64(packet) === address64, timeout);
    }

    public async getFirstDataPacket(timeout = 0): Promise<XBeeDataPacket | undefined> {
        return await this.#getFirst(isDataPacket, timeout);
    }

    public async getFirstDataPacketFrom(address64: bigint, timeout = 0): Promise<XBeeDataPacket | undefined> {
        return await this.#getFirst(
            (packet): packet is XBeeDataPacket => isDataPacket(packet) && getXBeePacketSource64(packet) === address64,
            timeout,
        );
    }

    public async getFirstExplicitDataPacket(timeout = 0): Promise<ExplicitRxIndicatorPacket | undefined> {
        return await this.#getFirst(isExplicitDataPacket, timeout);
    }

    public async getFirstIPDataPacket(timeout = 0): Promise<RXIPv4Packet | undefined> {
        return await this.#getFirst(isIPDataPacket, timeout);
    }

    #take<T extends XBeePacket>(predicate: (packet: XBeePacket) => packet is T): T | undefined {
        const packet = this.#packets.find(predicate);

        if (packet !== undefined) {
            this.#packets.splice(this.#packets.indexOf(packet), 1);
        }

        return packet;
    }

    async #getFirst<T extends XBeePacket>(predicate: (packet: XBeePacket) => packet is T, timeout: number): Promise<T | undefined> {
        const packet = this.#take(predicate);

        if (packet !== undefined || timeout <= 0) {
            return packet;
        }

        return await new Promise<T | undefined>((resolve) => {
            const onAdd = (): void => {
                const added = this.#take(predicate);

                if (added !== undefined) {
                    clearTimeout(timer);
                    this.#waiters.delete(onAdd);
                    resolve(added);
                }
            };
            const timer = setTimeout(() => {
                this.#waiters.delete(onAdd);
                resolve(undefined);
            }, timeout);

            this.#waiters.add(onAdd);
        });
    }
}
