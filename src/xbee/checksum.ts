/**
 * Running-sum checksum of an API frame payload.
 *
 * The sum is accumulated untruncated; only `generate` and `validate` look at its low byte.
 * Not shared: each frame generation or parse uses its own instance (or resets it).
 */
export class XBeeChecksum {
    #sum = 0;

    public add(value: number | Buffer): void {
        if (typeof value === "number") {
            this.#sum += value & 0xff;

            return;
        }

        for (const byte of value) {
            this.#sum += byte;
        }
    }

    public reset(): void {
        this.#sum = 0;
    }

    /**
     * @returns `0xFF - (sum & 0xFF)`
     */
    public generate(): number {
        return 0xff - (this.#sum & 0xff);
    }

    /**
     * Expects the checksum byte to have been added already.
     */
    public validate(): boolean {
        return (this.#sum & 0xff) === 0xff;
    }
}

export function computeXBeeChecksum(payload: Buffer): number {
    const checksum = new XBeeChecksum();

    checksum.add(payload);

    return checksum.generate();
}
