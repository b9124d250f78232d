/**
 * Uppercase hex of `value`, zero-padded to `byteLength` bytes.
 */
export function toHexString(value: number, byteLength: number): string {
    return value.toString(16).toUpperCase().padStart(byteLength * 2, "0");
}

export function bufferToHexString(buffer: Buffer): string {
    return buffer.toString("hex").toUpperCase();
}

/**
 * Separates each byte of a hex string with a space, e.g. `0013A2` => `00 13 A2`
 */
export function prettyHexString(hex: string): string {
    const padded = hex.length % 2 === 0 ? hex : `0${hex}`;
    const pairs: string[] = [];

    for (let i = 0; i < padded.length; i += 2) {
        pairs.push(padded.slice(i, i + 2));
    }

    return pairs.join(" ");
}

/** `00 04 (4)` */
export function prettyValue(value: number, byteLength: number): string {
    return `${prettyHexString(toHexString(value, byteLength))} (${value})`;
}

export function isBitEnabled(value: number, bitPosition: number): boolean {
    return ((value >>> bitPosition) & 0x01) === 0x01;
}
