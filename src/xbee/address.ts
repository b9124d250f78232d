import { toHexString } from "./utils.js";

/**
 * 16-bit network addresses are `number`, 64-bit extended addresses are `bigint`.
 * Both are written big-endian on the wire, so value equality is byte-wise equality.
 */

export const enum XBee16BitAddress {
    COORDINATOR = 0x0000,
    BROADCAST = 0xffff,
    /** Address not known or not used (e.g. 64-bit addressing) */
    UNKNOWN = 0xfffe,
}

export const XBEE_64_COORDINATOR = 0x0000000000000000n;
export const XBEE_64_BROADCAST = 0x000000000000ffffn;
export const XBEE_64_UNKNOWN = 0x000000000000fffen;

const HEX_REGEX = /^[0-9a-f]+$/i;

export function address16ToString(address16: number): string {
    return toHexString(address16, 2);
}

export function address64ToString(address64: bigint): string {
    return address64.toString(16).toUpperCase().padStart(16, "0");
}

function normalizeAddressString(value: string, maxLength: number): string {
    const hex = value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;

    if (hex.length === 0 || hex.length > maxLength || !HEX_REGEX.test(hex)) {
        throw new Error(`Invalid address, got ${value}, expected up to ${maxLength} hex characters`);
    }

    return hex;
}

/**
 * Shorter strings are left-padded with zeros, e.g. `FFFF` => `0x000000000000FFFF`
 */
export function parseAddress64(value: string): bigint {
    return BigInt(`0x${normalizeAddressString(value, 16)}`);
}

export function parseAddress16(value: string): number {
    return Number.parseInt(normalizeAddressString(value, 4), 16);
}

export function readAddress64(data: Buffer, offset: number): [bigint, offset: number] {
    return [data.readBigUInt64BE(offset), offset + 8];
}

export function readAddress16(data: Buffer, offset: number): [number, offset: number] {
    return [data.readUInt16BE(offset), offset + 2];
}

export function writeAddress64(data: Buffer, address64: bigint, offset: number): number {
    return data.writeBigUInt64BE(address64, offset);
}

export function writeAddress16(data: Buffer, address16: number, offset: number): number {
    return data.writeUInt16BE(address16, offset);
}
