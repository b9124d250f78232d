import { XBeeParsingError } from "./errors.js";
import { isBitEnabled } from "./utils.js";

export enum XBeeIOLine {
    DIO0_AD0 = 0,
    DIO1_AD1 = 1,
    DIO2_AD2 = 2,
    DIO3_AD3 = 3,
    DIO4_AD4 = 4,
    DIO5_AD5 = 5,
    DIO6 = 6,
    DIO7 = 7,
    DIO8 = 8,
    DIO9 = 9,
    DIO10_PWM0 = 10,
    DIO11_PWM1 = 11,
    DIO12 = 12,
    DIO13 = 13,
    DIO14 = 14,
    DIO15 = 15,
    DIO16 = 16,
    DIO17 = 17,
    DIO18 = 18,
    DIO19 = 19,
}

export enum XBeeIOValue {
    LOW = 4,
    HIGH = 5,
}

export function getXBeeIOLineName(line: XBeeIOLine): string {
    // DIO10_PWM0 => DIO10/PWM0
    return XBeeIOLine[line].replace("_", "/");
}

export const enum XBeeIOSampleConsts {
    MIN_PAYLOAD_LENGTH = 5,
    /** analog mask bit carrying the power supply voltage (standard format only) */
    POWER_SUPPLY_BIT = 7,
    /** first ADC bit of the combined mask in the 802.15.4 format */
    RAW_ADC_FIRST_BIT = 9,
}

/**
 * Standard format (even length):
 *
 * +---------+--------------+-------------+----------------------+---------------------+
 * | samples | digital mask | analog mask | digital values (opt) | analog values (opt) |
 * |    1    |      2       |      1      |          2           |    2 per channel    |
 * +---------+--------------+-------------+----------------------+---------------------+
 *
 * 802.15.4 raw format (odd length): the 2 mask bytes hold both masks
 * (bit 8 and LSB: digital, bits 9-14: ADC0-5), followed by the optional values.
 */
export type XBeeIOSample = {
    digitalMask: number;
    analogMask: number;
    digitalValues: Map<XBeeIOLine, XBeeIOValue>;
    analogValues: Map<XBeeIOLine, number>;
    /** only in the standard format, when analog mask bit 7 is set */
    powerSupplyVoltage: number | undefined;
};

function readDigitalValues(digitalMask: number, values: number): Map<XBeeIOLine, XBeeIOValue> {
    const digitalValues = new Map<XBeeIOLine, XBeeIOValue>();

    for (let i = 0; i < 16; i++) {
        if (isBitEnabled(digitalMask, i)) {
            digitalValues.set(i, isBitEnabled(values, i) ? XBeeIOValue.HIGH : XBeeIOValue.LOW);
        }
    }

    return digitalValues;
}

function decodeRawIOSample(payload: Buffer): XBeeIOSample {
    let offset = 3;
    const combinedMask = payload.readUInt16BE(1);
    const digitalMask = combinedMask & 0x01ff;
    const analogMask = combinedMask & 0x7e00;
    let digitalValues = new Map<XBeeIOLine, XBeeIOValue>();

    if (digitalMask > 0) {
        digitalValues = readDigitalValues(digitalMask, ((payload[3] & 0x7f) << 8) + payload[4]);
        offset += 2;
    }

    const analogValues = new Map<XBeeIOLine, number>();

    for (let adc: number = XBeeIOSampleConsts.RAW_ADC_FIRST_BIT; payload.byteLength - offset > 1 && adc < 16; adc++) {
        if (isBitEnabled(analogMask, adc)) {
            analogValues.set(adc - XBeeIOSampleConsts.RAW_ADC_FIRST_BIT, payload.readUInt16BE(offset));
            offset += 2;
        }
    }

    return { digitalMask, analogMask, digitalValues, analogValues, powerSupplyVoltage: undefined };
}

function decodeStandardIOSample(payload: Buffer): XBeeIOSample {
    let offset = 4;
    const digitalMask = ((payload[1] & 0x7f) << 8) + payload[2];
    const analogMask = payload[3] & 0xbf;
    let digitalValues = new Map<XBeeIOLine, XBeeIOValue>();

    if (digitalMask > 0) {
        digitalValues = readDigitalValues(digitalMask, ((payload[4] & 0x7f) << 8) + payload[5]);
        offset += 2;
    }

    const analogValues = new Map<XBeeIOLine, number>();
    let powerSupplyVoltage: number | undefined;

    for (let adc = 0; payload.byteLength - offset > 1 && adc < 8; adc++) {
        if (isBitEnabled(analogMask, adc)) {
            const value = payload.readUInt16BE(offset);

            if (adc === XBeeIOSampleConsts.POWER_SUPPLY_BIT) {
                powerSupplyVoltage = value;
            } else {
                analogValues.set(adc, value);
            }

            offset += 2;
        }
    }

    return { digitalMask, analogMask, digitalValues, analogValues, powerSupplyVoltage };
}

/**
 * @throws XBeeParsingError if shorter than 5 bytes
 */
export function decodeXBeeIOSample(payload: Buffer): XBeeIOSample {
    if (payload.byteLength < XBeeIOSampleConsts.MIN_PAYLOAD_LENGTH) {
        throw new XBeeParsingError(
            `Invalid IO sample payload length, got ${payload.byteLength}, expected at least ${XBeeIOSampleConsts.MIN_PAYLOAD_LENGTH}`,
        );
    }

    return payload.byteLength % 2 !== 0 ? decodeRawIOSample(payload) : decodeStandardIOSample(payload);
}

export function hasDigitalValues(sample: XBeeIOSample): boolean {
    return sample.digitalMask > 0;
}

export function hasAnalogValues(sample: XBeeIOSample): boolean {
    return sample.analogMask > 0;
}

export function hasPowerSupplyValue(sample: XBeeIOSample): boolean {
    return sample.powerSupplyVoltage !== undefined;
}

/**
 * @returns undefined when the line is not configured as a digital IO
 */
export function getDigitalValue(sample: XBeeIOSample, line: XBeeIOLine): XBeeIOValue | undefined {
    return sample.digitalValues.get(line);
}

export function getAnalogValue(sample: XBeeIOSample, line: XBeeIOLine): number | undefined {
    return sample.analogValues.get(line);
}

/**
 * e.g. `{[DIO0/AD0: HIGH], [DIO1/AD1: 512], [Power supply voltage: 3300]}`
 */
export function xbeeIOSampleToString(sample: XBeeIOSample): string {
    const parts: string[] = [];

    for (const [line, value] of sample.digitalValues) {
        parts.push(`[${getXBeeIOLineName(line)}: ${XBeeIOValue[value]}]`);
    }

    for (const [line, value] of sample.analogValues) {
        parts.push(`[${getXBeeIOLineName(line)}: ${value}]`);
    }

    if (sample.powerSupplyVoltage !== undefined) {
        parts.push(`[Power supply voltage: ${sample.powerSupplyVoltage}]`);
    }

    return `{${parts.join(", ")}}`;
}
