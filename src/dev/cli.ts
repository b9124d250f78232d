import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { XBeeDriver } from "../drivers/xbee-driver.js";
import { XBee16BitAddress, address64ToString, parseAddress64 } from "../xbee/address.js";
import { XBEE_OPERATING_MODE_NAMES, XBeeOperatingMode, isApiOperatingMode } from "../xbee/consts.js";
import { xbeePacketToPrettyString } from "../xbee/frame.js";
import { xbeeModemStatusToDisplayString } from "../xbee/statuses.js";
import { bufferToHexString } from "../xbee/utils.js";
import { isLogLevel, setLogLevel, type LogLevel } from "../utils/logger.js";
import { createAdapterConnection, type PortOptions } from "./serial-adapter.js";

type Conf = {
    adapter: PortOptions;
    /** 1: API, 2: API escaped */
    operatingMode: XBeeOperatingMode;
    /** ms */
    receiveTimeout: number;
    logLevel: LogLevel;
};

type Command = "at" | "send" | "listen";

function argToBool(arg: string): boolean {
    arg = arg.toLowerCase();

    return arg === "1" || arg === "true" || arg === "yes" || arg === "on";
}

function parseOperatingMode(arg: string): XBeeOperatingMode {
    const mode = Number.parseInt(arg, 10);

    if (mode !== XBeeOperatingMode.API && mode !== XBeeOperatingMode.API_ESCAPE) {
        throw new Error(`Invalid operating mode, got ${arg}, expected 1 (API) or 2 (API escaped)`);
    }

    return mode;
}

function isCommand(arg: string | undefined): arg is Command {
    return arg === "at" || arg === "send" || arg === "listen";
}

function printHelp(shouldThrow: boolean): void {
    console.log("\nAT command:");
    console.log("    dev:cli at <command> [parameter_hex]");

    console.log("\nSend:");
    console.log("    dev:cli send <address64_hex> <text>");

    console.log("\nListen:");
    console.log("    dev:cli listen");

    console.log("\n- Boolean 'yes' can take any of the following forms (any other will be considered no/false): 1, true, yes, on");
    console.log("- Following ENV vars will override 'conf.json': ADAPTER_PATH, ADAPTER_BAUDRATE, ADAPTER_RTSCTS, ADAPTER_MODE, LOG_LEVEL");
    console.log("- The module must already be in API mode (AP=1) or API escaped mode (AP=2), matching 'operatingMode'");

    if (shouldThrow) {
        throw new Error("Invalid parameters");
    }
}

async function runATCommand(driver: XBeeDriver, command: string, parameterHex: string | undefined): Promise<void> {
    const parameter = parameterHex === undefined ? undefined : Buffer.from(parameterHex, "hex");
    const value = await driver.sendATCommand(command, parameter);

    console.log(`${command.toUpperCase()} => ${value === undefined ? "OK" : bufferToHexString(value)}`);
}

async function runSend(driver: XBeeDriver, address64: bigint, text: string): Promise<void> {
    const status = await driver.sendData(address64, XBee16BitAddress.UNKNOWN, Buffer.from(text, "utf8"));

    console.log(`Delivered to ${address64ToString(address64)} after ${status.retryCount} retries`);
}

function listen(driver: XBeeDriver): void {
    driver.reader.packetReceived.add((packet) => {
        console.log(xbeePacketToPrettyString(packet));
    });
    driver.reader.modemStatusReceived.add((status) => {
        console.log(`Modem status: ${xbeeModemStatusToDisplayString(status)}`);
    });

    console.log("Listening, CTRL+C to stop");
}

function main(): void {
    const confPath = join(dirname(fileURLToPath(import.meta.url)), "conf.json");
    const conf = JSON.parse(readFileSync(confPath, "utf8")) as Conf;

    if (process.env.ADAPTER_PATH) {
        conf.adapter.path = process.env.ADAPTER_PATH;
    }

    if (process.env.ADAPTER_BAUDRATE) {
        conf.adapter.baudRate = Number.parseInt(process.env.ADAPTER_BAUDRATE, 10);
    }

    if (process.env.ADAPTER_RTSCTS) {
        conf.adapter.rtscts = argToBool(process.env.ADAPTER_RTSCTS);
    }

    if (process.env.ADAPTER_MODE) {
        conf.operatingMode = parseOperatingMode(process.env.ADAPTER_MODE);
    }

    if (process.env.LOG_LEVEL && isLogLevel(process.env.LOG_LEVEL)) {
        conf.logLevel = process.env.LOG_LEVEL;
    }

    console.log("Starting with conf:", JSON.stringify(conf));

    const command = process.argv[2];

    if (command === "help") {
        // after above log to be able to see conf without side-effect
        printHelp(false);
        return;
    }

    if (!isCommand(command)) {
        printHelp(true);
        return;
    }

    if (!isApiOperatingMode(conf.operatingMode)) {
        throw new Error(`Invalid operating mode in ${confPath}`);
    }

    setLogLevel(conf.logLevel);

    const driver = new XBeeDriver(createAdapterConnection(conf.adapter, conf.operatingMode), {
        operatingMode: conf.operatingMode,
        receiveTimeout: conf.receiveTimeout,
    });

    const onStop = (): void => {
        driver.close().catch((error: unknown) => {
            console.error(error);
        });
    };

    process.on("SIGINT", onStop);
    process.on("SIGTERM", onStop);

    const run = async (): Promise<void> => {
        switch (command) {
            case "at": {
                if (process.argv.length !== 4 && process.argv.length !== 5) {
                    printHelp(true);
                }

                await driver.open();

                try {
                    await runATCommand(driver, process.argv[3], process.argv[4]);
                } finally {
                    await driver.close();
                }

                break;
            }
            case "send": {
                if (process.argv.length !== 5) {
                    printHelp(true);
                }

                const address64 = parseAddress64(process.argv[3]);

                await driver.open();

                try {
                    await runSend(driver, address64, process.argv[4]);
                } finally {
                    await driver.close();
                }

                break;
            }
            case "listen": {
                await driver.open();

                console.log(`Driver open in ${XBEE_OPERATING_MODE_NAMES[driver.operatingMode]} mode`);

                listen(driver);
                break;
            }
        }
    };

    run().catch((error: unknown) => {
        console.error(error);

        process.exitCode = 1;
    });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main();
}
