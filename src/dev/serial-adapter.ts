import { Socket } from "node:net";
import type { Duplex } from "node:stream";
import { SerialPort } from "serialport";
import { StreamConnection } from "../drivers/stream-connection.js";
import { XBeeOperatingMode } from "../xbee/consts.js";
import { logger } from "../utils/logger.js";

const NS = "serial-adapter";

export function isTcpPath(path: string): boolean {
    // tcp path must be: tcp://<host>:<port>
    return /^(?:tcp:\/\/)[\w.-]+[:][\d]+$/.test(path);
}

/**
 * Example:
 * ```ts
 * {
 *     path: '/dev/ttyUSB0',
 *     baudRate: 9600,
 *     rtscts: false,
 * }
 * ```
 */
export type PortOptions = {
    path: string;
    //---- serial only
    baudRate?: number;
    rtscts?: boolean;
};

async function openSocket(path: string): Promise<Duplex> {
    const pathUrl = new URL(path);
    const hostname = pathUrl.hostname;
    const port = Number.parseInt(pathUrl.port, 10);

    logger.debug(() => `Opening TCP socket with ${hostname}:${port}`, NS);

    const socket = new Socket();

    socket.setNoDelay(true);
    socket.setKeepAlive(true, 15000);

    return await new Promise<Duplex>((resolve, reject): void => {
        const openError = (error: Error): void => {
            socket.destroy();
            reject(error);
        };

        socket.once("error", openError);
        socket.once("ready", (): void => {
            logger.info("Socket ready", NS);
            socket.removeListener("error", openError);
            resolve(socket);
        });

        socket.connect(port, hostname);
    });
}

async function openSerialPort(portOptions: PortOptions, operatingMode: XBeeOperatingMode): Promise<Duplex> {
    const rtscts = portOptions.rtscts ?? false;
    // XON/XOFF can only be told apart from data when escaped
    const softwareFlowControl = !rtscts && operatingMode === XBeeOperatingMode.API_ESCAPE;
    const serialPort = new SerialPort({
        path: portOptions.path,
        baudRate: portOptions.baudRate ?? 9600,
        rtscts,
        autoOpen: false,
        parity: "none",
        stopBits: 1,
        xon: softwareFlowControl,
        xoff: softwareFlowControl,
    });

    logger.debug(
        () => `Opening serial port with [path=${portOptions.path} baudRate=${serialPort.baudRate} rtscts=${rtscts} xon/xoff=${softwareFlowControl}]`,
        NS,
    );

    await new Promise<void>((resolve, reject): void => {
        serialPort.open((error) => (error ? reject(error) : resolve()));
    });

    // drop whatever the module sent before we were listening
    await new Promise<void>((resolve, reject): void => {
        serialPort.flush((error) => (error ? reject(error) : resolve()));
    });

    logger.info("Serial port opened", NS);

    return serialPort;
}

async function closeSerialPort(serialPort: SerialPort): Promise<void> {
    if (!serialPort.isOpen) {
        return;
    }

    await new Promise<void>((resolve, reject): void => {
        serialPort.drain((error) => (error ? reject(error) : resolve()));
    });

    await new Promise<void>((resolve, reject): void => {
        serialPort.close((error) => (error ? reject(error) : resolve()));
    });
}

/**
 * Connection to an XBee module on a local serial port, or behind a `tcp://host:port` serial bridge.
 */
export function createAdapterConnection(portOptions: PortOptions, operatingMode: XBeeOperatingMode): StreamConnection {
    if (isTcpPath(portOptions.path)) {
        return new StreamConnection({ open: async () => await openSocket(portOptions.path) });
    }

    return new StreamConnection({
        open: async () => await openSerialPort(portOptions, operatingMode),
        close: async (stream) => {
            if (stream instanceof SerialPort) {
                await closeSerialPort(stream);
            } else {
                stream.destroy();
            }
        },
    });
}
