/**
 * Byte-level read side of a transport, consumed one logical byte at a time by the frame parser.
 */
export interface XBeeByteSource {
    /** Number of bytes ready to be read without waiting */
    readonly available: number;
    /** True once the underlying transport is gone, no more data will arrive */
    readonly isClosed: boolean;
    /**
     * @returns next byte, undefined if none is available
     */
    readByte(): number | undefined;
    /**
     * Resolves once data is available (true), or on timeout, `wake` or close (false when still empty).
     * @param timeout ms, wait indefinitely when undefined
     */
    waitForData(timeout?: number): Promise<boolean>;
}

/**
 * Transport as seen by the driver. Implementations: `StreamConnection`, test doubles.
 */
export interface XBeeConnection extends XBeeByteSource {
    readonly isOpen: boolean;
    open(): Promise<void>;
    close(): Promise<void>;
    write(data: Buffer): Promise<void>;
    /** Release any pending `waitForData` */
    wake(): void;
}
