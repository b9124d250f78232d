import { logger } from "./logger.js";

export type Listener<T> = (value: T) => void;

/**
 * Observers invoked synchronously, in registration order.
 * A throwing listener is logged, the others still run.
 */
export class ListenerList<T> {
    readonly #name: string;
    readonly #namespace: string;
    #listeners: Listener<T>[];

    public constructor(name: string, namespace: string) {
        this.#name = name;
        this.#namespace = namespace;
        this.#listeners = [];
    }

    get size(): number {
        return this.#listeners.length;
    }

    public add(listener: Listener<T>): void {
        this.#listeners.push(listener);
    }

    /**
     * @returns false if the listener was not registered
     */
    public remove(listener: Listener<T>): boolean {
        const index = this.#listeners.indexOf(listener);

        if (index === -1) {
            return false;
        }

        this.#listeners.splice(index, 1);

        return true;
    }

    public clear(): void {
        this.#listeners = [];
    }

    public emit(value: T): void {
        // copy: a listener may remove itself
        for (const listener of [...this.#listeners]) {
            try {
                listener(value);
            } catch (error) {
                logger.error(`Error in ${this.#name} listener: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`, this.#namespace);
            }
        }
    }
}
