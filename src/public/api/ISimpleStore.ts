/**
 * A simple key-value in-memory storage. Mostly used to store configuration options.
 *
 * Keys are paths separated by a colon, e.g. `runner:max-parallel`.
 */
export interface ISimpleStore {

    /**
     * Checks if a value exists.
     */
    exists(key: string): boolean;

    /**
     * Gets a value from the key.
     */
    get(key: string): unknown;

    /**
     * Returns an array of values given by the key. If the value is not an array, returns an array with a single item
     * of the value.
     */
    getAsArray(key: string): Array<unknown>;

    /**
     * Sets the key and value.
     */
    set(key: string, value: unknown): void;
}
