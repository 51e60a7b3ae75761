import superjson from 'superjson';
import { QuarryError } from '../errors';

export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

export class SerializationError extends QuarryError { }

// Step inputs and outputs are persisted through superjson so Dates, Maps, Sets
// and bigints survive the round trip through the run store.
export function serialize(value: unknown, maxBytes: number = DEFAULT_MAX_PAYLOAD_BYTES): string | null {
    if (value === undefined) return null;

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > maxBytes) {
        throw new SerializationError(
            `Payload of ${(size / 1024).toFixed(1)}KB exceeds the ${(maxBytes / 1024).toFixed(1)}KB limit`,
        );
    }
    return stringified;
}

export function deserialize<T = unknown>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Deep copy through the same encoding the run store uses, so a step sees
 * exactly what a later reader of the run history would see.
 */
export function clonePayload<T>(value: T): T {
    if (value === undefined) return value;
    try {
        return superjson.parse<T>(superjson.stringify(value));
    } catch (err) {
        throw new SerializationError(`Failed to copy payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}
