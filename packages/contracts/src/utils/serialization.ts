import superjson from 'superjson';

// Cached DTOs are small; anything bigger is a bug upstream, not something to store.
const MAX_PAYLOAD_SIZE = 512 * 1024;

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export type Guard<T> = (value: unknown) => value is T;

/**
 * Encodes a DTO for a string-valued store. superjson keeps Date fields as
 * Dates, so a decoded DTO compares equal to the one that was stored.
 */
export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);
        const size = Buffer.byteLength(stringified);

        if (size > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 512KB. Current size: ${(size / 1024).toFixed(2)}KB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Decodes a stored value and checks its shape. Empty input decodes to
 * undefined; malformed or wrongly-shaped input throws.
 */
export function deserialize<T>(value: string | null | undefined, guard: Guard<T>): T | undefined {
    if (!value || value.trim() === '') return undefined;

    let parsed: unknown;
    try {
        parsed = superjson.parse<unknown>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!guard(parsed)) {
        throw new SerializationError('Deserialized value does not have the expected shape');
    }
    return parsed;
}
