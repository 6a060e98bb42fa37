import { Metadata } from '@grpc/grpc-js';
import { RequestContext } from '../identity/types';

// The edge proxy verifies the bearer token and forwards its payload,
// base64url-encoded JSON, in this header.
export const CLAIMS_HEADER = 'x-jwt-payload';

export function contextFromMetadata(metadata: Metadata, header: string = CLAIMS_HEADER): RequestContext {
    const [value] = metadata.get(header);
    if (value === undefined) return {};

    const encoded = typeof value === 'string' ? value : value.toString('utf-8');
    try {
        const claims: unknown = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf-8'));
        return { claims };
    } catch {
        // Undecodable payloads are handed on as-is and rejected as invalid claims
        return { claims: encoded };
    }
}
