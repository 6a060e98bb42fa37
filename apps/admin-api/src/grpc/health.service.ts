import { ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';
import { UnaryCall } from './admin.service';

interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: 'SERVING' | 'NOT_SERVING';
}

/** A backing store the service cannot answer without */
export interface Dependency {
    name: string;
    ping(): Promise<unknown>;
}

/**
 * Standard gRPC health check service implementation.
 * Reports SERVING only while every dependency answers.
 */
export class HealthService {
    constructor(private readonly dependencies: Dependency[]) { }

    async check(
        call: Pick<UnaryCall<HealthCheckRequest>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: await this.probe() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: await this.probe() });
        call.end();
    }

    private async probe(): Promise<HealthCheckResponse['status']> {
        for (const dependency of this.dependencies) {
            try {
                await dependency.ping();
            } catch (error) {
                console.error(`Health check failed (${dependency.name}):`, error);
                return 'NOT_SERVING';
            }
        }
        return 'SERVING';
    }
}
