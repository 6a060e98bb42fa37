import { AssignableRole, UserRole } from '@task-admin/contracts';

export interface Auth0Config {
    domain: string;
    clientId: string;
    clientSecret: string;
}

export interface AppConfig {
    port: number;
    databaseUrl: string;
    redisUrl: string;
    cassandra: {
        contactPoints: string[];
        localDataCenter: string;
        keyspace: string;
    };
    taskCacheTtlSeconds: number;
    maxArtifactPageSize: number;
    auth0: Auth0Config;
    roleIds: Record<AssignableRole, string>;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
    const value = env[key];
    if (!value || value.trim() === '') {
        throw new ConfigError(`${key} is not set`);
    }
    return value.trim();
}

function positiveInt(env: Env, key: string, fallback: string): number {
    const value = parseInt(env[key] || fallback, 10);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${env[key]}"`);
    }
    return value;
}

// Central configuration, read once at startup. Callers pass process.env
// after dotenv has loaded it.
export function loadConfig(env: Env): AppConfig {
    return {
        port: positiveInt(env, 'PORT', '50052'),
        databaseUrl: required(env, 'DATABASE_URL'),
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        cassandra: {
            contactPoints: (env.CASSANDRA_CONTACT_POINTS || 'localhost')
                .split(',')
                .map((p) => p.trim())
                .filter((p) => p.length > 0),
            localDataCenter: env.CASSANDRA_LOCAL_DC || 'datacenter1',
            keyspace: env.CASSANDRA_KEYSPACE || 'admin',
        },
        taskCacheTtlSeconds: positiveInt(env, 'TASK_CACHE_TTL_SECONDS', '300'),
        maxArtifactPageSize: positiveInt(env, 'MAX_ARTIFACT_PAGE_SIZE', '100'),
        auth0: {
            domain: required(env, 'AUTH0_DOMAIN'),
            clientId: required(env, 'AUTH0_CLIENT_ID'),
            clientSecret: required(env, 'AUTH0_CLIENT_SECRET'),
        },
        roleIds: {
            [UserRole.USER]: required(env, 'AUTH0_ROLE_ID_USER'),
            [UserRole.MEMBER]: required(env, 'AUTH0_ROLE_ID_MEMBER'),
            [UserRole.ADMIN]: required(env, 'AUTH0_ROLE_ID_ADMIN'),
        },
    };
}
