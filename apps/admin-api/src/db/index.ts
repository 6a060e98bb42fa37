/**
 * Connection management for Postgres, Redis and Cassandra.
 * Clients are created by the entrypoint and handed to repositories, so tests
 * can swap any of them for an in-process stand-in.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';
import { Client } from 'cassandra-driver';
import { AppConfig } from '../config';

/**
 * Postgres connection pool:
 * - max: 20 connections (admin traffic is light)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(config: Pick<AppConfig, 'databaseUrl'>): Pool {
    return new Pool({
        connectionString: config.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client backing the task cache */
export function createRedis(config: Pick<AppConfig, 'redisUrl'>): Redis {
    return new Redis(config.redisUrl, { maxRetriesPerRequest: 1 });
}

/** Cassandra client for the task run artifact table */
export function createCassandraClient(config: Pick<AppConfig, 'cassandra'>): Client {
    return new Client({
        contactPoints: config.cassandra.contactPoints,
        localDataCenter: config.cassandra.localDataCenter,
        keyspace: config.cassandra.keyspace,
    });
}
