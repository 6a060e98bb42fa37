import "dotenv/config";
import { loadConfig } from "./config";
import { createCassandraClient, createPool, createRedis } from "./db";
import { TaskRepository } from "./repositories/task.repository";
import { TaskRunRepository } from "./repositories/task-run.repository";
import { CassandraArtifactRepository } from "./repositories/artifact.repository";
import { RedisTaskCache } from "./cache/task.cache";
import { TaskService } from "./services/task.service";
import { RoleMapper } from "./identity/role-mapper";
import { IdentityGateway } from "./identity/identity.gateway";
import { Auth0IdentityProvider, createManagementClient } from "./identity/auth0.provider";
import { AdminServiceImpl } from "./grpc/admin.service";
import { HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer } from "./grpc/server";

const TAG = "[admin-api]";

// Central Configuration
const config = loadConfig(process.env);

// Wiring
const pool = createPool(config);
const redis = createRedis(config);
const cassandra = createCassandraClient(config);
const management = createManagementClient(config.auth0);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));
redis.on("error", (err) => console.error(`${TAG} redis error:`, err));

const taskService = new TaskService(
  new TaskRepository(pool),
  new TaskRunRepository(pool),
  new CassandraArtifactRepository(cassandra),
  new RedisTaskCache(redis, config.taskCacheTtlSeconds),
  { maxArtifactPageSize: config.maxArtifactPageSize },
);

const identity = new IdentityGateway(
  new Auth0IdentityProvider(management.users),
  RoleMapper.fromRoleIds(config.roleIds),
);

const health = new HealthService([
  { name: "postgres", ping: () => pool.query("SELECT 1") },
  { name: "redis", ping: () => redis.ping() },
  { name: "cassandra", ping: () => cassandra.execute("SELECT release_version FROM system.local") },
]);

const server = createGrpcServer(new AdminServiceImpl(taskService, identity), health);

async function main() {
  console.log(`${TAG} starting...`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  await cassandra.connect();
  console.log(`${TAG} cassandra connected`);

  await startGrpcServer(server, config.port);

  console.log(`${TAG} ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  await new Promise<void>((resolve) => server.tryShutdown(() => resolve()));
  await pool.end();
  await redis.quit();
  await cassandra.shutdown();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
