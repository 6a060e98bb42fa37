import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import path from "path";
import { HealthService } from "./health.service";
import { AdminServiceImpl } from "./admin.service";

const protoOptions = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

function protoPath(file: string): string {
  return path.join(path.dirname(require.resolve("@task-admin/proto/package.json")), file);
}

// Walks a loaded package definition, e.g. ["admin", "AdminService"]
export function lookupService(root: grpc.GrpcObject, name: string[]): grpc.ServiceDefinition {
  let node: grpc.GrpcObject[string] = root;
  for (const part of name) {
    if (typeof node === "function" || "format" in node) {
      throw new Error(`${name.join(".")} not found in proto definition`);
    }
    const next: grpc.GrpcObject[string] | undefined = node[part];
    if (next === undefined) {
      throw new Error(`${name.join(".")} not found in proto definition`);
    }
    node = next;
  }
  if (typeof node !== "function") {
    throw new Error(`${name.join(".")} is not a service`);
  }
  return node.service;
}

export function createGrpcServer(admin: AdminServiceImpl, health: HealthService): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthProto = grpc.loadPackageDefinition(
    protoLoader.loadSync(protoPath("health.service.proto"), protoOptions),
  );
  const adminProto = grpc.loadPackageDefinition(
    protoLoader.loadSync(protoPath("admin.service.proto"), protoOptions),
  );

  server.addService(lookupService(healthProto, ["grpc", "health", "v1", "Health"]), {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  server.addService(lookupService(adminProto, ["admin", "AdminService"]), {
    getTask: admin.getTask.bind(admin),
    listTasksByUser: admin.listTasksByUser.bind(admin),
    createTask: admin.createTask.bind(admin),
    updateTask: admin.updateTask.bind(admin),
    deleteTask: admin.deleteTask.bind(admin),
    listTaskRuns: admin.listTaskRuns.bind(admin),
    listTaskRunArtifacts: admin.listTaskRunArtifacts.bind(admin),
    getCurrentUser: admin.getCurrentUser.bind(admin),
    listUsers: admin.listUsers.bind(admin),
    getUser: admin.getUser.bind(admin),
    updateUser: admin.updateUser.bind(admin),
    deleteUser: admin.deleteUser.bind(admin),
    listUserRoles: admin.listUserRoles.bind(admin),
    assignUserRole: admin.assignUserRole.bind(admin),
    removeUserRole: admin.removeUserRole.bind(admin),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50052,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[admin-api] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}
