import { Metadata, sendUnaryData } from '@grpc/grpc-js';
import { TaskDto, TaskRunArtifactDto, TaskRunDto, UserDto, UserRole } from '@task-admin/contracts';
import { TaskEntity } from '../db/task.entity';
import { TaskService } from '../services/task.service';
import { IdentityGateway } from '../identity/identity.gateway';
import { DeadlineExceededError, ForbiddenError, InvalidDefinitionError, RequestCancelledError } from '../errors';
import { contextFromMetadata } from './context';
import { toServiceError } from './status';

const TAG = '[admin-service]';

// Longest delay setTimeout accepts
const MAX_TIMER_MS = 2 ** 31 - 1;

/** The part of a grpc-js unary call the handlers read */
export interface UnaryCall<Req> {
    request: Req;
    metadata: Metadata;
    getDeadline(): Date | number;
    on(event: 'cancelled', listener: () => void): unknown;
}

interface Empty { }

interface GetTaskRequest {
    task_id: string;
}

interface ListTasksByUserRequest {
    user_id: string;
}

interface CreateTaskRequest {
    name: string;
    definition: string;
}

interface UpdateTaskRequest extends CreateTaskRequest {
    task_id: string;
}

interface ListTaskRunArtifactsRequest {
    task_run_id: string;
    page: number;
    page_size: number;
}

interface ListUsersRequest {
    page: number;
    page_size: number;
    all: boolean;
}

interface GetUserRequest {
    user_id: string;
}

interface UserRoleRequest {
    user_id: string;
    role: string;
}

export interface TaskMessage {
    id: string;
    name: string;
    definition: string;
    status: string;
    owner: string;
    created_at: string;
    updated_at: string;
    deleted_at: string;
}

export interface TaskRecordMessage {
    id: string;
    name: string;
    definition: string;
    owner: string;
    created_at: string;
    updated_at: string;
}

export interface TaskRunMessage {
    id: string;
    task_id: string;
    status: string;
    start_time: string;
    end_time: string;
    error_message: string;
}

export interface TaskRunArtifactMessage {
    execution_instance_id: string;
    execution_task_id: string;
    artifact_id: string;
    artifact_type: string;
    url: string;
    content_type: string;
    content_length: string; // int64, sent as a string
    status_code: number;
    additional_data: Record<string, string>;
    created_at: string;
}

export interface UserMessage {
    id: string;
    email: string;
    name: string;
    picture: string;
    given_name: string;
    family_name: string;
    username: string;
    nickname: string;
    screen_name: string;
    connection: string;
    location: string;
    last_login: string;
    roles: string[];
}

const ROLE_VALUES: ReadonlySet<string> = new Set(Object.values(UserRole));

function isUserRole(value: string): value is UserRole {
    return ROLE_VALUES.has(value);
}

// Anything that is not a known role name becomes UNKNOWN, which is never assignable
export function parseRole(value: string): UserRole {
    return isUserRole(value) ? value : UserRole.UNKNOWN;
}

function iso(date: Date | null): string {
    return date ? date.toISOString() : '';
}

function parseDefinition(text: string): unknown {
    if (text.trim() === '') return {};
    try {
        const definition: unknown = JSON.parse(text);
        return definition;
    } catch (err) {
        throw new InvalidDefinitionError(err instanceof Error ? err.message : String(err));
    }
}

export function toTaskMessage(dto: TaskDto): TaskMessage {
    return {
        id: dto.id,
        name: dto.name,
        definition: dto.definition,
        status: dto.status,
        owner: dto.owner,
        created_at: iso(dto.createdAt),
        updated_at: iso(dto.updatedAt),
        deleted_at: iso(dto.deletedAt),
    };
}

export function toTaskRecordMessage(task: TaskEntity): TaskRecordMessage {
    return {
        id: String(task.id),
        name: task.name,
        definition: JSON.stringify(task.definition ?? null),
        owner: task.owner,
        created_at: iso(task.created_at),
        updated_at: iso(task.updated_at),
    };
}

export function toTaskRunMessage(dto: TaskRunDto): TaskRunMessage {
    return {
        id: dto.id,
        task_id: dto.taskId,
        status: dto.status,
        start_time: iso(dto.startTime),
        end_time: iso(dto.endTime),
        error_message: dto.errorMessage ?? '',
    };
}

export function toArtifactMessage(dto: TaskRunArtifactDto): TaskRunArtifactMessage {
    return {
        execution_instance_id: dto.executionInstanceId,
        execution_task_id: dto.executionTaskId,
        artifact_id: dto.artifactId,
        artifact_type: dto.artifactType,
        url: dto.url,
        content_type: dto.contentType,
        content_length: dto.contentLength,
        status_code: dto.statusCode,
        additional_data: dto.additionalData,
        created_at: iso(dto.createdAt),
    };
}

export function toUserMessage(user: UserDto): UserMessage {
    return {
        id: user.id ?? '',
        email: user.email ?? '',
        name: user.name ?? '',
        picture: user.picture ?? '',
        given_name: user.givenName ?? '',
        family_name: user.familyName ?? '',
        username: user.username ?? '',
        nickname: user.nickname ?? '',
        screen_name: user.screenName ?? '',
        connection: user.connection ?? '',
        location: user.location ?? '',
        last_login: user.lastLogin ?? '',
        roles: user.roles ?? [],
    };
}

// proto3 strings default to "", which here means "leave unchanged"
export function fromUserMessage(message: UserMessage): UserDto {
    const optional = (value: string) => (value === '' ? undefined : value);
    return {
        id: optional(message.id),
        email: optional(message.email),
        name: optional(message.name),
        picture: optional(message.picture),
        givenName: optional(message.given_name),
        familyName: optional(message.family_name),
        username: optional(message.username),
        nickname: optional(message.nickname),
    };
}

/**
 * Aborts once the client cancels the call or its deadline passes, so provider
 * sweeps stop before their next page request.
 */
function watchCall(call: UnaryCall<unknown>): { signal: AbortSignal; release(): void } {
    const controller = new AbortController();
    call.on('cancelled', () => controller.abort(new RequestCancelledError()));

    const deadline = call.getDeadline();
    const remaining = (deadline instanceof Date ? deadline.getTime() : deadline) - Date.now();
    let timer: NodeJS.Timeout | undefined;
    if (remaining <= 0) {
        controller.abort(new DeadlineExceededError());
    } else if (remaining <= MAX_TIMER_MS) {
        timer = setTimeout(() => controller.abort(new DeadlineExceededError()), remaining);
    }

    return { signal: controller.signal, release: () => clearTimeout(timer) };
}

/**
 * gRPC implementation of admin.AdminService.
 * Task reads are open to any authenticated caller; user management needs ADMIN.
 * Domain errors are translated to gRPC status codes here and nowhere else.
 */
export class AdminServiceImpl {
    constructor(
        private readonly tasks: TaskService,
        private readonly identity: IdentityGateway,
    ) { }

    async getTask(call: UnaryCall<GetTaskRequest>, callback: sendUnaryData<TaskMessage>) {
        await this.respond('getTask', call, callback, async (signal) => {
            await this.caller(call, signal);
            return toTaskMessage(await this.tasks.getTaskById(call.request.task_id));
        });
    }

    async listTasksByUser(call: UnaryCall<ListTasksByUserRequest>, callback: sendUnaryData<{ tasks: TaskMessage[] }>) {
        await this.respond('listTasksByUser', call, callback, async (signal) => {
            const caller = await this.caller(call, signal);
            const userId = call.request.user_id || caller.id || '';
            const tasks = await this.tasks.getTasksByUser(userId);
            return { tasks: tasks.map(toTaskMessage) };
        });
    }

    async createTask(call: UnaryCall<CreateTaskRequest>, callback: sendUnaryData<TaskRecordMessage>) {
        await this.respond('createTask', call, callback, async (signal) => {
            const caller = await this.caller(call, signal);
            const definition = parseDefinition(call.request.definition);
            const task = await this.tasks.createTask({ name: call.request.name, definition }, caller.id ?? '');
            return toTaskRecordMessage(task);
        });
    }

    async updateTask(call: UnaryCall<UpdateTaskRequest>, callback: sendUnaryData<TaskRecordMessage>) {
        await this.respond('updateTask', call, callback, async (signal) => {
            const caller = await this.caller(call, signal);
            const definition = parseDefinition(call.request.definition);
            const task = await this.tasks.updateTask(
                { name: call.request.name, definition },
                caller.id ?? '',
                call.request.task_id,
            );
            return toTaskRecordMessage(task);
        });
    }

    async deleteTask(call: UnaryCall<GetTaskRequest>, callback: sendUnaryData<Empty>) {
        await this.respond('deleteTask', call, callback, async (signal) => {
            const caller = await this.caller(call, signal);
            await this.tasks.deleteTask(call.request.task_id, caller.id ?? '');
            return {};
        });
    }

    async listTaskRuns(call: UnaryCall<GetTaskRequest>, callback: sendUnaryData<{ runs: TaskRunMessage[] }>) {
        await this.respond('listTaskRuns', call, callback, async (signal) => {
            await this.caller(call, signal);
            const runs = await this.tasks.listTaskRuns(call.request.task_id);
            return { runs: runs.map(toTaskRunMessage) };
        });
    }

    async listTaskRunArtifacts(
        call: UnaryCall<ListTaskRunArtifactsRequest>,
        callback: sendUnaryData<{ artifacts: TaskRunArtifactMessage[] }>,
    ) {
        await this.respond('listTaskRunArtifacts', call, callback, async (signal) => {
            await this.caller(call, signal);
            const { task_run_id, page, page_size } = call.request;
            const artifacts = await this.tasks.getTaskRunArtifacts(task_run_id, page, page_size);
            return { artifacts: artifacts.map(toArtifactMessage) };
        });
    }

    async getCurrentUser(call: UnaryCall<Empty>, callback: sendUnaryData<UserMessage>) {
        await this.respond('getCurrentUser', call, callback, async (signal) => toUserMessage(await this.caller(call, signal)));
    }

    async listUsers(call: UnaryCall<ListUsersRequest>, callback: sendUnaryData<{ users: UserMessage[]; total: string }>) {
        await this.respond('listUsers', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            const { page, page_size, all } = call.request;
            if (all) {
                const users = await this.identity.listAllUsers(signal);
                return { users: users.map(toUserMessage), total: String(users.length) };
            }
            const res = await this.identity.listUsers(page, page_size);
            return { users: res.users.map(toUserMessage), total: String(res.total) };
        });
    }

    async getUser(call: UnaryCall<GetUserRequest>, callback: sendUnaryData<UserMessage>) {
        await this.respond('getUser', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            return toUserMessage(await this.identity.getUser(call.request.user_id, signal));
        });
    }

    async updateUser(call: UnaryCall<UserMessage>, callback: sendUnaryData<Empty>) {
        await this.respond('updateUser', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            await this.identity.updateUser(fromUserMessage(call.request));
            return {};
        });
    }

    async deleteUser(call: UnaryCall<GetUserRequest>, callback: sendUnaryData<Empty>) {
        await this.respond('deleteUser', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            await this.identity.deleteUser(call.request.user_id);
            return {};
        });
    }

    async listUserRoles(call: UnaryCall<GetUserRequest>, callback: sendUnaryData<{ roles: string[] }>) {
        await this.respond('listUserRoles', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            return { roles: await this.identity.listUserRoles(call.request.user_id, signal) };
        });
    }

    async assignUserRole(call: UnaryCall<UserRoleRequest>, callback: sendUnaryData<Empty>) {
        await this.respond('assignUserRole', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            await this.identity.assignUserRole(call.request.user_id, parseRole(call.request.role));
            return {};
        });
    }

    async removeUserRole(call: UnaryCall<UserRoleRequest>, callback: sendUnaryData<Empty>) {
        await this.respond('removeUserRole', call, callback, async (signal) => {
            await this.requireAdmin(call, signal);
            await this.identity.removeUserRole(call.request.user_id, parseRole(call.request.role));
            return {};
        });
    }

    private caller(call: UnaryCall<unknown>, signal: AbortSignal): Promise<UserDto> {
        return this.identity.getUserFromContext(contextFromMetadata(call.metadata), signal);
    }

    private async requireAdmin(call: UnaryCall<unknown>, signal: AbortSignal): Promise<UserDto> {
        const caller = await this.caller(call, signal);
        if (!caller.roles?.includes(UserRole.ADMIN)) {
            throw new ForbiddenError(UserRole.ADMIN);
        }
        return caller;
    }

    private async respond<Res>(
        name: string,
        call: UnaryCall<unknown>,
        callback: sendUnaryData<Res>,
        fn: (signal: AbortSignal) => Promise<Res>,
    ): Promise<void> {
        const { signal, release } = watchCall(call);
        let response: Res;
        try {
            response = await fn(signal);
        } catch (error) {
            console.error(`${TAG} ${name} error:`, error);
            callback(toServiceError(error));
            return;
        } finally {
            release();
        }
        callback(null, response);
    }
}
