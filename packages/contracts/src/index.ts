// public api for @task-admin/contracts
// usage:
//   import { TaskDto, TaskRunStatus, serialize, deserialize, isTaskDto } from '@task-admin/contracts';
//   const dto = deserialize(raw, isTaskDto);

export {
    TaskRunStatus,
    UserRole,
    ASSIGNABLE_ROLES,
} from './types';

export type {
    AssignableRole,
    TaskDto,
    TaskRunDto,
    TaskRunArtifactDto,
    UserDto,
    UserPage,
} from './types';

export { isTaskDto, isTaskRunStatus } from './guards';

export { serialize, deserialize, SerializationError } from './utils/serialization';
export type { Guard } from './utils/serialization';
