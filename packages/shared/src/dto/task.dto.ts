// Task DTOs (packages/shared/src/dto/task.dto.ts)
// Endpoint: POST /api/nextgen/generate

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface TaskRequestDto {
  /**
   * Name of the generation task to run. Non-empty.
   */
  task_name: string;

  /**
   * Task input. Shape depends on the task and is forwarded as-is.
   */
  payload: JsonObject;
}

/**
 * Whatever the provider produced for the task. Returned to the client unchanged.
 */
export type TaskResultDto = JsonObject;
