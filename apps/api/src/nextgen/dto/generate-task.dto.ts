import { IsNotEmpty, IsObject, IsString } from 'class-validator';
import { JsonObject, TaskRequestDto } from '@nextgen/shared';

/**
 * Validated body of POST /generate.
 */
export class GenerateTaskDto implements TaskRequestDto {
  @IsString()
  @IsNotEmpty()
  task_name!: string;

  @IsObject()
  payload!: JsonObject;
}
