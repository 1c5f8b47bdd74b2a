import { IsBoolean, IsObject, IsOptional, IsString } from 'class-validator';

/** `PUT /admin/logs/config` body; levels are names (`TRACE`…`OFF`) or 0-6. */
export class LogConfigUpdateDto {
  @IsOptional()
  @IsString()
  globalLevel?: string;

  @IsOptional()
  @IsObject()
  categoryLevels?: Record<string, string>;

  @IsOptional()
  @IsBoolean()
  includePayloads?: boolean;

  @IsOptional()
  @IsBoolean()
  includeStackTraces?: boolean;
}
