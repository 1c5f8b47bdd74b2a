import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';

export class SeedGroupDto {
  @IsString()
  @IsNotEmpty()
  displayName!: string;

  @IsOptional()
  @IsString()
  externalId?: string;

  /** userNames; names without a seeded User are skipped */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  members?: string[];
}

/**
 * `POST /admin/seed` body, groups part. The `users` list is bound separately
 * by the controller: its items are free-form attribute maps in the current
 * dialect's shape, and a declared array property would have implicit
 * conversion rewrite every item.
 */
export class SeedRequestDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedGroupDto)
  groups?: SeedGroupDto[];
}
