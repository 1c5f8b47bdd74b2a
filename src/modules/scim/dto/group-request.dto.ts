import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';

export class MemberRefDto {
  @IsString()
  value!: string;
}

/**
 * Group create / replace body. `null` values are accepted and treated as
 * absent: a replace never clears anything.
 */
export class GroupRequestDto {
  @IsOptional()
  @IsArray()
  schemas?: string[] | null;

  @IsString()
  @IsNotEmpty()
  displayName!: string;

  @IsOptional()
  @IsString()
  externalId?: string | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MemberRefDto)
  members?: MemberRefDto[] | null;
}
