import { BadRequestException, Body, Controller, Delete, Get, Param, Post, Put, Query } from '@nestjs/common';

import { DirectoryError } from '../../domain/errors/directory-error';
import { isPlainObject, parseUserCreatePayload } from '../../domain/models/user-attributes';
import type { UserCreateInput } from '../../domain/models/user.model';
import type { SeedGroupInput } from '../../domain/models/group.model';
import type { PolicyState } from '../../domain/policy/policy-resolver';
import type { StoreCounts } from '../../domain/repositories/resource-store.interface';
import { DirectoryFacade, type DirectoryStatus } from '../directory/directory.facade';
import { SeedRequestDto } from './dto/seed-request.dto';

export interface SeedResponse extends StoreCounts {
  message: string;
}

export interface PolicyChangeResponse {
  message: string;
  config: PolicyState;
}

function parseSeedUsers(raw: unknown): UserCreateInput[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new DirectoryError('InvalidValue', "Field 'users' must be a list.");
  }
  return raw.map((item: unknown, index) => {
    if (!isPlainObject(item)) {
      throw new DirectoryError('InvalidValue', `Seed user at index ${index} must be an object.`);
    }
    return parseUserCreatePayload(item, 'v2');
  });
}

/** Strictly `true` or `false`, case-insensitive; anything else is undefined. */
function parseOverrideValue(raw: string | undefined): boolean | undefined {
  const lower = raw?.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return undefined;
}

/**
 * Administrative routes: test data and the runtime verb policy.
 * Routes: /admin/*
 */
@Controller('admin')
export class AdminController {
  constructor(private readonly directory: DirectoryFacade) {}

  /** Replaces the whole directory; users are read in the current dialect's shape. */
  @Post('seed')
  async seed(@Body() dto: SeedRequestDto, @Body('users') rawUsers?: unknown): Promise<SeedResponse> {
    const users = parseSeedUsers(rawUsers);
    const groups: SeedGroupInput[] = (dto.groups ?? []).map((group) => ({
      displayName: group.displayName,
      externalId: group.externalId,
      members: group.members ?? [],
    }));
    const counts = await this.directory.seed(users, groups);
    return { message: 'Data seeded successfully', ...counts };
  }

  @Delete('clear')
  async clear(): Promise<{ message: string }> {
    await this.directory.clearAll();
    return { message: 'All data cleared' };
  }

  @Get('status')
  status(): Promise<DirectoryStatus> {
    return this.directory.status();
  }

  @Get('config')
  getConfig(): PolicyState {
    return this.directory.getPolicyState();
  }

  @Put('profile/:profile')
  setProfile(@Param('profile') profile: string): PolicyChangeResponse {
    const config = this.directory.setProfile(profile);
    return { message: `Profile changed to '${profile}'`, config };
  }

  @Put('config/:flag')
  setOverride(@Param('flag') flag: string, @Query('value') raw?: string): PolicyChangeResponse {
    const value = parseOverrideValue(raw);
    if (value === undefined) {
      throw new BadRequestException(`Query parameter 'value' must be true or false.`);
    }
    const config = this.directory.setOverride(flag, value);
    return { message: `Override set: ${flag}=${value}`, config };
  }

  @Delete('config/:flag')
  clearOverride(@Param('flag') flag: string): PolicyChangeResponse {
    const config = this.directory.clearOverride(flag);
    return { message: `Override cleared: ${flag}`, config };
  }
}
