import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Put, Query, Req, UseInterceptors } from '@nestjs/common';
import type { Request } from 'express';

import type { GroupCreateInput } from '../../../domain/models/group.model';
import type { ScimDialect } from '../../../domain/models/user.model';
import { DirectoryFacade } from '../../directory/directory.facade';
import { buildBaseUrl } from '../common/base-url.util';
import { requireObjectBody } from '../common/request-body.util';
import { DEFAULT_COUNT, DEFAULT_START_INDEX } from '../common/scim-constants';
import { GroupRequestDto } from '../dto/group-request.dto';
import { ListQueryDto } from '../dto/list-query.dto';
import { formatGroup, formatListResponse, type ScimListResponse, type ScimResource } from '../formatters/scim-resource.formatter';
import { ScimContentTypeInterceptor } from '../interceptors/scim-content-type.interceptor';
import { ParseDialectPipe } from '../pipes/parse-dialect.pipe';

/** Drop `null`s: neither create nor replace clears an attribute. */
function toGroupInput(dto: GroupRequestDto): GroupCreateInput {
  const input: GroupCreateInput = { displayName: dto.displayName };
  if (typeof dto.externalId === 'string') input.externalId = dto.externalId;
  if (Array.isArray(dto.members)) input.members = dto.members.map((member) => ({ value: member.value }));
  return input;
}

/**
 * SCIM Groups for both protocol dialects.
 * Routes: /scim/{v1|v2}/Groups. PUT and PATCH are subject to the policy.
 */
@Controller('scim/:dialect/Groups')
@UseInterceptors(ScimContentTypeInterceptor)
export class ScimGroupsController {
  constructor(private readonly directory: DirectoryFacade) {}

  @Get()
  async listGroups(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Query() query: ListQueryDto,
    @Req() req: Request,
  ): Promise<ScimListResponse> {
    const startIndex = query.startIndex ?? DEFAULT_START_INDEX;
    const page = await this.directory.listGroups({
      startIndex,
      count: query.count ?? DEFAULT_COUNT,
      filter: query.filter,
    });
    const baseUrl = buildBaseUrl(req, dialect);
    const resources = page.resources.map((group) => formatGroup(group, dialect, baseUrl));
    return formatListResponse(dialect, page, resources, startIndex);
  }

  @Get(':id')
  async getGroup(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Req() req: Request,
  ): Promise<ScimResource> {
    return formatGroup(await this.directory.getGroup(id), dialect, buildBaseUrl(req, dialect));
  }

  @Post()
  @HttpCode(201)
  async createGroup(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Body() dto: GroupRequestDto,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const group = await this.directory.createGroup(toGroupInput(dto));
    return formatGroup(group, dialect, buildBaseUrl(req, dialect));
  }

  @Put(':id')
  async replaceGroup(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Body() dto: GroupRequestDto,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const group = await this.directory.replaceGroup(id, toGroupInput(dto));
    return formatGroup(group, dialect, buildBaseUrl(req, dialect));
  }

  @Patch(':id')
  async patchGroup(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Body() body: unknown,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const patchBody = requireObjectBody(body);
    const group = await this.directory.patchGroup(
      dialect === 'v1'
        ? { kind: 'legacy-group', groupId: id, body: patchBody }
        : { kind: 'current-group', groupId: id, body: patchBody },
    );
    return formatGroup(group, dialect, buildBaseUrl(req, dialect));
  }

  @Delete(':id')
  @HttpCode(204)
  async deleteGroup(
    @Param('dialect', ParseDialectPipe) _dialect: ScimDialect,
    @Param('id') id: string,
  ): Promise<void> {
    await this.directory.deleteGroup(id);
  }
}
