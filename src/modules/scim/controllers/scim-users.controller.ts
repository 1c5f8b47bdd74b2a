import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Put, Query, Req, UseInterceptors } from '@nestjs/common';
import type { Request } from 'express';

import { parseUserCreatePayload } from '../../../domain/models/user-attributes';
import type { ScimDialect, UserRecord } from '../../../domain/models/user.model';
import { DirectoryFacade } from '../../directory/directory.facade';
import { buildBaseUrl } from '../common/base-url.util';
import { requireObjectBody } from '../common/request-body.util';
import { DEFAULT_COUNT, DEFAULT_START_INDEX } from '../common/scim-constants';
import { ListQueryDto } from '../dto/list-query.dto';
import { formatListResponse, formatUser, type ScimListResponse, type ScimResource } from '../formatters/scim-resource.formatter';
import { ScimContentTypeInterceptor } from '../interceptors/scim-content-type.interceptor';
import { ParseDialectPipe } from '../pipes/parse-dialect.pipe';

/**
 * SCIM Users for both protocol dialects.
 * Routes: /scim/{v1|v2}/Users
 */
@Controller('scim/:dialect/Users')
@UseInterceptors(ScimContentTypeInterceptor)
export class ScimUsersController {
  constructor(private readonly directory: DirectoryFacade) {}

  @Get()
  async listUsers(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Query() query: ListQueryDto,
    @Req() req: Request,
  ): Promise<ScimListResponse> {
    const startIndex = query.startIndex ?? DEFAULT_START_INDEX;
    const page = await this.directory.listUsers({
      startIndex,
      count: query.count ?? DEFAULT_COUNT,
      filter: query.filter,
    });
    const resources = await Promise.all(page.resources.map((user) => this.render(user, dialect, req)));
    return formatListResponse(dialect, page, resources, startIndex);
  }

  @Get(':id')
  async getUser(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Req() req: Request,
  ): Promise<ScimResource> {
    return this.render(await this.directory.getUser(id), dialect, req);
  }

  @Post()
  @HttpCode(201)
  async createUser(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Body() body: unknown,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const input = parseUserCreatePayload(requireObjectBody(body), dialect);
    return this.render(await this.directory.createUser(input), dialect, req);
  }

  /** Partial overwrite: attributes missing from the body are kept. */
  @Put(':id')
  async replaceUser(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Body() body: unknown,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const values = parseUserCreatePayload(requireObjectBody(body), dialect);
    return this.render(await this.directory.replaceUser(id, values), dialect, req);
  }

  @Patch(':id')
  async patchUser(
    @Param('dialect', ParseDialectPipe) dialect: ScimDialect,
    @Param('id') id: string,
    @Body() body: unknown,
    @Req() req: Request,
  ): Promise<ScimResource> {
    const patchBody = requireObjectBody(body);
    const user = await this.directory.patchUser(
      dialect === 'v1'
        ? { kind: 'legacy-user', userId: id, body: patchBody }
        : { kind: 'current-user', userId: id, body: patchBody },
    );
    return this.render(user, dialect, req);
  }

  @Delete(':id')
  @HttpCode(204)
  async deleteUser(
    @Param('dialect', ParseDialectPipe) _dialect: ScimDialect,
    @Param('id') id: string,
  ): Promise<void> {
    await this.directory.deleteUser(id);
  }

  private async render(user: UserRecord, dialect: ScimDialect, req: Request): Promise<ScimResource> {
    const groups = await this.directory.getUserGroups(user.id);
    return formatUser(user, groups, dialect, buildBaseUrl(req, dialect));
  }
}
