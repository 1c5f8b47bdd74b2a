import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Put, Query } from '@nestjs/common';

import { LogCategory, LogLevel, logLevelName, parseLogCategory, parseLogLevel } from './log-levels';
import { ScimLogger, type StructuredLogEntry } from './scim-logger.service';
import { LogConfigUpdateDto } from './dto/log-config-update.dto';

export interface LogConfigView {
  globalLevel: string;
  categoryLevels: Record<string, string>;
  includePayloads: boolean;
  includeStackTraces: boolean;
  maxPayloadSizeBytes: number;
  format: string;
  availableLevels: string[];
  availableCategories: string[];
}

/**
 * Runtime log configuration and the recent-entry ring buffer.
 * Routes: /admin/logs/*
 */
@Controller('admin/logs')
export class LogConfigController {
  constructor(private readonly scimLogger: ScimLogger) {}

  @Get('config')
  getConfig(): LogConfigView {
    const config = this.scimLogger.getConfig();
    const categoryLevels: Record<string, string> = {};
    for (const [category, level] of Object.entries(config.categoryLevels)) {
      if (level !== undefined) categoryLevels[category] = logLevelName(level);
    }
    return {
      globalLevel: logLevelName(config.globalLevel),
      categoryLevels,
      includePayloads: config.includePayloads,
      includeStackTraces: config.includeStackTraces,
      maxPayloadSizeBytes: config.maxPayloadSizeBytes,
      format: config.format,
      availableLevels: Object.keys(LogLevel).filter((key) => isNaN(Number(key))),
      availableCategories: Object.values(LogCategory),
    };
  }

  @Put('config')
  updateConfig(@Body() dto: LogConfigUpdateDto): LogConfigView {
    if (dto.globalLevel !== undefined) {
      this.scimLogger.setGlobalLevel(dto.globalLevel);
    }
    for (const [name, level] of Object.entries(dto.categoryLevels ?? {})) {
      this.scimLogger.setCategoryLevel(this.requireCategory(name), level);
    }
    if (dto.includePayloads !== undefined) {
      this.scimLogger.updateConfig({ includePayloads: dto.includePayloads });
    }
    if (dto.includeStackTraces !== undefined) {
      this.scimLogger.updateConfig({ includeStackTraces: dto.includeStackTraces });
    }
    this.scimLogger.info(LogCategory.ADMIN, 'Log configuration updated');
    return this.getConfig();
  }

  /** Newest entries last. */
  @Get('recent')
  getRecentLogs(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('requestId') requestId?: string,
  ): { count: number; entries: StructuredLogEntry[] } {
    const entries = this.scimLogger.getRecentLogs({
      limit: limit ? parseInt(limit, 10) : undefined,
      level: level ? parseLogLevel(level) : undefined,
      category: category ? this.requireCategory(category) : undefined,
      requestId: requestId || undefined,
    });
    return { count: entries.length, entries };
  }

  @Delete('recent')
  @HttpCode(204)
  clearRecentLogs(): void {
    this.scimLogger.clearRecentLogs();
  }

  private requireCategory(name: string): LogCategory {
    const category = parseLogCategory(name);
    if (!category) {
      throw new BadRequestException(
        `Unknown log category '${name}'. Valid categories: ${Object.values(LogCategory).join(', ')}`,
      );
    }
    return category;
  }
}
