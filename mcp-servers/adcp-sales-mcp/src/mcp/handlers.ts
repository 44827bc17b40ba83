import type { z } from 'zod';
import type { DomainResult } from '../engine/core/types.js';
import { EnvelopeMapper, type ToolCallResult } from '../engine/envelope-mapper.js';
import { MediaBuyService } from '../services/MediaBuyService.js';
import { logger } from '../utils/logger.js';
import {
  isToolName,
  tools,
  CreateMediaBuySchema,
  GetMediaBuySchema,
  ListCreativeFormatsSchema,
  SyncCreativesSchema,
} from './tools.js';

export class UnknownToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  return schema.parse(args || {});
}

/** Shared by the MCP and A2A transports; neither computes status or message itself. */
export class AdcpToolHandlers {
  private readonly service: MediaBuyService;
  private readonly mapper: EnvelopeMapper;

  constructor(service?: MediaBuyService, mapper?: EnvelopeMapper) {
    this.service = service || new MediaBuyService();
    this.mapper = mapper || new EnvelopeMapper();
  }

  getTools() {
    return tools;
  }

  getMapper(): EnvelopeMapper {
    return this.mapper;
  }

  async execute(toolName: string, args: unknown): Promise<DomainResult<object>> {
    if (!isToolName(toolName)) {
      throw new UnknownToolError(toolName);
    }

    logger.info('Processing AdCP operation', { toolName });

    switch (toolName) {
      case 'create_media_buy': {
        const parsed = parseArgs(CreateMediaBuySchema, args);
        return this.service.createMediaBuy(parsed);
      }
      case 'sync_creatives': {
        const parsed = parseArgs(SyncCreativesSchema, args);
        return this.service.syncCreatives(parsed);
      }
      case 'get_media_buy': {
        const parsed = parseArgs(GetMediaBuySchema, args);
        return this.service.getMediaBuy(parsed);
      }
      case 'list_creative_formats': {
        const parsed = parseArgs(ListCreativeFormatsSchema, args);
        return this.service.listCreativeFormats(parsed);
      }
    }
  }

  async handleToolCall(toolName: string, args: unknown, correlationId?: string): Promise<ToolCallResult> {
    const result = await this.execute(toolName, args);
    const envelope = this.mapper.wrap(result, 'tool_call', correlationId);
    logger.info('AdCP operation finished', { toolName, status: envelope.status });
    return this.mapper.toToolCallResult(envelope);
  }
}
