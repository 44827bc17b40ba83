import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { jsonValueSchema } from '../engine/core/json-schema.js';

const tenantIdRequired = z.string().min(1);
const isoDateTime = z.string().datetime({ offset: true });

export const CreateMediaBuySchema = z
  .object({
    tenantId: tenantIdRequired,
    buyerRef: z.string().min(1),
    packages: z
      .array(
        z.object({
          packageId: z.string().min(1).optional(),
          productId: z.string().min(1),
          formatIds: z.array(z.string().min(1)).optional(),
          budget: z.number().positive().optional(),
        })
      )
      .min(1),
    targetingOverlay: z.record(jsonValueSchema).optional(),
    startTime: isoDateTime,
    endTime: isoDateTime,
    budget: z.number().positive(),
    currency: z.string().length(3).optional(),
  })
  .refine((value) => Date.parse(value.endTime) > Date.parse(value.startTime), {
    message: 'endTime must be after startTime',
    path: ['endTime'],
  });

export const SyncCreativesSchema = z.object({
  tenantId: tenantIdRequired,
  mediaBuyId: z.string().min(1),
  creatives: z
    .array(
      z.object({
        creativeId: z.string().min(1),
        name: z.string().min(1),
        formatId: z.string().min(1),
        mediaUrl: z.string().url().optional(),
        clickUrl: z.string().url().optional(),
        snippet: z.string().optional(),
        snippetType: z.enum(['html', 'javascript', 'iframe', 'vast_xml', 'vast_url']).optional(),
        templateVariables: z.record(jsonValueSchema).optional(),
        width: z.number().int().positive().optional(),
        height: z.number().int().positive().optional(),
        durationMs: z.number().int().positive().optional(),
        packageIds: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

export const GetMediaBuySchema = z.object({
  tenantId: tenantIdRequired,
  mediaBuyId: z.string().min(1),
});

export const ListCreativeFormatsSchema = z.object({
  tenantId: z.string().min(1).optional(),
  type: z.enum(['display', 'video', 'audio', 'native']).optional(),
  formatIds: z.array(z.string().min(1)).optional(),
  minWidth: z.number().int().nonnegative().optional(),
  maxWidth: z.number().int().positive().optional(),
  minHeight: z.number().int().nonnegative().optional(),
  maxHeight: z.number().int().positive().optional(),
  nameSearch: z.string().min(1).optional(),
});

export const tools: Tool[] = [
  {
    name: 'create_media_buy',
    description:
      'Create a media buy: applies targeting access rules, resolves each package format and creates line items on the ad server',
    inputSchema: {
      type: 'object',
      properties: {
        tenantId: { type: 'string', description: 'Tenant (publisher) ID' },
        buyerRef: { type: 'string', description: 'Buyer reference; repeated calls with the same value are idempotent' },
        packages: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              packageId: { type: 'string' },
              productId: { type: 'string' },
              formatIds: { type: 'array', items: { type: 'string' } },
              budget: { type: 'number' },
            },
            required: ['productId'],
          },
        },
        targetingOverlay: {
          type: 'object',
          description: 'Targeting dimension to value, e.g. { "geo_country_any_of": ["US"] }',
        },
        startTime: { type: 'string', format: 'date-time' },
        endTime: { type: 'string', format: 'date-time' },
        budget: { type: 'number' },
        currency: { type: 'string', default: 'USD' },
      },
      required: ['tenantId', 'buyerRef', 'packages', 'startTime', 'endTime', 'budget'],
    },
  },
  {
    name: 'sync_creatives',
    description: 'Validate creatives against package placeholders and associate accepted ones with line items',
    inputSchema: {
      type: 'object',
      properties: {
        tenantId: { type: 'string' },
        mediaBuyId: { type: 'string' },
        creatives: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              creativeId: { type: 'string' },
              name: { type: 'string' },
              formatId: { type: 'string' },
              mediaUrl: { type: 'string' },
              clickUrl: { type: 'string' },
              snippet: { type: 'string' },
              snippetType: { type: 'string', enum: ['html', 'javascript', 'iframe', 'vast_xml', 'vast_url'] },
              templateVariables: { type: 'object' },
              width: { type: 'number' },
              height: { type: 'number' },
              durationMs: { type: 'number' },
              packageIds: { type: 'array', items: { type: 'string' } },
            },
            required: ['creativeId', 'name', 'formatId', 'packageIds'],
          },
        },
      },
      required: ['tenantId', 'mediaBuyId', 'creatives'],
    },
  },
  {
    name: 'get_media_buy',
    description: 'Get a media buy with its packages, placeholders and creative assignments',
    inputSchema: {
      type: 'object',
      properties: {
        tenantId: { type: 'string' },
        mediaBuyId: { type: 'string' },
      },
      required: ['tenantId', 'mediaBuyId'],
    },
  },
  {
    name: 'list_creative_formats',
    description: 'List creative formats visible to a tenant (standard plus tenant custom formats)',
    inputSchema: {
      type: 'object',
      properties: {
        tenantId: { type: 'string' },
        type: { type: 'string', enum: ['display', 'video', 'audio', 'native'] },
        formatIds: { type: 'array', items: { type: 'string' } },
        minWidth: { type: 'number' },
        maxWidth: { type: 'number' },
        minHeight: { type: 'number' },
        maxHeight: { type: 'number' },
        nameSearch: { type: 'string', description: 'Case-insensitive substring of the format name' },
      },
    },
  },
];

export const toolSchemas = {
  create_media_buy: CreateMediaBuySchema,
  sync_creatives: SyncCreativesSchema,
  get_media_buy: GetMediaBuySchema,
  list_creative_formats: ListCreativeFormatsSchema,
};

export type ToolName = keyof typeof toolSchemas;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, name);
}
