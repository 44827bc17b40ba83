import { z } from 'zod';
import { jsonValueSchema } from '../engine/core/json-schema.js';
import type { A2ATask } from '../engine/envelope-mapper.js';
import type { AdcpToolHandlers } from '../mcp/handlers.js';
import {
  InvalidParamsError,
  methodNotFound,
  parseRpcRequest,
  rpcError,
  rpcResult,
  type RpcReply,
} from '../rpc/json-rpc.js';
import { logger } from '../utils/logger.js';

const partSchema = z.union([
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('data'), data: z.record(jsonValueSchema) }),
]);

const messageSendSchema = z.object({
  message: z.object({
    kind: z.literal('message').optional(),
    role: z.enum(['user', 'agent']).optional(),
    messageId: z.string().optional(),
    contextId: z.string().optional(),
    taskId: z.string().optional(),
    parts: z.array(partSchema).min(1),
  }),
});

const skillInvocationSchema = z.object({
  skill: z.string().min(1),
  parameters: z.record(jsonValueSchema).default({}),
});

export interface AgentCard {
  name: string;
  description: string;
  url: string;
  version: string;
  protocolVersion: string;
  capabilities: { streaming: boolean; pushNotifications: boolean };
  defaultInputModes: string[];
  defaultOutputModes: string[];
  skills: Array<{ id: string; name: string; description: string; tags: string[] }>;
}

/** A2A-style task transport. The message carries one data part naming the skill to run. */
export class A2ATaskHandler {
  private readonly handlers: AdcpToolHandlers;

  constructor(handlers: AdcpToolHandlers) {
    this.handlers = handlers;
  }

  async sendMessage(params: unknown): Promise<A2ATask> {
    const { message } = messageSendSchema.parse(params);
    let invocation: z.infer<typeof skillInvocationSchema> | undefined;
    for (const part of message.parts) {
      if (part.kind !== 'data') continue;
      const candidate = skillInvocationSchema.safeParse(part.data);
      if (candidate.success) {
        invocation = candidate.data;
        break;
      }
    }
    if (!invocation) {
      throw new InvalidParamsError('message must include a data part with { skill, parameters }');
    }

    logger.info('A2A skill invocation', { skill: invocation.skill, contextId: message.contextId });
    const mapper = this.handlers.getMapper();
    const result = await this.handlers.execute(invocation.skill, invocation.parameters);
    const envelope = mapper.wrap(result, 'task_artifact', message.taskId);
    logger.info('A2A skill finished', { skill: invocation.skill, status: envelope.status });
    return mapper.toTask(envelope, message.contextId);
  }

  async handleRpc(body: unknown): Promise<RpcReply> {
    const parsed = parseRpcRequest(body);
    if (!parsed.ok) return parsed.reply;

    const { method, params } = parsed.request;
    const id = parsed.request.id ?? null;
    if (method !== 'message/send') return methodNotFound(id, method);

    try {
      return rpcResult(id, await this.sendMessage(params));
    } catch (error) {
      return rpcError(id, error, 'A2A');
    }
  }

  agentCard(baseUrl: string): AgentCard {
    return {
      name: 'AdCP Sales Agent',
      description: 'Sells publisher inventory through AdCP media-buy operations',
      url: `${baseUrl.replace(/\/+$/, '')}/a2a`,
      version: '1.0.0',
      protocolVersion: '0.3.0',
      capabilities: { streaming: false, pushNotifications: false },
      defaultInputModes: ['application/json'],
      defaultOutputModes: ['application/json'],
      skills: this.handlers.getTools().map((tool) => ({
        id: tool.name,
        name: tool.name,
        description: tool.description || tool.name,
        tags: ['adcp'],
      })),
    };
  }
}
