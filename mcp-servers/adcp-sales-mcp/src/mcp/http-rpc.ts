import { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  methodNotFound,
  parseRpcRequest,
  rpcError,
  rpcResult,
  type RpcReply,
} from '../rpc/json-rpc.js';
import type { AdcpToolHandlers } from './handlers.js';

const callParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

/** JSON-RPC over HTTP POST: `tools/list` and `tools/call`. */
export async function handleMcpHttpRequest(handlers: AdcpToolHandlers, body: unknown): Promise<RpcReply> {
  const parsed = parseRpcRequest(body);
  if (!parsed.ok) return parsed.reply;

  const { method, params } = parsed.request;
  const id = parsed.request.id ?? null;

  try {
    if (method === 'tools/list') {
      return rpcResult(id, { tools: handlers.getTools() });
    }

    if (method === 'tools/call') {
      const call = callParamsSchema.parse(params);
      logger.info('HTTP MCP tool call', { toolName: call.name });
      const correlationId = id != null ? String(id) : undefined;
      return rpcResult(id, await handlers.handleToolCall(call.name, call.arguments, correlationId));
    }

    return methodNotFound(id, method);
  } catch (error) {
    return rpcError(id, error, 'HTTP MCP');
  }
}
