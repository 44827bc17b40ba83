import { z, ZodError } from 'zod';
import { FormatRegistryError, TargetingClassificationError } from '../engine/core/types.js';
import { UnknownToolError } from '../mcp/handlers.js';
import { logger } from '../utils/logger.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export interface RpcReply {
  httpStatus: number;
  body: JsonRpcResponse;
}

export const JSON_RPC_ERRORS = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603,
} as const;

const requestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export type JsonRpcRequest = z.infer<typeof requestSchema>;

/** Malformed transport arguments outside the zod-validated tool schemas. */
export class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParamsError';
  }
}

export function rpcResult(id: JsonRpcId, result: unknown): RpcReply {
  return { httpStatus: 200, body: { jsonrpc: '2.0', id, result } };
}

export function parseRpcRequest(
  body: unknown
): { ok: true; request: JsonRpcRequest } | { ok: false; reply: RpcReply } {
  const parsed = requestSchema.safeParse(body);
  if (parsed.success) return { ok: true, request: parsed.data };
  return {
    ok: false,
    reply: {
      httpStatus: 400,
      body: {
        jsonrpc: '2.0',
        id: null,
        error: { code: JSON_RPC_ERRORS.invalidRequest, message: 'Invalid Request' },
      },
    },
  };
}

export function methodNotFound(id: JsonRpcId, method: string): RpcReply {
  return {
    httpStatus: 404,
    body: {
      jsonrpc: '2.0',
      id,
      error: { code: JSON_RPC_ERRORS.methodNotFound, message: `Method not found: ${method}` },
    },
  };
}

/** Thrown failures only; domain rejections travel inside the result envelope. */
export function rpcError(id: JsonRpcId, error: unknown, transport: string): RpcReply {
  if (error instanceof ZodError) {
    return {
      httpStatus: 400,
      body: {
        jsonrpc: '2.0',
        id,
        error: {
          code: JSON_RPC_ERRORS.invalidParams,
          message: 'Invalid params',
          data: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
      },
    };
  }

  if (error instanceof InvalidParamsError) {
    return {
      httpStatus: 400,
      body: { jsonrpc: '2.0', id, error: { code: JSON_RPC_ERRORS.invalidParams, message: error.message } },
    };
  }

  if (error instanceof UnknownToolError) {
    return {
      httpStatus: 404,
      body: { jsonrpc: '2.0', id, error: { code: JSON_RPC_ERRORS.methodNotFound, message: error.message } },
    };
  }

  const fatalConfig = error instanceof TargetingClassificationError || error instanceof FormatRegistryError;
  logger.error(`${transport} request failed`, {
    message: error instanceof Error ? error.message : String(error),
    fatalConfig,
  });
  return {
    httpStatus: 500,
    body: {
      jsonrpc: '2.0',
      id,
      error: {
        code: JSON_RPC_ERRORS.internal,
        message: 'Internal error',
        data: error instanceof Error ? error.message : 'Unknown error',
      },
    },
  };
}
