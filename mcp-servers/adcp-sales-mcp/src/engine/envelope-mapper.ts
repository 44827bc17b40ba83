import { randomUUID } from 'crypto';
import type {
  DomainError,
  DomainResult,
  EnvelopeStatus,
  ItemKind,
  OperationName,
  ProtocolEnvelope,
  TransportKind,
} from './core/types.js';

const OPERATION_LABELS: Record<OperationName, string> = {
  create_media_buy: 'Media buy creation',
  sync_creatives: 'Creative sync',
  get_media_buy: 'Media buy lookup',
  list_creative_formats: 'Format listing',
};

const ITEM_NOUNS: Record<ItemKind, { one: string; many: string }> = {
  package: { one: 'package', many: 'packages' },
  creative: { one: 'creative', many: 'creatives' },
};

export type TaskState = 'completed' | 'input-required' | 'failed';

const TASK_STATES: Record<EnvelopeStatus, TaskState> = {
  completed: 'completed',
  partial: 'completed',
  pending: 'input-required',
  failed: 'failed',
};

export interface ToolCallResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: Record<string, unknown>;
  isError: boolean;
}

export interface A2ATask {
  kind: 'task';
  id: string;
  contextId: string;
  status: {
    state: TaskState;
    timestamp: string;
    message: {
      kind: 'message';
      role: 'agent';
      messageId: string;
      parts: Array<{ kind: 'text'; text: string }>;
    };
  };
  artifacts: Array<{
    artifactId: string;
    name: string;
    description: string;
    parts: Array<{ kind: 'data'; data: Record<string, unknown> }>;
  }>;
  metadata: { adcp_status: EnvelopeStatus };
}

export interface EnvelopeMapperOptions {
  nowFn?: () => Date;
  idFn?: () => string;
}

function blockingErrors(result: DomainResult<object>): DomainError[] {
  return result.errors.filter((error) => !error.recoverable);
}

function countOutcomes(result: DomainResult<object>): { accepted: number; rejected: number } {
  let accepted = 0;
  let rejected = 0;
  for (const item of result.items) {
    if (item.outcome === 'accepted') accepted += 1;
    else rejected += 1;
  }
  return { accepted, rejected };
}

/** First match wins; caller-supplied state never participates. */
export function deriveStatus(result: DomainResult<object>): EnvelopeStatus {
  if (blockingErrors(result).length > 0) return 'failed';

  const { accepted, rejected } = countOutcomes(result);
  if (accepted > 0 && rejected > 0) return 'partial';
  if (rejected > 0) return 'failed';

  if (result.pending || result.errors.length > 0) return 'pending';
  return 'completed';
}

function itemNoun(result: DomainResult<object>, count: number): string {
  const kinds = new Set(result.items.map((item) => item.kind));
  const [kind] = [...kinds];
  if (kinds.size !== 1 || !kind) return count === 1 ? 'item' : 'items';
  return count === 1 ? ITEM_NOUNS[kind].one : ITEM_NOUNS[kind].many;
}

function stripPeriod(text: string): string {
  return text.endsWith('.') ? text.slice(0, -1) : text;
}

export function deriveMessage(result: DomainResult<object>, status: EnvelopeStatus): string {
  const label = OPERATION_LABELS[result.operation];
  const total = result.items.length;
  const { accepted, rejected } = countOutcomes(result);
  const blocking = blockingErrors(result);

  switch (status) {
    case 'failed':
      if (blocking.length > 0) {
        return `${label} failed: ${blocking.map((error) => stripPeriod(error.message)).join('; ')}`;
      }
      return total === 1
        ? `1 ${itemNoun(result, 1)} rejected.`
        : `All ${total} ${itemNoun(result, total)} rejected.`;
    case 'partial':
      return `${rejected} of ${total} ${itemNoun(result, total)} rejected.`;
    case 'pending': {
      const reason =
        result.pending?.reason ?? result.errors.map((error) => stripPeriod(error.message)).join('; ');
      return `${label} pending: ${stripPeriod(reason)}.`;
    }
    case 'completed':
      if (total > 0 && accepted === total) {
        return `${accepted} ${itemNoun(result, accepted)} accepted.`;
      }
      return result.summary ?? `${label} completed.`;
  }
}

/**
 * Wraps domain results for a transport. Status and message are derived here and only here, so
 * both transports report the same outcome for the same result.
 */
export class EnvelopeMapper {
  private readonly nowFn: () => Date;
  private readonly idFn: () => string;

  constructor(options: EnvelopeMapperOptions = {}) {
    this.nowFn = options.nowFn || (() => new Date());
    this.idFn = options.idFn || randomUUID;
  }

  wrap<TPayload extends object>(
    result: DomainResult<TPayload>,
    transport: TransportKind,
    correlationId?: string
  ): ProtocolEnvelope<TPayload> {
    const status = deriveStatus(result);
    return {
      transport,
      status,
      message: deriveMessage(result, status),
      correlationId,
      result,
    };
  }

  toToolCallResult<TPayload extends object>(envelope: ProtocolEnvelope<TPayload>): ToolCallResult {
    const structuredContent: Record<string, unknown> = {
      status: envelope.status,
      message: envelope.message,
    };
    if (envelope.correlationId) structuredContent.task_id = envelope.correlationId;
    Object.assign(structuredContent, domainData(envelope.result));

    return {
      content: [{ type: 'text', text: envelope.message }],
      structuredContent,
      isError: envelope.status === 'failed',
    };
  }

  toTask<TPayload extends object>(envelope: ProtocolEnvelope<TPayload>, contextId?: string): A2ATask {
    const taskId = envelope.correlationId || this.idFn();
    return {
      kind: 'task',
      id: taskId,
      contextId: contextId || taskId,
      status: {
        state: TASK_STATES[envelope.status],
        timestamp: this.nowFn().toISOString(),
        message: {
          kind: 'message',
          role: 'agent',
          messageId: this.idFn(),
          parts: [{ kind: 'text', text: envelope.message }],
        },
      },
      artifacts: [
        {
          artifactId: this.idFn(),
          name: `${envelope.result.operation}_result`,
          description: envelope.message,
          parts: [{ kind: 'data', data: domainData(envelope.result) }],
        },
      ],
      metadata: { adcp_status: envelope.status },
    };
  }
}

function domainData<TPayload extends object>(result: DomainResult<TPayload>): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  Object.assign(data, result.payload);
  if (result.errors.length > 0) data.errors = result.errors;
  return data;
}
