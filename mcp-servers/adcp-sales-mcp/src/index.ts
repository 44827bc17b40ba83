#!/usr/bin/env node

import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import path from 'path';
import { existsSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { A2ATaskHandler } from './a2a/task-handler.js';
import { loadEnvConfig } from './config/env.js';
import { AdcpToolHandlers } from './mcp/handlers.js';
import { handleMcpHttpRequest } from './mcp/http-rpc.js';
import { MediaBuyService } from './services/MediaBuyService.js';
import { logger } from './utils/logger.js';

const rootEnvPath = path.resolve(process.cwd(), '../../.env');
if (existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}
dotenv.config();

const env = loadEnvConfig();

logger.info('Environment loaded', {
  adServerMode: env.adServerMode,
  adServerMaxRetries: env.adServerRetry.maxRetries,
  tenants: Object.keys(env.tenantConfigMap).length,
});

class AdcpSalesServer {
  private readonly server: Server;
  private readonly handlers: AdcpToolHandlers;
  private readonly a2a: A2ATaskHandler;
  private readonly httpApp: express.Express;

  constructor() {
    this.server = new Server(
      {
        name: 'adcp-sales-mcp',
        version: '1.0.0',
      },
      { capabilities: { tools: {} } }
    );

    this.handlers = new AdcpToolHandlers(new MediaBuyService({ env }));
    this.a2a = new A2ATaskHandler(this.handlers);
    this.httpApp = express();

    this.setupHttpServer();
    this.setupToolHandlers();
  }

  private setupHttpServer(): void {
    this.httpApp.use(cors());
    this.httpApp.use(express.json({ limit: '2mb' }));

    this.httpApp.get('/health', (_req, res) => {
      res.json({ status: 'ok' });
    });

    this.httpApp.get('/.well-known/agent-card.json', (req, res) => {
      res.json(this.a2a.agentCard(`${req.protocol}://${req.get('host') || `localhost:${env.port}`}`));
    });

    this.httpApp.post('/mcp', async (req, res) => {
      const reply = await handleMcpHttpRequest(this.handlers, req.body);
      res.status(reply.httpStatus).json(reply.body);
    });

    this.httpApp.post('/a2a', async (req, res) => {
      const reply = await this.a2a.handleRpc(req.body);
      res.status(reply.httpStatus).json(reply.body);
    });

    this.httpApp.listen(env.port, () => {
      logger.info(`HTTP server listening on port ${env.port}`);
    });
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.handlers.getTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      logger.info('Stdio MCP tool call', { toolName: name });
      return this.handlers.handleToolCall(name, args);
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('AdCP sales MCP server started');
  }
}

const server = new AdcpSalesServer();
server.start().catch((error) => {
  logger.error('Failed to start AdCP sales MCP server', {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
