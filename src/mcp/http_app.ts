/**
 * @fileoverview Streamable HTTP host for the MCP server
 *
 * Stateless: every POST to the tool path gets its own server and transport,
 * bound to the tenant context the gate attached to that request. There is no
 * session stream, so GET and DELETE on the tool path are refused.
 */

import express, { type Express, type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { ServerConfig } from '../config/index.js';
import type { TenantGate } from '../security/tenant_gate.js';
import { createScopedLogger, type ScopedLogger } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { createContextServer, type ContextTools } from './server.js';

export interface HttpAppOptions {
  gate: TenantGate;
  tools: ContextTools;
  server: Pick<ServerConfig, 'name' | 'version' | 'mcpPath'>;
  logger?: ScopedLogger;
}

export interface JsonRpcErrorBody {
  jsonrpc: '2.0';
  error: { code: number; message: string };
  id: null;
}

export function jsonRpcError(code: number, message: string): JsonRpcErrorBody {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

export function healthPayload(server: Pick<ServerConfig, 'name' | 'version'>): {
  status: 'ok';
  name: string;
  version: string;
} {
  return { status: 'ok', name: server.name, version: server.version };
}

export function createHttpApp(options: HttpAppOptions): Express {
  const { gate, tools, server: serverConfig } = options;
  const log = options.logger ?? createScopedLogger('http');
  const app = express();
  // The gate matches the tool path exactly; routing must agree with it.
  app.set('case sensitive routing', true);
  app.set('strict routing', true);

  app.get('/health', (_req, res) => {
    res.json(healthPayload(serverConfig));
  });

  app.use((req, res, next) => gate.handle(req, res, next));
  app.use(express.json({ limit: '1mb' }));

  app.post(serverConfig.mcpPath, async (req: Request, res: Response) => {
    const context = gate.contextFor(req);
    if (!context) {
      log.error('Tool request reached the handler without a tenant context');
      res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      return;
    }

    const server = createContextServer(
      { tools, name: serverConfig.name, version: serverConfig.version },
      context
    );
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        log.warn('Failed to close per-request server', { error: getErrorMessage(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error('Failed to handle tool request', {
        tenantId: context.tenantId,
        error: getErrorMessage(error),
      });
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response): void => {
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed.'));
  };
  app.get(serverConfig.mcpPath, methodNotAllowed);
  app.delete(serverConfig.mcpPath, methodNotAllowed);

  return app;
}
