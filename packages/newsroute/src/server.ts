import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createNewsrouteApi, type QueryService } from '@newsroute/api';
import type { Logger } from '@newsroute/core';
import { createAssistant, type Assistant } from './api/createAssistant';
import { loadEnvConfig, type EnvConfig } from './config/env';
import { createLocalIntegrations } from './integrations';

export interface ServerAppOptions {
  authToken?: string | undefined;
  logger?: Logger | undefined;
}

export function createServerApp(service: QueryService, options: ServerAppOptions = {}): Express {
  const app = express();

  // Lightweight CORS without extra deps
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Headers', 'authorization, content-type');
    res.header('Access-Control-Allow-Methods', 'GET,POST,DELETE,OPTIONS');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use('/', createNewsrouteApi({ service, authToken: options.authToken, logger: options.logger }));
  return app;
}

function isLoopbackHost(host: string): boolean {
  const normalized = host.trim().toLowerCase();
  return normalized === '127.0.0.1' || normalized === 'localhost' || normalized === '::1';
}

export interface RunningServer {
  assistant: Assistant;
  server: Server;
  close(): Promise<void>;
}

/**
 * Builds the assistant from `env`, starts its resources and listens on
 * `env.host:env.port`.
 */
export async function startServer(env: EnvConfig = loadEnvConfig()): Promise<RunningServer> {
  const providers = createLocalIntegrations(env);
  const logger = providers.logger;
  const assistant = createAssistant({
    ...(env.sourceTimeoutMs !== undefined ? { sourceTimeoutMs: env.sourceTimeoutMs } : {}),
    providers
  });
  await assistant.start();

  if (!isLoopbackHost(env.host) && !env.apiToken) {
    logger.warn({ host: env.host }, 'Listening on a non-loopback host without NEWSROUTE_API_TOKEN');
  }

  const app = createServerApp(assistant, { authToken: env.apiToken, logger });
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(env.port, env.host, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info({ host: env.host, port: env.port }, 'Newsroute API listening');

  return {
    assistant,
    server,
    async close() {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await assistant.close();
    }
  };
}
