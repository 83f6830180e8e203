/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Server } from 'node:http';
import Anthropic from '@anthropic-ai/sdk';
import {
  AtlassianOAuthProvider,
  ConfluenceAgent,
  ConfluenceToolset,
  CredentialStore,
  DebugLogger,
  PendingAuthorizations,
  getErrorMessage,
  resolveAtlassianCloudId,
  setGlobalProxy,
} from '@pagewright/core';
import {
  loadConfig,
  loadEnvironment,
  type ServerConfig,
} from './config/config.js';
import { createApp } from './http/app.js';

const logger = new DebugLogger('pagewright:server');

export function createServer(config: ServerConfig): Server {
  if (config.httpsProxy) {
    setGlobalProxy(config.httpsProxy);
  }

  const pending = new PendingAuthorizations();
  const provider = new AtlassianOAuthProvider({
    clientId: config.atlassian.clientId,
    clientSecret: config.atlassian.clientSecret,
    redirectUri: config.atlassian.redirectUri,
    consentTimeoutMs: config.authTimeoutMs,
    pending,
  });
  const agent = new ConfluenceAgent({
    client: new Anthropic({ apiKey: config.anthropicApiKey }),
    toolset: new ConfluenceToolset(),
    model: config.model,
  });

  const app = createApp({
    invocation: {
      task: agent,
      credentials: new CredentialStore(),
      auth: {
        provider,
        resolveTenant: resolveAtlassianCloudId,
        scopes: config.atlassian.scopes,
      },
    },
    pending,
  });

  return app.listen(config.port, () => {
    logger.log(() => `Agent server listening on port ${config.port}`);
  });
}

export function main(): void {
  loadEnvironment();
  createServer(loadConfig());
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  try {
    main();
  } catch (error) {
    logger.error(() => `Failed to start: ${getErrorMessage(error)}`);
    console.error(getErrorMessage(error));
    process.exit(1);
  }
}
