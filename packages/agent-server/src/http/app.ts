/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Writable } from 'node:stream';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import {
  DebugLogger,
  OAuthErrorFactory,
  getErrorMessage,
  invokeAgent,
  type InvocationDependencies,
  type PendingAuthorizations,
} from '@pagewright/core';

const logger = new DebugLogger('pagewright:http');

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

const CallbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().min(1).optional(),
  error_description: z.string().optional(),
});

/**
 * Writes one line to `stream`, waiting out backpressure. Resolves `false`
 * once the stream can no longer take writes, e.g. after the client went away.
 */
export async function writeLine(
  stream: Writable,
  line: string,
): Promise<boolean> {
  if (stream.destroyed || stream.writableEnded) {
    return false;
  }
  if (stream.write(`${line}\n`)) {
    return true;
  }

  await new Promise<void>((resolve) => {
    const settle = (): void => {
      stream.off('drain', settle);
      stream.off('close', settle);
      resolve();
    };
    stream.once('drain', settle);
    stream.once('close', settle);
  });
  return !stream.destroyed;
}

export interface AppDependencies {
  invocation: InvocationDependencies;
  pending: PendingAuthorizations;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/ping', (_req, res) => {
    res.json({ status: 'Healthy' });
  });

  app.post('/invocations', async (req, res) => {
    res.status(200);
    res.setHeader('Content-Type', NDJSON_CONTENT_TYPE);
    try {
      for await (const event of invokeAgent(req.body, deps.invocation)) {
        if (!(await writeLine(res, JSON.stringify(event)))) {
          logger.debug(() => 'Client disconnected, dropping remaining events');
          break;
        }
      }
    } catch (error) {
      logger.error(
        () => `Invocation stream failed: ${getErrorMessage(error)}`,
      );
    } finally {
      if (!res.writableEnded) {
        res.end();
      }
    }
  });

  app.get('/oauth/callback', (req, res) => {
    const query = CallbackQuerySchema.safeParse(req.query);
    if (!query.success || !query.data.state) {
      res.status(400).json({ error: 'Missing state parameter' });
      return;
    }
    const { code, state, error, error_description } = query.data;

    if (error) {
      const settled = deps.pending.fail(
        state,
        OAuthErrorFactory.accessDenied(
          deps.invocation.auth.provider.name,
          error_description || error,
        ),
      );
      if (!settled) {
        res.status(400).json({ error: 'Unknown authorization state' });
        return;
      }
      res.type('text/plain').send('Authorization was denied.');
      return;
    }

    if (!code) {
      res.status(400).json({ error: 'Missing code parameter' });
      return;
    }
    if (!deps.pending.complete(state, code)) {
      res.status(400).json({ error: 'Unknown authorization state' });
      return;
    }
    logger.debug(() => 'Authorization callback received');
    res
      .type('text/plain')
      .send('Authorization complete. You can close this window.');
  });

  app.use(
    (error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      logger.warn(() => `Request failed: ${getErrorMessage(error)}`);
      res.status(400).json({ error: getErrorMessage(error) });
    },
  );

  return app;
}
