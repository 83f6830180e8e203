/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { homedir } from 'node:os';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MODEL } from '@pagewright/core';

export const PAGEWRIGHT_CONFIG_DIR = '.pagewright';

export const DEFAULT_PORT = 8080;
export const DEFAULT_AUTH_TIMEOUT_MS = 300_000;
export const DEFAULT_ATLASSIAN_SCOPES = [
  'read:page:confluence',
  'write:page:confluence',
  'read:space:confluence',
  'search:confluence',
  'offline_access',
];

const EnvironmentSchema = z.object({
  ATLASSIAN_CLIENT_ID: z.string().min(1),
  ATLASSIAN_CLIENT_SECRET: z.string().min(1),
  ATLASSIAN_SCOPES: z.string().optional(),
  ATLASSIAN_REDIRECT_URI: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().min(1),
  PAGEWRIGHT_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  AUTH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_AUTH_TIMEOUT_MS),
  HTTPS_PROXY: z.string().url().optional(),
});

export interface ServerConfig {
  port: number;
  model: string;
  anthropicApiKey: string;
  atlassian: {
    clientId: string;
    clientSecret: string;
    scopes: string[];
    redirectUri: string;
  };
  authTimeoutMs: number;
  httpsProxy?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the server configuration from environment variables. Empty values
 * count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
  const parsed = EnvironmentSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const values = parsed.data;
  const scopes = values.ATLASSIAN_SCOPES
    ? values.ATLASSIAN_SCOPES.split(/\s+/).filter(Boolean)
    : DEFAULT_ATLASSIAN_SCOPES;

  return {
    port: values.PORT,
    model: values.PAGEWRIGHT_MODEL,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    atlassian: {
      clientId: values.ATLASSIAN_CLIENT_ID,
      clientSecret: values.ATLASSIAN_CLIENT_SECRET,
      scopes,
      redirectUri:
        values.ATLASSIAN_REDIRECT_URI ??
        `http://localhost:${values.PORT}/oauth/callback`,
    },
    authTimeoutMs: values.AUTH_TIMEOUT_MS,
    httpsProxy: values.HTTPS_PROXY,
  };
}

export function loadEnvironment(): void {
  const envFilePath = findEnvFile(process.cwd());
  if (envFilePath) {
    dotenv.config({ path: envFilePath, override: true });
  }
}

/**
 * Walks up from `startDir` looking for `.pagewright/.env`, then `.env`;
 * falls back to the same two files under the home directory.
 */
export function findEnvFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);
  while (true) {
    const projectEnvPath = path.join(currentDir, PAGEWRIGHT_CONFIG_DIR, '.env');
    if (fs.existsSync(projectEnvPath)) {
      return projectEnvPath;
    }
    const envPath = path.join(currentDir, '.env');
    if (fs.existsSync(envPath)) {
      return envPath;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir || !parentDir) {
      const homeProjectEnvPath = path.join(
        homedir(),
        PAGEWRIGHT_CONFIG_DIR,
        '.env',
      );
      if (fs.existsSync(homeProjectEnvPath)) {
        return homeProjectEnvPath;
      }
      const homeEnvPath = path.join(homedir(), '.env');
      if (fs.existsSync(homeEnvPath)) {
        return homeEnvPath;
      }
      return null;
    }
    currentDir = parentDir;
  }
}
