/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugSettings, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Process-wide debug settings. Environment values are read once on first
 * access; ephemeral overrides (tests, the server bootstrap) are layered on
 * top and every change is broadcast to subscribed loggers.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings = {
    enabled: false,
    namespaces: [],
    level: 'debug',
    redactPatterns: ['token', 'secret', 'password', 'authorization'],
  };
  private envConfig: Partial<DebugSettings> = {};
  private ephemeralConfig: Partial<DebugSettings> = {};
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    this.readEnvironment(process.env);
    this.mergedConfig = this.merge();
  }

  /**
   * Re-reads the environment and notifies subscribed loggers.
   *
   * DEBUG is shared with other libraries, so only pagewright namespaces
   * (or the `*` wildcard) switch logging on. PAGEWRIGHT_DEBUG is taken as-is.
   */
  loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    this.readEnvironment(env);
    this.refresh();
  }

  private readEnvironment(env: NodeJS.ProcessEnv): void {
    this.envConfig = {};

    if (env['DEBUG']) {
      const namespaces = parseNamespaces(env['DEBUG']).filter(
        (ns) => ns.startsWith('pagewright') || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (env['PAGEWRIGHT_DEBUG']) {
      this.envConfig = {
        enabled: true,
        namespaces: parseNamespaces(env['PAGEWRIGHT_DEBUG']),
      };
    }

    const level = env['DEBUG_LEVEL'];
    if (level && isLogLevel(level)) {
      this.envConfig = { ...this.envConfig, level };
    }
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = { ...this.ephemeralConfig, ...config };
    this.refresh();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = {};
    this.refresh();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private refresh(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  private merge(): DebugSettings {
    return { ...this.defaultConfig, ...this.envConfig, ...this.ephemeralConfig };
  }
}

function parseNamespaces(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}
