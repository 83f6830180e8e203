/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager, levelRank } from './ConfigurationManager.js';
import type { LogEntry, LogLevel } from './types.js';

// Colors would end up as escape codes in container log collectors.
(createDebug as unknown as { useColors: () => boolean }).useColors = () =>
  false;

type Message = string | (() => string);

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _enabled: boolean;
  private boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger.dispose();
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    // Enablement is decided here, not by the debug package's own DEBUG parsing.
    this.debugInstance.enabled = true;
    this._configManager = ConfigurationManager.getInstance();
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  debug(messageOrFn: Message, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: Message, ...args: unknown[]): void {
    this.write('info', messageOrFn, args);
  }

  warn(messageOrFn: Message, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: Message, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }

  private write(level: LogLevel, messageOrFn: Message, args: unknown[]): void {
    if (!this._enabled) {
      return;
    }
    const threshold = this._configManager.getEffectiveConfig().level;
    if (levelRank(level) < levelRank(threshold)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message: this.redactSensitive(message),
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    };

    this.debugInstance(
      '%s %s',
      entry.level.toUpperCase(),
      entry.message,
      ...(entry.args ?? []),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  /**
   * Masks `pattern: value`, `pattern=value` and `Bearer <value>` forms.
   */
  redactSensitive(message: string): string {
    let result = message.replace(/Bearer\s+[^\s"',]+/g, 'Bearer [REDACTED]');

    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(
        `(${pattern}[\\w-]*)["']?\\s*[:=]\\s*["']?(?!Bearer \\[REDACTED\\])([^"'\\s,}]+)`,
        'gi',
      );
      result = result.replace(regex, '$1: [REDACTED]');
    }

    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
  }
}
