/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { DebugLogger } from './DebugLogger.js';
export { ConfigurationManager } from './ConfigurationManager.js';
export type { DebugSettings, LogEntry, LogLevel } from './types.js';
