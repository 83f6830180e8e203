/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export debug logging
export * from './debug/index.js';

// Export utilities
export * from './utils/errors.js';
export * from './utils/fetch.js';

// Export streaming
export * from './streaming/types.js';
export * from './streaming/StreamingChannel.js';

// Export agent
export * from './agent/types.js';
export * from './agent/ConfluenceAgent.js';
export * from './session/AgentSession.js';

// Export auth
export * from './auth/types.js';
export * from './auth/oauth-errors.js';
export * from './auth/needsAuthentication.js';
export * from './auth/token-metadata.js';
export * from './auth/tenant-resolver.js';
export * from './auth/CredentialStore.js';
export * from './auth/PendingAuthorizations.js';
export * from './auth/AuthenticationGate.js';
export * from './auth/atlassian-oauth-provider.js';

// Export Confluence document API and tools
export * from './confluence/types.js';
export * from './confluence/errors.js';
export * from './confluence/ConfluenceClient.js';
export * from './tools/tool-names.js';
export * from './tools/confluence-tools.js';

// Export orchestration
export * from './orchestrator/RetryBudget.js';
export * from './orchestrator/TaskOrchestrator.js';
export * from './invocation.js';
