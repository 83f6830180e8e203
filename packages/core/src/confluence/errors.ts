/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A Confluence REST call answered with something other than 200.
 */
export class ConfluenceApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly details: string,
  ) {
    super(message);
    this.name = 'ConfluenceApiError';
  }
}

export class SpaceNotFoundError extends Error {
  constructor(public readonly spaceKey: string) {
    super(`Space not found: ${spaceKey}`);
    this.name = 'SpaceNotFoundError';
  }
}
