/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// Debug settings from the developer's shell would leak into logger tests
delete process.env['DEBUG'];
delete process.env['PAGEWRIGHT_DEBUG'];
delete process.env['DEBUG_LEVEL'];

afterEach(() => {
  vi.unstubAllGlobals();
});
