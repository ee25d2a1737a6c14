/**
 * @fileoverview Vitest Test Setup
 *
 * Global test configuration for @correlate-js/core.
 * This file is loaded before each test file runs.
 *
 * @license Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Per-Test Cleanup
// ============================================================================

afterEach(() => {
  // Restore all mocks after each test
  vi.restoreAllMocks();
});
