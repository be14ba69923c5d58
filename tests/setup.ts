// ============================================================
// Shape Scatter - Test Setup
// Global test configuration for Vitest
// ============================================================

import { vi } from 'vitest';

// Mock console methods to reduce noise in tests
vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});
