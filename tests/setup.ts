/**
 * Global Test Setup
 *
 * Silences the file loggers and makes generated ids deterministic.
 */
import { beforeAll, afterAll, vi } from 'vitest';

process.env['LOG_LEVEL'] = 'silent';

// Mock crypto.randomUUID for deterministic IDs in tests
let uuidCounter = 0;
beforeAll(() => {
  uuidCounter = 0;
  vi.spyOn(crypto, 'randomUUID').mockImplementation(() => {
    return `test-uuid-${++uuidCounter}` as `${string}-${string}-${string}-${string}-${string}`;
  });
});

afterAll(() => {
  vi.restoreAllMocks();
  uuidCounter = 0;
});

// Suppress console.log in tests unless DEBUG is set
if (!process.env['DEBUG']) {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
}
