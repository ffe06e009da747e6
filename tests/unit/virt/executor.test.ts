/**
 * Unit tests for the command executor
 *
 * ProcessRunner spawns real processes, so these tests cover the stderr
 * summary used in error messages.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { summarizeStderr } from '../../../src/virt/executor.js';

describe('summarizeStderr', () => {
  it('should pick the first error: line', () => {
    const stderr = "warning: using default URI\nerror: failed to get domain 'dev01'\nerror: second\n";
    assert.strictEqual(summarizeStderr(stderr, 1), "error: failed to get domain 'dev01'");
  });

  it('should match error: case-insensitively', () => {
    assert.strictEqual(summarizeStderr('ERROR: no space left\n', 1), 'ERROR: no space left');
  });

  it('should join the first three lines when no error: line exists', () => {
    const stderr = 'first\n\nsecond\nthird\nfourth\n';
    assert.strictEqual(summarizeStderr(stderr, 1), 'first | second | third');
  });

  it('should strip ANSI escape codes and carriage returns', () => {
    assert.strictEqual(summarizeStderr('\x1b[31mboom\x1b[0m\r\n', 1), 'boom');
  });

  it('should ignore a bare error: prefix', () => {
    assert.strictEqual(summarizeStderr('error:\ndetails here\n', 1), 'error: | details here');
  });

  it('should fall back to the exit code', () => {
    assert.strictEqual(summarizeStderr('', 3), 'exited with code 3');
    assert.strictEqual(summarizeStderr('  \n', null), 'exited with code null (killed)');
  });
});
