/**
 * Tests for spinner utility
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSpinner, shouldShowSpinner, withSpinner, BRAILLE_FRAMES } from './spinner.js';
import { setOutputOptions } from './output.js';

function setTTY(value: boolean | undefined): void {
  Object.defineProperty(process.stdin, 'isTTY', { value, configurable: true });
  Object.defineProperty(process.stdout, 'isTTY', { value, configurable: true });
  Object.defineProperty(process.stderr, 'isTTY', { value, configurable: true });
}

describe('spinner utility', () => {
  const originalEnv = { ...process.env };
  const originalTTY = process.stdout.isTTY;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.PSModulePath;
    delete process.env.POWERSHELL_DISTRIBUTION_CHANNEL;
    delete process.env.ComSpec;
    setOutputOptions({ json: false });
  });

  afterEach(() => {
    process.env = originalEnv;
    setTTY(originalTTY);
    setOutputOptions({ json: false });
  });

  describe('BRAILLE_FRAMES', () => {
    it('should have 10 braille characters', () => {
      expect(BRAILLE_FRAMES).toEqual(['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']);
    });
  });

  describe('shouldShowSpinner', () => {
    it('should be true on an interactive terminal', () => {
      setTTY(true);
      expect(shouldShowSpinner()).toBe(true);
    });

    it('should be false in JSON mode', () => {
      setTTY(true);
      setOutputOptions({ json: true });
      expect(shouldShowSpinner()).toBe(false);
    });

    it('should be false when output is not a TTY', () => {
      setTTY(false);
      expect(shouldShowSpinner()).toBe(false);
    });

    it('should be false in a PowerShell host', () => {
      setTTY(true);
      process.env.PSModulePath = 'C:\\Modules';
      expect(shouldShowSpinner()).toBe(false);
    });
  });

  describe('createSpinner', () => {
    it('should return null in non-TTY environment', () => {
      setTTY(false);
      expect(createSpinner({ text: 'Loading...' })).toBeNull();
    });
  });

  describe('withSpinner', () => {
    beforeEach(() => {
      // No spinner output during tests
      setTTY(false);
    });

    it('should return the step result', async () => {
      const result = await withSpinner('Fetching...', async () => 'html', 'Done');
      expect(result).toBe('html');
    });

    it('should rethrow step errors', async () => {
      await expect(
        withSpinner('Fetching...', async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });
  });
});
