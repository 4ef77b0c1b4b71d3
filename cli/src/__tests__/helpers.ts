/**
 * Shared fixtures for CLI tests: temporary CSV files and captured streams.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CliIO } from '../types.js';

export const PHONES_CSV = [
  'name,brand,price,rating',
  'orbit x,nova,999,4.9',
  'pulse 5,zenix,1199,4.8',
  'lite 2,kappa,199,4.6',
  'mini s,nova,299,4.2',
  '',
].join('\n');

export interface TempDir {
  path: string;
  write(name: string, content: string | Uint8Array): string;
  remove(): void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'tabq-test-'));
  return {
    path,
    write(name, content) {
      const file = join(path, name);
      writeFileSync(file, content);
      return file;
    },
    remove() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

export interface CapturedIO extends CliIO {
  out(): string;
  err(): string;
}

export function captureIO(env: Record<string, string | undefined> = {}): CapturedIO {
  let stdout = '';
  let stderr = '';
  return {
    env,
    stdout(text) {
      stdout += text;
    },
    stderr(text) {
      stderr += text;
    },
    out: () => stdout,
    err: () => stderr,
  };
}
