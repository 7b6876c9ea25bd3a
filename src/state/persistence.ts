import { writeFileSync, mkdirSync, existsSync, renameSync } from 'fs';
import { join } from 'path';
import { config } from '../config.js';

// Atomic write: write to .tmp then rename to prevent corruption on crash
export function atomicWriteFileSync(filePath: string, data: string): void {
  const tmpPath = filePath + '.tmp';
  writeFileSync(tmpPath, data, 'utf-8');
  renameSync(tmpPath, filePath);
}

export function stateDir(): string {
  return config.STATE_DIR;
}

export function ensureStateDir(): void {
  if (!existsSync(stateDir())) {
    mkdirSync(stateDir(), { recursive: true });
  }
}

export function statePath(...parts: string[]): string {
  return join(stateDir(), ...parts);
}
