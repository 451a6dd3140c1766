// Shared test setup utilities
import { afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { resetDefaultRegistry, resetPreferences, setDebug } from '@morphseg/core';

let tempDirs: string[] = [];

// Restore process-wide state between tests
export function setupTests() {
  afterEach(() => {
    resetPreferences();
    resetDefaultRegistry();
    setDebug(false);

    for (const dir of tempDirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    tempDirs = [];
  });
}

/**
 * Write a frequency list to a fresh temporary directory and return its path.
 */
export function writeFrequencyList(content: string, fileName = 'frequency.txt'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'morphseg-'));
  tempDirs.push(dir);
  const file = path.join(dir, fileName);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

export function missingFrequencyListPath(): string {
  return path.join(os.tmpdir(), 'morphseg-missing', 'frequency.txt');
}

export function bases(morphemes: ReadonlyArray<{ base: string }>): string[] {
  return morphemes.map((m) => m.base);
}
