import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';

describe('cli entry point', () => {
  it('starts with a node shebang so the installed bin runs', () => {
    const source = readFileSync(new URL('../src/cli.ts', import.meta.url), 'utf8');
    expect(source.split('\n')[0]).toBe('#!/usr/bin/env node');
  });
});
