/**
 * Tests for the CLI program wiring
 */

import { describe, it, expect } from 'vitest';
import { createProgram, VERSION } from '../../src/cli/index.js';

describe('createProgram', () => {
  it('should register every command', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual([
      'classify',
      'targets',
      'build',
      'rename',
      'assemble',
      'release',
      'gate',
      'fetch-model',
      'config',
    ]);
  });

  it('should expose release run and the config views', () => {
    const program = createProgram();
    const sub = (name: string) =>
      program.commands.find((command) => command.name() === name)?.commands.map((command) => command.name());

    expect(sub('release')).toEqual(['run']);
    expect(sub('config')).toEqual(['show', 'defaults']);
  });

  it('should read its version from package.json', () => {
    expect(VERSION).toBe('1.0.0');
  });
});
