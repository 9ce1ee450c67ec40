import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './CliArgs.js';
import { ConfigurationError } from '../domain/errors/SyncError.js';

describe('parseCliArgs', () => {
  it('should return actions in execution order regardless of flag order', () => {
    const options = parseCliArgs(['--sync-entities', '--get-groups', '--delete-entities']);

    expect(options.actions).toEqual(['get-groups', 'delete-entities', 'sync-entities']);
  });

  it('should read modifiers', () => {
    const options = parseCliArgs([
      '--create-groups',
      '--mode',
      'full',
      '--dry-run',
      '--interactive',
      '--alexa-only',
      '--filter-entities',
    ]);

    expect(options).toEqual({
      actions: ['create-groups'],
      mode: 'full',
      dryRun: true,
      interactive: true,
      alexaOnly: true,
      filterEntities: true,
      help: false,
    });
  });

  it('should default every modifier to off', () => {
    expect(parseCliArgs([])).toEqual({
      actions: [],
      mode: undefined,
      dryRun: false,
      interactive: false,
      alexaOnly: false,
      filterEntities: false,
      help: false,
    });
  });

  it('should reject unknown flags and modes', () => {
    expect(() => parseCliArgs(['--delete-everything'])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(['--sync-entities', '--mode', 'mirror'])).toThrow(
      '--mode must be one of update_only, full (got "mirror")'
    );
  });
});
