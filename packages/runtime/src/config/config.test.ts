// Tests for environment configuration

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { loadConfig } from './config.js';

function configIssues(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults for unset variables', () => {
    expect(loadConfig({})).toEqual({
      assetRoot: 'assets',
      prototypeDir: 'prototypes',
      logLevel: 'info',
      extensions: ['.proto.json', '.protos.json', '.prototype.json', '.prototypes.json'],
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      PROTOFORGE_ASSET_ROOT: 'game/assets',
      PROTOFORGE_PROTOTYPE_DIR: 'data',
      PROTOFORGE_LOG_LEVEL: 'debug',
      PROTOFORGE_EXTENSIONS: ' .Proto.json, .data.json ,',
    });

    expect(config).toEqual({
      assetRoot: 'game/assets',
      prototypeDir: 'data',
      logLevel: 'debug',
      extensions: ['.proto.json', '.data.json'],
    });
  });

  it('should reject unknown log levels', () => {
    const issues = configIssues({ PROTOFORGE_LOG_LEVEL: 'loud' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^PROTOFORGE_LOG_LEVEL: Invalid enum value/);
  });

  it('should reject extensions without a leading dot', () => {
    expect(configIssues({ PROTOFORGE_EXTENSIONS: 'json' })).toEqual([
      'PROTOFORGE_EXTENSIONS[0]: Extensions must start with "."',
    ]);
  });

  it('should reject an empty extension list', () => {
    expect(configIssues({ PROTOFORGE_EXTENSIONS: ' , ' })).toEqual([
      'PROTOFORGE_EXTENSIONS: At least one extension is required',
    ]);
  });

  it('should report every invalid variable at once', () => {
    expect(() =>
      loadConfig({ PROTOFORGE_LOG_LEVEL: 'loud', PROTOFORGE_EXTENSIONS: 'json' })
    ).toThrow(/PROTOFORGE_LOG_LEVEL.*; PROTOFORGE_EXTENSIONS\[0\]/);
  });
});
