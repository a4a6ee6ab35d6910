/**
 * Tests for linger2ibex.yaml loading and validation
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, CONFIG_FILE_NAME } from '../src/config/ConfigLoader.js';
import { ConfigError, FileAccessError } from '../src/errors/ConversionError.js';

describe('loadConfig', () => {
  let dir: string;
  let warnings: string[];
  const logger = { warn: (msg: string) => { warnings.push(msg); } };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linger2ibex-config-'));
    warnings = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return an empty config when no file exists', () => {
    assert.deepStrictEqual(loadConfig(undefined, dir, logger), {});
  });

  it('should read linger2ibex.yaml from the working directory', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'stimulusType: DashedSentenceQ\nescapeStrings: true\nlogLevel: info\n');

    assert.deepStrictEqual(loadConfig(undefined, dir, logger), {
      stimulusType: 'DashedSentenceQ',
      escapeStrings: true,
      logLevel: 'info',
    });
  });

  it('should resolve template relative to the config file', () => {
    mkdirSync(join(dir, 'conf'));
    writeFileSync(join(dir, 'conf', 'settings.yaml'), 'template: ./scaffold.tmpl\n');

    const config = loadConfig('conf/settings.yaml', dir, logger);

    assert.strictEqual(config.template, join(dir, 'conf', 'scaffold.tmpl'));
  });

  it('should treat an empty file as an empty config', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '');

    assert.deepStrictEqual(loadConfig(undefined, dir, logger), {});
  });

  it('should warn about unknown keys', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'stimulusType: SPR\ncolour: blue\n');

    const config = loadConfig(undefined, dir, logger);

    assert.deepStrictEqual(config, { stimulusType: 'SPR' });
    assert.deepStrictEqual(warnings, [`Unknown config key "colour" in ${join(dir, CONFIG_FILE_NAME)}`]);
  });

  it('should reject wrongly typed values', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'escapeStrings: "yes please"\n');

    assert.throws(() => loadConfig(undefined, dir, logger), ConfigError);
  });

  it('should reject an unknown log level', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'logLevel: chatty\n');

    assert.throws(
      () => loadConfig(undefined, dir, logger),
      (err: unknown) => err instanceof ConfigError && err.message === 'Invalid logLevel: chatty'
    );
  });

  it('should reject a config that is not a mapping', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '- a\n- b\n');

    assert.throws(() => loadConfig(undefined, dir, logger), ConfigError);
  });

  it('should reject invalid YAML', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'stimulusType: [unclosed\n');

    assert.throws(
      () => loadConfig(undefined, dir, logger),
      (err: unknown) => err instanceof ConfigError && err.message.startsWith('Failed to parse config:')
    );
  });

  it('should fail when an explicit config file is missing', () => {
    assert.throws(
      () => loadConfig('nope.yaml', dir, logger),
      (err: unknown) => err instanceof FileAccessError && err.code === 'ERR_FILE_NOT_FOUND'
    );
  });
});
