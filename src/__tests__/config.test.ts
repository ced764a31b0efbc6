import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as path from 'path';
import pino from 'pino';
import { applyOverrides, defaultConfig, loadConfig, parseConfig, resolveConfigPath } from '../config';

const TEST_DIR = path.join(__dirname, '../../.test-config');

describe('config', () => {
  afterEach(() => {
    if (fs.existsSync(TEST_DIR)) {
      fs.rmSync(TEST_DIR, { recursive: true });
    }
  });

  it('should fill every section with defaults', () => {
    const config = defaultConfig();
    assert.deepEqual(config.playback, { toleranceMs: 350, pollIntervalMs: 10, frameMode: 'accumulate' });
    assert.deepEqual(config.match, { stickThreshold: 0.6, diagonalThreshold: 0.55 });
    assert.equal(config.input.enabled, false);
    assert.equal(config.keys.mode, 'log');
    assert.equal(config.stream.port, 9300);
    assert.deepEqual(config.stream.buttons, ['jump', 'boost', 'handbrake', 'airRollL', 'airRollR']);
    assert.equal(config.control.listenPort, 9000);
    assert.equal(config.library.path, 'macros.json');
  });

  it('should treat an empty document as all defaults', () => {
    assert.deepEqual(parseConfig(''), defaultConfig());
  });

  it('should parse partial YAML over the defaults', () => {
    const config = parseConfig([
      'playback:',
      '  toleranceMs: 500',
      '  frameMode: replace',
      'stream:',
      '  host: 192.168.1.20',
      '  port: 7777',
    ].join('\n'));

    assert.equal(config.playback.toleranceMs, 500);
    assert.equal(config.playback.pollIntervalMs, 10);
    assert.equal(config.playback.frameMode, 'replace');
    assert.equal(config.stream.host, '192.168.1.20');
    assert.equal(config.stream.port, 7777);
  });

  it('should report validation failures with their path', () => {
    assert.throws(
      () => parseConfig('stream:\n  port: 70000\n'),
      (err: unknown) => err instanceof Error
        && err.message.startsWith('[Config] Validation failed:\n')
        && err.message.includes('  - stream.port:'),
    );
  });

  it('should reject an unknown frame mode', () => {
    assert.throws(() => parseConfig('playback:\n  frameMode: sometimes\n'), /playback\.frameMode/);
  });

  it('should reject duplicate axis and button names', () => {
    assert.throws(
      () => parseConfig('stream:\n  axes: [throttle]\n  buttons: [throttle]\n'),
      /Axis and button names must be unique/,
    );
  });

  it('should report invalid YAML', () => {
    assert.throws(() => parseConfig('playback: [unclosed'), /^Error: \[Config\] Invalid YAML: /);
  });

  it('should fall back to defaults when the file is missing', () => {
    assert.deepEqual(loadConfig(path.join(TEST_DIR, 'missing.yml')), defaultConfig());
  });

  it('should log the config source to the given logger', () => {
    const lines: string[] = [];
    const log = pino({ level: 'info' }, { write: (msg: string) => { lines.push(msg); } });
    const missing = path.join(TEST_DIR, 'missing.yml');

    loadConfig(missing, log);
    assert.equal(lines.length, 1);
    assert.equal(JSON.parse(lines[0]).msg, `No config file found at ${missing}, using defaults`);
  });

  it('should load defaults without a logger', () => {
    assert.deepEqual(loadConfig(path.join(TEST_DIR, 'missing.yml'), null), defaultConfig());
  });

  it('should resolve the default config file in the working directory', () => {
    assert.equal(resolveConfigPath(), path.join(process.cwd(), 'macrodeck.yml'));
    assert.equal(resolveConfigPath('deck.yml'), 'deck.yml');
  });

  it('should load a config file from disk', () => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    const file = path.join(TEST_DIR, 'macrodeck.yml');
    fs.writeFileSync(file, 'keys:\n  mode: osc\n  port: 9400\n', 'utf-8');

    const config = loadConfig(file);
    assert.equal(config.keys.mode, 'osc');
    assert.equal(config.keys.port, 9400);
    assert.equal(config.keys.host, '127.0.0.1');
  });

  it('should apply dotted overrides and revalidate', () => {
    const config = applyOverrides(defaultConfig(), {
      'logging.verbose': true,
      'control.listenPort': 9555,
      'library.path': 'other.json',
    });
    assert.equal(config.logging.verbose, true);
    assert.equal(config.control.listenPort, 9555);
    assert.equal(config.library.path, 'other.json');
  });

  it('should reject overrides for unknown sections or invalid values', () => {
    assert.throws(() => applyOverrides(defaultConfig(), { 'osc.listenPort': 1 }), /Unknown override: osc\.listenPort/);
    assert.throws(() => applyOverrides(defaultConfig(), { 'control.listenPort': -1 }), /Invalid override/);
  });
});
