import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { LogLevel } from '../../src/types';
import { findConfigFile, getDefaultConfig, loadConfig, saveConfig } from '../../src/utils/config';
import { ValidationError } from '../../src/utils/validators';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pstack-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', () => {
    expect(loadConfig(tempDir)).toEqual({
      stack: { timeoutMs: 30_000, restoreCwdAfterRoot: false },
      log: { level: LogLevel.INFO, file: false },
    });
  });

  it('should merge a YAML config over the defaults', () => {
    fs.writeFileSync(
      path.join(tempDir, 'pstack.config.yaml'),
      'stack:\n  timeoutMs: 500\nlog:\n  level: debug\n',
      'utf-8',
    );

    expect(loadConfig(tempDir)).toEqual({
      stack: { timeoutMs: 500, restoreCwdAfterRoot: false },
      log: { level: LogLevel.DEBUG, file: false },
    });
  });

  it('should read a JSON config', () => {
    fs.writeFileSync(
      path.join(tempDir, 'pstack.config.json'),
      JSON.stringify({ stack: { restoreCwdAfterRoot: true } }),
      'utf-8',
    );

    expect(loadConfig(tempDir).stack.restoreCwdAfterRoot).toBe(true);
  });

  it('should prefer pstack.config.yaml over .pstackrc', () => {
    fs.writeFileSync(path.join(tempDir, '.pstackrc'), 'log:\n  file: true\n', 'utf-8');
    fs.writeFileSync(path.join(tempDir, 'pstack.config.yaml'), 'log:\n  level: warn\n', 'utf-8');

    expect(findConfigFile(tempDir)).toBe(path.join(tempDir, 'pstack.config.yaml'));
    expect(loadConfig(tempDir).log).toEqual({ level: LogLevel.WARN, file: false });
  });

  it('should treat an empty file as defaults', () => {
    fs.writeFileSync(path.join(tempDir, '.pstackrc'), '', 'utf-8');

    expect(loadConfig(tempDir)).toEqual(getDefaultConfig());
  });

  it('should reject a non-positive timeout', () => {
    fs.writeFileSync(path.join(tempDir, 'pstack.config.yaml'), 'stack:\n  timeoutMs: -1\n', 'utf-8');

    let caught: unknown;
    try {
      loadConfig(tempDir);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field: 'stack.timeoutMs' });
  });

  it('should reject an unknown log level', () => {
    fs.writeFileSync(path.join(tempDir, 'pstack.config.yaml'), 'log:\n  level: chatty\n', 'utf-8');

    expect(() => loadConfig(tempDir)).toThrow(/log\.level/);
  });

  it('should save a config that loads back unchanged', () => {
    const config = getDefaultConfig();
    config.stack.timeoutMs = 1234;

    const filePath = saveConfig(tempDir, config);

    expect(filePath).toBe(path.join(tempDir, 'pstack.config.yaml'));
    expect(loadConfig(tempDir)).toEqual(config);
  });
});
