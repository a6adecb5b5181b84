import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { coerceConfigValue, ConfigManager, getDefaultConfig, parseConfig } from '../../src/core/config.js';
import { getDefaultRuntimeRoot, getPkgsightDirectories } from '../../src/core/directory.js';
import { exists } from '../../src/utils/fs.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('ConfigManager', () => {
  let configDir: string;
  let savedRoot: string | undefined;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'pkgsight-config-'));
    savedRoot = process.env.PKGSIGHT_RUNTIME_ROOT;
    delete process.env.PKGSIGHT_RUNTIME_ROOT;
  });

  afterEach(async () => {
    if (savedRoot === undefined) {
      delete process.env.PKGSIGHT_RUNTIME_ROOT;
    } else {
      process.env.PKGSIGHT_RUNTIME_ROOT = savedRoot;
    }
    await rm(configDir, { recursive: true, force: true });
  });

  it('treats a missing file as empty without writing one', async () => {
    const manager = new ConfigManager(configDir);
    assert.deepEqual(await manager.load(), {});
    assert.equal(await exists(join(configDir, 'config.jsonc')), false);
  });

  it('layers defaults, file, environment and overrides', async () => {
    await writeFile(join(configDir, 'config.jsonc'), '{\n  // tuned for CI\n  "maxWorkers": 2,\n  "ecosystem": "npm",\n}\n');
    process.env.PKGSIGHT_RUNTIME_ROOT = '/opt/runtimes';

    const resolved = await new ConfigManager(configDir).resolve({ maxWorkers: 6, matchRatio: undefined });
    assert.deepEqual(resolved, {
      ...getDefaultConfig(),
      ecosystem: 'npm',
      runtimeRoot: '/opt/runtimes',
      maxWorkers: 6
    });
  });

  it('lets an explicit root beat the environment', async () => {
    process.env.PKGSIGHT_RUNTIME_ROOT = '/opt/runtimes';
    const resolved = await new ConfigManager(configDir).resolve({ runtimeRoot: '/srv/python' });
    assert.equal(resolved.runtimeRoot, '/srv/python');
  });

  it('ignores unknown keys and rejects invalid values', async () => {
    assert.deepEqual(parseConfig({ ecosystem: 'cargo', colour: 'blue' }), { ecosystem: 'cargo' });
    assert.throws(() => parseConfig({ maxWorkers: 0 }), ConfigError);
    assert.throws(() => parseConfig({ matchRatio: 101 }), ConfigError);
    assert.throws(() => parseConfig([]), ConfigError);
  });

  it('wraps unreadable files in a ConfigError', async () => {
    await writeFile(join(configDir, 'config.jsonc'), '{ "maxWorkers": ');
    await assert.rejects(new ConfigManager(configDir).load(), ConfigError);
  });

  it('persists values', async () => {
    const manager = new ConfigManager(configDir);
    await manager.set('matchRatio', 90);

    const written = JSON.parse(await readFile(join(configDir, 'config.jsonc'), 'utf8'));
    assert.deepEqual(written, { matchRatio: 90 });
    assert.deepEqual(await new ConfigManager(configDir).load(), { matchRatio: 90 });
    assert.equal(await manager.get('matchRatio'), 90);
  });

  it('coerces command-line values', () => {
    assert.deepEqual(coerceConfigValue('ignorePatterns', 'pyobjc, setuptools,,'), ['pyobjc', 'setuptools']);
    assert.equal(coerceConfigValue('maxWorkers', '12'), 12);
    assert.throws(() => coerceConfigValue('maxWorkers', 'many'), ConfigError);
  });
});

describe('directories', () => {
  it('keeps configuration under a dot directory', () => {
    assert.deepEqual(getPkgsightDirectories('/home/tester'), { config: join('/home/tester', '.pkgsight') });
  });

  it('picks the runtime root per platform', () => {
    assert.equal(getDefaultRuntimeRoot('darwin'), '/Library/Frameworks/Python.framework/Versions');
    assert.equal(getDefaultRuntimeRoot('linux'), '/usr/lib');
  });
});
