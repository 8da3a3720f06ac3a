import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, resolveEnvRef, DEFAULT_CONFIG_FILE } from '../src/config/loader.js';
import { DEFAULT_NOISE_PATTERNS } from '../src/analysis/noise-filter.js';
import { ConfigurationError } from '../src/errors.js';

const env = { AZURE_DEVOPS_PAT: 'test-pat' };

describe('resolveEnvRef', () => {
  it('substitutes referenced variables', () => {
    expect(resolveEnvRef('Bearer ${TOKEN}', { TOKEN: 'abc' })).toBe('Bearer abc');
  });

  it('substitutes unset variables with an empty string', () => {
    expect(resolveEnvRef('${MISSING}', {})).toBe('');
  });

  it('leaves plain strings alone', () => {
    expect(resolveEnvRef('test-pat', {})).toBe('test-pat');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'insights-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown, name = 'insights.json'): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    return path;
  }

  it('loads a file, resolves the PAT and makes paths absolute', async () => {
    const path = await writeConfig({
      organization: 'contoso',
      project: 'Platform',
      outputDir: 'out',
    });

    const config = await loadConfig(path, {}, { cwd: dir, env });

    expect(config.organization).toBe('contoso');
    expect(config.project).toBe('Platform');
    expect(config.auth.pat).toBe('test-pat');
    expect(config.outputDir).toBe(join(dir, 'out'));
    expect(config.logDir).toBe(join(dir, 'logs'));
    expect(config.noisePolicy).toEqual({
      version: '1',
      minLength: 4,
      systemActorPrefix: 'microsoft.visualstudio.services.tfs',
      patterns: [...DEFAULT_NOISE_PATTERNS],
    });
  });

  it('lets overrides win over file values', async () => {
    const path = await writeConfig({ organization: 'contoso', project: 'Platform', logLevel: 'warn' });

    const config = await loadConfig(
      path,
      { project: 'Mobile', logLevel: 'debug', organization: undefined },
      { cwd: dir, env },
    );

    expect(config.organization).toBe('contoso');
    expect(config.project).toBe('Mobile');
    expect(config.logLevel).toBe('debug');
  });

  it('uses a literal PAT from the file', async () => {
    const path = await writeConfig({ organization: 'o', project: 'p', auth: { pat: 'test-secret' } });

    const config = await loadConfig(path, {}, { cwd: dir, env: {} });

    expect(config.auth.pat).toBe('test-secret');
  });

  it('appends extra noise patterns to the replaced list', async () => {
    const path = await writeConfig({
      organization: 'o',
      project: 'p',
      noise: { version: '2', patterns: ['bot says'], extraPatterns: ['^LGTM$'], minLength: 2 },
    });

    const config = await loadConfig(path, {}, { cwd: dir, env });

    expect(config.noisePolicy.version).toBe('2');
    expect(config.noisePolicy.minLength).toBe(2);
    expect(config.noisePolicy.patterns).toEqual(['bot says', '^LGTM$']);
  });

  it('runs from overrides alone when the default file is absent', async () => {
    const config = await loadConfig(
      DEFAULT_CONFIG_FILE,
      { organization: 'o', project: 'p' },
      { cwd: dir, env },
    );

    expect(config.organization).toBe('o');
    expect(config.outputDir).toBe(dir);
  });

  it('fails when an explicit config file is missing', async () => {
    const path = join(dir, 'nope.json');

    await expect(loadConfig(path, {}, { cwd: dir, env })).rejects.toThrow(
      `Config file not found: ${path}`,
    );
  });

  it('fails on malformed JSON', async () => {
    const path = await writeConfig('{ organization: ');

    await expect(loadConfig(path, {}, { cwd: dir, env })).rejects.toThrow(
      `Failed to parse config file: ${path}`,
    );
  });

  it('fails when the file holds something other than an object', async () => {
    const path = await writeConfig([1, 2]);

    await expect(loadConfig(path, {}, { cwd: dir, env })).rejects.toThrow(
      `Config file must contain a JSON object: ${path}`,
    );
  });

  it('lists every invalid field', async () => {
    const path = await writeConfig({ project: 'p', logLevel: 'loud' });

    const err = await loadConfig(path, {}, { cwd: dir, env }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof Error ? err.message : '').toMatch(/^Invalid config:\n {2}- organization: /);
    expect(err instanceof Error ? err.message : '').toContain('\n  - logLevel: ');
  });

  it('fails when no PAT can be resolved', async () => {
    const path = await writeConfig({ organization: 'o', project: 'p' });

    await expect(loadConfig(path, {}, { cwd: dir, env: {} })).rejects.toThrow(
      'No Azure DevOps personal access token configured. Set AZURE_DEVOPS_PAT or auth.pat in the config file.',
    );
  });
});
