/**
 * Unit Tests: Targets configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  loadTargetsConfig,
  selectTargets,
  validateTargetsConfig,
  TargetsConfigError,
} from '../../src/config/targets.js';
import { cleanupTempDir, createTempDir, makeTarget } from '../helpers/fakes.js';

let root: string;
let toolDir: string;

beforeEach(() => {
  root = createTempDir();
  toolDir = join(root, 'project');
  mkdirSync(toolDir);
});

afterEach(() => {
  cleanupTempDir(root);
});

function write(name: string, content: string): string {
  const path = join(toolDir, name);
  writeFileSync(path, content);
  return path;
}

async function configError(promise: Promise<unknown>): Promise<TargetsConfigError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TargetsConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a TargetsConfigError');
}

describe('loadTargetsConfig', () => {
  it('loads JSON and places checkouts beside the config directory', async () => {
    write(
      'plugins.json',
      JSON.stringify({
        plugins: [
          { name: 'redis', repo: 'example-org/redis-plugin' },
          { name: 'kafka', repo: 'example-org/kafka-plugin', releaseBody: 'Kafka notes' },
        ],
      })
    );

    const loaded = await loadTargetsConfig('plugins.json', toolDir);

    expect(loaded.root).toBe(root);
    expect(loaded.configPath).toBe(join(toolDir, 'plugins.json'));
    expect(loaded.targets).toEqual([
      {
        name: 'redis',
        workingDirectory: join(root, 'redis'),
        repository: { owner: 'example-org', name: 'redis-plugin' },
        releaseBody: undefined,
      },
      {
        name: 'kafka',
        workingDirectory: join(root, 'kafka'),
        repository: { owner: 'example-org', name: 'kafka-plugin' },
        releaseBody: 'Kafka notes',
      },
    ]);
  });

  it('loads YAML with a custom root and per-plugin paths', async () => {
    const path = write(
      'plugins.yaml',
      [
        'root: ./checkouts',
        'plugins:',
        '  - name: redis',
        '    repo: example-org/redis-plugin',
        '  - name: kafka',
        '    repo: example-org/kafka-plugin',
        '    path: mq/kafka',
        '  - name: legacy',
        '    repo: example-org/legacy-plugin',
        '    enabled: false',
        '',
      ].join('\n')
    );

    const loaded = await loadTargetsConfig(path);

    expect(loaded.root).toBe(join(toolDir, 'checkouts'));
    expect(loaded.targets.map((target) => [target.name, target.workingDirectory])).toEqual([
      ['redis', join(toolDir, 'checkouts', 'redis')],
      ['kafka', join(toolDir, 'checkouts', 'mq', 'kafka')],
    ]);
  });

  it('fails when the file is missing', async () => {
    const err = await configError(loadTargetsConfig('missing.json', toolDir));
    expect(err.code).toBe('CONFIG_NOT_FOUND');
    expect(err.suggestion).toBe('Create plugins.json or pass --config <path>');
  });

  it('fails on unparsable content', async () => {
    write('plugins.json', '{ "plugins": [');
    const err = await configError(loadTargetsConfig('plugins.json', toolDir));
    expect(err.code).toBe('CONFIG_PARSE_ERROR');
  });

  it('fails with every validation issue', async () => {
    write(
      'plugins.json',
      JSON.stringify({
        plugins: [
          { name: 'redis', repo: 'not-a-slug' },
          { repo: 'example-org/kafka-plugin' },
        ],
      })
    );

    const err = await configError(loadTargetsConfig('plugins.json', toolDir));

    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.issues.map((issue) => [issue.code, issue.path])).toEqual([
      ['INVALID_REPOSITORY', 'plugins[0].repo'],
      ['MISSING_REQUIRED_FIELD', 'plugins[1].name'],
    ]);
  });
});

describe('validateTargetsConfig', () => {
  it('requires a plugins list', () => {
    const { issues } = validateTargetsConfig({ root: '..' });
    expect(issues).toEqual([
      { code: 'MISSING_REQUIRED_FIELD', message: 'Config must contain a "plugins" list', path: 'plugins' },
    ]);
  });

  it('rejects duplicate names', () => {
    const { issues, config } = validateTargetsConfig({
      plugins: [
        { name: 'redis', repo: 'example-org/redis-plugin' },
        { name: 'redis', repo: 'example-org/redis-fork' },
      ],
    });
    expect(issues.map((issue) => issue.code)).toEqual(['DUPLICATE_TARGET_NAME']);
    expect(config.plugins).toHaveLength(1);
  });

  it('rejects a config where every plugin is disabled', () => {
    const { issues } = validateTargetsConfig({
      plugins: [{ name: 'redis', repo: 'example-org/redis-plugin', enabled: false }],
    });
    expect(issues.map((issue) => issue.code)).toEqual(['NO_ENABLED_TARGETS']);
  });

  it('rejects an empty list', () => {
    expect(validateTargetsConfig({ plugins: [] }).issues).toEqual([
      { code: 'NO_ENABLED_TARGETS', message: 'No enabled plugins configured' },
    ]);
  });
});

describe('selectTargets', () => {
  const targets = [makeTarget('redis', '/w/redis'), makeTarget('kafka', '/w/kafka')];

  it('returns every target without a name', () => {
    expect(selectTargets(targets).map((target) => target.name)).toEqual(['redis', 'kafka']);
  });

  it('narrows to one target', () => {
    expect(selectTargets(targets, 'kafka')).toEqual([targets[1]]);
  });

  it('lists available names on a miss', () => {
    try {
      selectTargets(targets, 'nats');
      expect.fail('expected a throw');
    } catch (err) {
      expect(err).toBeInstanceOf(TargetsConfigError);
      if (err instanceof TargetsConfigError) {
        expect(err.message).toBe('Plugin "nats" is not configured');
        expect(err.suggestion).toBe('Available plugins: redis, kafka');
      }
    }
  });
});
