import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import {
  findConfigFiles,
  findSettingsFile,
  patternForName,
} from '../../src/utils/detect.js';

describe('findConfigFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kamut-detect-'));
    await writeFile(join(dir, 'test2.kamut.yaml'), '');
    await writeFile(join(dir, 'test1.kamut.yaml'), '');
    await writeFile(join(dir, 'test3.yaml'), '');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds only matching files, sorted', async () => {
    const files = await findConfigFiles(`${dir}/*.kamut.yaml`);

    expect(files).toEqual([join(dir, 'test1.kamut.yaml'), join(dir, 'test2.kamut.yaml')]);
  });

  it('returns nothing when no file matches', async () => {
    expect(await findConfigFiles(`${dir}/*-kamut.yaml`)).toEqual([]);
  });
});

describe('patternForName', () => {
  it('builds a single-file pattern', () => {
    expect(patternForName('api')).toBe('api.kamut.yaml');
  });
});

describe('findSettingsFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kamut-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when there is no settings file', () => {
    expect(findSettingsFile(dir)).toBeNull();
  });

  it('finds kamut.config.yaml', async () => {
    await writeFile(join(dir, 'kamut.config.yaml'), 'kindPolicy: infer\n');

    expect(findSettingsFile(dir)).toBe(join(dir, 'kamut.config.yaml'));
  });
});
