/**
 * Unit tests for env file loading
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadEnvFiles } from '../env-files';

describe('loadEnvFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'digest-env-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read both files from the given directory with .env.local first', async () => {
    await writeFile(path.join(dir, '.env.local'), 'SMTP_HOST=local.example.test\n');
    await writeFile(path.join(dir, '.env'), 'SMTP_HOST=shared.example.test\nFROM_EMAIL=digest@example.test\n');
    const target: NodeJS.ProcessEnv = {};

    loadEnvFiles(dir, target);

    expect(target).toEqual({ SMTP_HOST: 'local.example.test', FROM_EMAIL: 'digest@example.test' });
  });

  it('should keep values that are already set', async () => {
    await writeFile(path.join(dir, '.env'), 'LOG_LEVEL=debug\n');
    const target: NodeJS.ProcessEnv = { LOG_LEVEL: 'warn' };

    loadEnvFiles(dir, target);

    expect(target.LOG_LEVEL).toBe('warn');
  });

  it('should do nothing when neither file exists', () => {
    const target: NodeJS.ProcessEnv = {};

    loadEnvFiles(dir, target);

    expect(target).toEqual({});
  });
});
