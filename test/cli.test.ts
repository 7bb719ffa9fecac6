import nock from 'nock';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import { USAGE, parseMode, runCli } from '../src/cli';
import type { PlaysConfig, ProviderCredentials } from '../src/types/plays';
import { collectLines, credentials, quietLogger, writeTempList } from './helpers';

function context(setsFile: string, creds: () => ProviderCredentials = credentials()) {
  const stdout = collectLines();
  const stderr = collectLines();
  const config: PlaysConfig = {
    setsFile,
    userAgent: 'test-agent',
    logging: { level: 'error', silent: true },
  };
  return { stdout, stderr, ctx: { config, credentials: creds, stdout: stdout.write, stderr: stderr.write, logger: quietLogger } };
}

describe('parseMode', () => {
  it('maps arguments to modes', () => {
    expect(parseMode([])).toBe('aggregate');
    expect(parseMode(['sort'])).toBe('sort');
    expect(parseMode(['sort', 'extra'])).toBeNull();
    expect(parseMode(['--sort'])).toBeNull();
  });
});

describe('runCli', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('annotates a set hosted on YouTube and prints totals', async () => {
    const file = writeTempList('# Sets\n\n* [Test Set](http://example.test/set)\n');
    nock('http://example.test')
      .get('/set')
      .reply(200, '<iframe src="https://www.youtube.com/watch?v=abc123"></iframe>');
    nock('https://www.googleapis.com')
      .get('/youtube/v3/videos')
      .query({ part: 'statistics', id: 'abc123', key: 'test-key' })
      .reply(200, { items: [{ statistics: { viewCount: '2500' } }] });
    const { stdout, ctx } = context(file, credentials({ youtube: { apiKey: 'test-key' } }));

    await expect(runCli([], ctx)).resolves.toBe(0);

    expect(stdout.lines).toEqual([
      '* [Test Set](http://example.test/set) _//_ 2.5k🎧',
      '',
      'Total plays: **2.5k🎧**',
      'Total amount of sets: **1🎶**',
    ]);
  });

  it('emits one line per distinct entry', async () => {
    const file = writeTempList(
      [
        '* [A](http://example.test/a)',
        '* [A again](http://example.test/a)',
        '* Coming soon',
        '* Coming soon',
      ].join('\n')
    );
    nock('http://example.test').get('/a').reply(200, '<p>no providers</p>');
    const { stdout, ctx } = context(file);

    await expect(runCli([], ctx)).resolves.toBe(0);

    expect(stdout.lines).toEqual([
      '* [A](http://example.test/a)',
      '* Coming soon',
      '',
      'Total plays: **0🎧**',
      'Total amount of sets: **2🎶**',
    ]);
  });

  it('sorts an annotated list without network access', async () => {
    const file = writeTempList('* [A](http://example.test/a) _//_ 10🎧\n* [B](http://example.test/b) _//_ 1.1k🎧\n');
    const { stdout, ctx } = context(file);

    await expect(runCli(['sort'], ctx)).resolves.toBe(0);

    expect(stdout.lines).toEqual(['* [B](http://example.test/b) _//_ 1.1k🎧', '* [A](http://example.test/a) _//_ 10🎧']);
  });

  it('exits 1 when the list cannot be read', async () => {
    const missing = path.join(os.tmpdir(), 'set-plays-missing', 'all-sets.md');
    const { stdout, stderr, ctx } = context(missing);

    await expect(runCli([], ctx)).resolves.toBe(1);
    await expect(runCli(['sort'], ctx)).resolves.toBe(1);

    expect(stdout.lines).toEqual([]);
    expect(stderr.lines).toHaveLength(2);
    expect(stderr.lines[0]?.startsWith(`Error: Could not read set list ${missing}: `)).toBe(true);
  });

  it('prints usage and exits 2 for unknown arguments', async () => {
    const { stderr, ctx } = context('unused.md');

    await expect(runCli(['shuffle'], ctx)).resolves.toBe(2);
    expect(stderr.lines).toEqual([USAGE]);
  });
});
