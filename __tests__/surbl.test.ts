import fs from 'fs';
import os from 'os';
import path from 'path';
import Surbl, { ConfigError, IOError, TransientNetworkError, type TldFetcher } from '../lib';

const ZONE = 'multi.surbl.test';

describe('Surbl', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'surbl-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function create(fetcher: TldFetcher, answers: Record<string, string[]> = {}) {
    const resolve4 = jest.fn(async (name: string) => {
      const a = answers[name];
      if (!a) throw Object.assign(new Error(`queryA ENOTFOUND ${name}`), { code: 'ENOTFOUND' });
      return a;
    });
    const fetchMock = jest.fn(fetcher);
    const surbl = new Surbl(
      { cacheDir: dir, zone: ZONE, resultCacheTtlMs: 0, twoLevelUrl: 'http://tld.test/2', threeLevelUrl: 'http://tld.test/3' },
      { resolver: { resolve4 }, fetcher: fetchMock },
    );
    return { surbl, resolve4, fetchMock };
  }

  const lists: TldFetcher = async (url) => ({
    status: 'fresh',
    body: url.endsWith('/2') ? 'co.uk\ncom.au\n' : 'blogspot.co.uk\n',
  });

  test('load downloads the lists into the cache directory', async () => {
    const { surbl } = create(lists);

    await expect(surbl.load()).resolves.toBe(true);
    expect(fs.readFileSync(path.join(dir, 'tlds.2'), 'utf8')).toBe('co.uk\ncom.au\n');
    expect(fs.readFileSync(path.join(dir, 'tlds.3'), 'utf8')).toBe('blogspot.co.uk\n');
  });

  test('second load in the freshness window changes nothing', async () => {
    const { surbl, fetchMock } = create(lists);
    await surbl.load();

    await expect(surbl.refresh()).resolves.toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test('a new instance reads the cached files after a restart', async () => {
    await create(lists).surbl.load();

    const { surbl, fetchMock } = create(async (url) => {
      throw new TransientNetworkError(url);
    });
    await expect(surbl.load()).resolves.toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(surbl.provider.tableFor(2).has('com.au')).toBe(true);
  });

  test('load fails with IOError when nothing can be loaded', async () => {
    const { surbl } = create(async (url) => {
      throw new TransientNetworkError(url);
    });
    await expect(surbl.load()).rejects.toBeInstanceOf(IOError);
  });

  test('check end to end', async () => {
    const { surbl, resolve4 } = create(lists, { [`example.co.uk.${ZONE}.`]: ['127.0.0.2'] });
    await surbl.load();

    await expect(surbl.check('www.example.co.uk')).resolves.toBe(true);
    await expect(surbl.check('www.acme.com')).resolves.toBe(false);
    expect(resolve4.mock.calls.map(([n]) => n)).toEqual([`example.co.uk.${ZONE}.`, `acme.com.${ZONE}.`]);

    const detail = await surbl.checkDetailed('www.example.co.uk');
    expect(detail.query).toBe(`example.co.uk.${ZONE}.`);

    await expect(surbl.checkMany(['a.example.co.uk', 'localhost'])).resolves.toEqual({
      'a.example.co.uk': true,
      localhost: false,
    });
  });

  test('constructor throws ConfigError for an unusable cache directory', () => {
    const file = path.join(dir, 'file');
    fs.writeFileSync(file, '');
    expect(() => new Surbl({ cacheDir: file })).toThrow(ConfigError);
  });
});
