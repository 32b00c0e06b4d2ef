import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_SOURCES, loadSources } from '../sources';

describe('sources', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'metals-sources-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('bundles the default feed list', () => {
    expect(DEFAULT_SOURCES.map((s) => s.id)).toEqual([
      'rbc_economics',
      'finam_news',
      'investing_commodities',
      'vedomosti_economics',
    ]);
    expect(loadSources()).toBe(DEFAULT_SOURCES);
    expect(Object.keys(DEFAULT_SOURCES[0])).toEqual(['id', 'name', 'feedUrls']);
  });

  it('loads a configured file', () => {
    const file = path.join(dir, 'feeds.json');
    writeFileSync(
      file,
      JSON.stringify([{ id: 'local', name: 'Local wire', feedUrls: ['https://feeds.example/rss'] }]),
      'utf-8'
    );
    expect(loadSources(file)).toEqual([{ id: 'local', name: 'Local wire', feedUrls: ['https://feeds.example/rss'] }]);
  });

  it('rejects a source without feeds', () => {
    const file = path.join(dir, 'feeds.json');
    writeFileSync(file, JSON.stringify([{ id: 'empty', name: 'Empty', feedUrls: [] }]), 'utf-8');
    expect(() => loadSources(file)).toThrow();
  });
});
