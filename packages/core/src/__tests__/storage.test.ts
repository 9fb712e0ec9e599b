import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import {
  FileSystemObjectStore,
  GcsObjectStore,
  MemoryObjectStore,
  createObjectStore,
  validateKey,
} from '../storage/index.js';

describe('validateKey', () => {
  it('should accept nested keys', () => {
    expect(validateKey('_builder/pages/about.json')).toEqual({ valid: true });
  });

  it('should reject traversal and absolute keys', () => {
    expect(validateKey('')).toEqual({ valid: false, error: 'Key is required' });
    expect(validateKey('/etc/passwd')).toEqual({ valid: false, error: 'Key must not start with /' });
    expect(validateKey('pages/../../secret')).toEqual({ valid: false, error: 'Key must not contain ..' });
    expect(validateKey('pages//about')).toEqual({ valid: false, error: 'Key must not contain //' });
  });
});

describe('MemoryObjectStore', () => {
  it('should store, list and delete objects', async () => {
    const store = new MemoryObjectStore();
    await store.put('b.html', '<p>b</p>', 'text/html');
    await store.put('a.html', Buffer.from('<p>a</p>'), 'text/html');

    expect(await store.getText('a.html')).toBe('<p>a</p>');
    expect((await store.list()).map((o) => o.key)).toEqual(['a.html', 'b.html']);
    expect((await store.list('b'))[0]).toMatchObject({ key: 'b.html', size: 8, contentType: 'text/html' });
    expect(await store.delete('a.html')).toBe('deleted');
    expect(await store.delete('a.html')).toBe('absent');
    expect(await store.get('a.html')).toBeNull();
  });

  it('should reject invalid keys', async () => {
    const store = new MemoryObjectStore();
    await expect(store.put('../escape.html', 'x', 'text/html')).rejects.toThrow('Invalid object key');
  });
});

describe('FileSystemObjectStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'pagewright-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write keys as files under the root directory', async () => {
    const store = new FileSystemObjectStore(root);
    await store.put('_builder/pages/about.json', '{"id":"about"}', 'application/json');

    const onDisk = await readFile(path.join(root, '_builder', 'pages', 'about.json'), 'utf-8');
    expect(onDisk).toBe('{"id":"about"}');
    expect((await store.get('_builder/pages/about.json'))?.toString('utf-8')).toBe('{"id":"about"}');
  });

  it('should return null and absent for missing files', async () => {
    const store = new FileSystemObjectStore(root);

    expect(await store.get('missing.html')).toBeNull();
    expect(await store.delete('missing.html')).toBe('absent');
  });

  it('should list nested files with slash-separated keys', async () => {
    const store = new FileSystemObjectStore(root);
    await store.put('index.html', '<html></html>', 'text/html');
    await store.put('_builder/site.json', '{}', 'application/json');

    const objects = await store.list();
    expect(objects.map((o) => o.key)).toEqual(['_builder/site.json', 'index.html']);
    expect(objects[1].contentType).toBe('text/html');
    expect((await store.list('_builder/')).map((o) => o.key)).toEqual(['_builder/site.json']);
  });

  it('should list nothing when the root does not exist yet', async () => {
    const store = new FileSystemObjectStore(path.join(root, 'not-created'));
    expect(await store.list()).toEqual([]);
  });
});

describe('createObjectStore', () => {
  it('should create the configured backend', () => {
    expect(createObjectStore(loadConfig({ PAGEWRIGHT_STORE: 'memory' }))).toBeInstanceOf(MemoryObjectStore);
    expect(createObjectStore(loadConfig({ PAGEWRIGHT_ROOT: '/tmp/site' }))).toBeInstanceOf(FileSystemObjectStore);
    expect(
      createObjectStore(loadConfig({ PAGEWRIGHT_STORE: 'gcs', PAGEWRIGHT_BUCKET: 'test-bucket' }))
    ).toBeInstanceOf(GcsObjectStore);
  });

  it('should refuse gcs without a bucket', () => {
    expect(() => createObjectStore(loadConfig({ PAGEWRIGHT_STORE: 'gcs' }))).toThrow(ConfigError);
  });
});
