/**
 * Unit tests for the JSON Lines ledger store
 *
 * @see src/services/ledger/file-store.ts
 */

import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  fs,
  path,
  FileLedgerStore,
  LedgerCorruptionError,
  isTornPrefix,
  parseEntry,
  serializeEntry,
  createTempDir,
  removeTempDir,
  type LedgerEntry,
} from './helpers.js';

const ENTRY_A: LedgerEntry = { documentId: 'doc-a', processedAt: '2024-01-01T00:00:00.000Z' };
const ENTRY_B: LedgerEntry = { documentId: 'doc-b', processedAt: '2024-01-01T00:00:01.000Z' };

describe('isTornPrefix', () => {
  it('accepts a cut-off entry opening', () => {
    expect(isTornPrefix('{"documentId":"doc-b","proc')).toBe(true);
    expect(isTornPrefix('{"docu')).toBe(true);
  });

  it('rejects text that is not an entry opening', () => {
    expect(isTornPrefix('\0\0garbage-bytes-not-a-ledger')).toBe(false);
    expect(isTornPrefix('{"checksum":"sha256:00"')).toBe(false);
  });

  it('rejects a complete JSON object', () => {
    expect(isTornPrefix('{"documentId":"doc-b"}')).toBe(false);
  });
});

describe('serializeEntry / parseEntry', () => {
  it('writes one newline-terminated JSON line with a checksum', () => {
    const line = serializeEntry(ENTRY_A);
    expect(line.endsWith('\n')).toBe(true);
    const raw: unknown = JSON.parse(line);
    expect(raw).toMatchObject({ documentId: 'doc-a', processedAt: '2024-01-01T00:00:00.000Z' });
    expect(raw).toHaveProperty('checksum');
  });

  it('parses a line it wrote', () => {
    expect(parseEntry(serializeEntry(ENTRY_A).trimEnd())).toEqual(ENTRY_A);
  });

  it('rejects a line whose checksum does not match', () => {
    const tampered = serializeEntry(ENTRY_A).replace('doc-a', 'doc-x');
    expect(parseEntry(tampered)).toBeNull();
  });

  it('rejects non-JSON and incomplete objects', () => {
    expect(parseEntry('not json')).toBeNull();
    expect(parseEntry('{"documentId":"doc-a"}')).toBeNull();
  });
});

describe('FileLedgerStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = createTempDir();
    file = path.join(dir, 'nested', 'ledger.jsonl');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('loads an empty list when the file does not exist', async () => {
    const store = new FileLedgerStore(file);
    expect(await store.load()).toEqual([]);
  });

  it('persists appended entries across instances', async () => {
    const writer = new FileLedgerStore(file);
    await writer.load();
    await writer.append(ENTRY_A);
    await writer.append(ENTRY_B);
    await writer.flush();
    await writer.close();

    const reader = new FileLedgerStore(file);
    expect(await reader.load()).toEqual([ENTRY_A, ENTRY_B]);
    expect(fs.readFileSync(file, 'utf-8')).toBe(serializeEntry(ENTRY_A) + serializeEntry(ENTRY_B));
  });

  it('reports the location as an absolute path', () => {
    const store = new FileLedgerStore('relative/ledger.jsonl');
    expect(path.isAbsolute(store.location)).toBe(true);
  });

  it('refuses a file with an invalid complete line and names the line', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeEntry(ENTRY_A) + 'garbage\n' + serializeEntry(ENTRY_B));

    const store = new FileLedgerStore(file);
    const error = await store.load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LedgerCorruptionError);
    expect(error).toMatchObject({ line: 2, location: store.location });
  });

  it('refuses a file whose checksum was edited by hand', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeEntry(ENTRY_A).replace('2024-01-01T00:00:00.000Z', '2023-01-01T00:00:00.000Z'));

    await expect(new FileLedgerStore(file).load()).rejects.toBeInstanceOf(LedgerCorruptionError);
  });

  it('refuses a file that lists the same document twice', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const again: LedgerEntry = { documentId: 'doc-a', processedAt: '2024-01-02T00:00:00.000Z' };
    fs.writeFileSync(file, serializeEntry(ENTRY_A) + serializeEntry(again));

    const error = await new FileLedgerStore(file).load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LedgerCorruptionError);
    expect(error).toMatchObject({ line: 2 });
  });

  it('keeps and re-terminates a valid torn final entry', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeEntry(ENTRY_A) + serializeEntry(ENTRY_B).trimEnd());

    const entries = await new FileLedgerStore(file).load();

    expect(entries).toEqual([ENTRY_A, ENTRY_B]);
    expect(fs.readFileSync(file, 'utf-8')).toBe(serializeEntry(ENTRY_A) + serializeEntry(ENTRY_B));
  });

  it('cuts off an invalid torn final line', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeEntry(ENTRY_A) + '{"documentId":"doc-b","proc');

    const entries = await new FileLedgerStore(file).load();

    expect(entries).toEqual([ENTRY_A]);
    expect(fs.readFileSync(file, 'utf-8')).toBe(serializeEntry(ENTRY_A));
  });

  it('appends after a repaired tail without merging lines', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeEntry(ENTRY_A) + '{"docu');

    const store = new FileLedgerStore(file);
    await store.load();
    await store.append(ENTRY_B);
    await store.close();

    expect(await new FileLedgerStore(file).load()).toEqual([ENTRY_A, ENTRY_B]);
  });

  it('refuses a file that holds only garbage and leaves it as it was', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '\0\0garbage-bytes-not-a-ledger');

    const error = await new FileLedgerStore(file).load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerCorruptionError);
    expect(error).toMatchObject({ line: 1 });
    expect(fs.readFileSync(file, 'utf-8')).toBe('\0\0garbage-bytes-not-a-ledger');
  });

  it('refuses unterminated garbage after valid lines', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const content = serializeEntry(ENTRY_A) + 'garbage';
    fs.writeFileSync(file, content);

    const error = await new FileLedgerStore(file).load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerCorruptionError);
    expect(error).toMatchObject({ line: 2 });
    expect(fs.readFileSync(file, 'utf-8')).toBe(content);
  });

  it('refuses an unterminated entry whose checksum does not match', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const content = serializeEntry(ENTRY_A) + serializeEntry(ENTRY_B).trimEnd().replace('doc-b', 'doc-x');
    fs.writeFileSync(file, content);

    await expect(new FileLedgerStore(file).load()).rejects.toBeInstanceOf(LedgerCorruptionError);
    expect(fs.readFileSync(file, 'utf-8')).toBe(content);
  });

  it('drops a torn entry opening when it is the only line', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{"documentId":"doc-a","processedAt":"2024-01');

    expect(await new FileLedgerStore(file).load()).toEqual([]);
    expect(fs.readFileSync(file, 'utf-8')).toBe('');
  });
});
