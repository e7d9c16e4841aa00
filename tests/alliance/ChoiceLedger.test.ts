import { describe, it, expect, vi, afterEach } from 'vitest';
import { LEDGER_FILE_NAME } from '@/config';
import { ChoiceLedger, parseLedger, serializeLedger } from '@/engine/alliance/state/ChoiceLedger';
import { MemoryWorldStorage } from '@/engine/loader/WorldStorage';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseLedger', () => {
  it('reads one id per line and reports anything else by line number', () => {
    expect(parseLedger('100\n  200 \n\nabc\n-5\n1.5\n300')).toEqual({
      ids: [100n, 200n, -5n, 300n],
      rejected: [{ line: 4, text: 'abc' }, { line: 6, text: '1.5' }],
    });
  });

  it('keeps ids beyond the double-precision range exact', () => {
    const { ids } = parseLedger('144115188075855873\n144115188075855872\n18446744073709551615\n');
    expect(ids).toEqual([144115188075855873n, 144115188075855872n, 18446744073709551615n]);
  });

  it('accepts CRLF line endings', () => {
    expect(parseLedger('7\r\n8\r\n').ids).toEqual([7n, 8n]);
  });
});

describe('ChoiceLedger', () => {
  it('starts empty when no ledger file exists', () => {
    const ledger = new ChoiceLedger(new MemoryWorldStorage());
    ledger.load();
    expect(ledger.size).toBe(0);
  });

  it('loads the persisted set', () => {
    const storage = new MemoryWorldStorage({ [LEDGER_FILE_NAME]: '100\n200\n' });
    const ledger = new ChoiceLedger(storage);
    ledger.load();
    expect(ledger.has(100n)).toBe(true);
    expect(ledger.has(200n)).toBe(true);
    expect(ledger.has(300n)).toBe(false);
  });

  it('round-trips a 64-bit faction id through save and load', () => {
    const storage = new MemoryWorldStorage();
    new ChoiceLedger(storage).commit(144115188075855873n);
    expect(storage.read(LEDGER_FILE_NAME)).toBe('144115188075855873\n');

    const reloaded = new ChoiceLedger(storage);
    reloaded.load();
    expect(reloaded.size).toBe(1);
    expect(reloaded.has(144115188075855873n)).toBe(true);
    expect(reloaded.has(144115188075855872n)).toBe(false);
  });

  it('warns about every line it cannot read as an id', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const storage = new MemoryWorldStorage({ [LEDGER_FILE_NAME]: '100\nMYFC\n200\n' });
    const ledger = new ChoiceLedger(storage);
    ledger.load();

    expect(ledger.size).toBe(2);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      "[FactionAlliance:WARNING] Alliance_FactionChoices.dat line 2: ignored invalid faction id 'MYFC'",
    );
  });

  it('starts empty and logs when the file cannot be read', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const storage = new MemoryWorldStorage({ [LEDGER_FILE_NAME]: '100\n' });
    vi.spyOn(storage, 'read').mockImplementation(() => { throw new Error('disk on fire'); });

    const ledger = new ChoiceLedger(storage);
    ledger.load();

    expect(ledger.size).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith('[FactionAlliance:ERROR] Error loading faction choices: disk on fire');
  });

  it('persists every commit immediately', () => {
    const storage = new MemoryWorldStorage();
    const ledger = new ChoiceLedger(storage);
    ledger.commit(100n);
    expect(storage.read(LEDGER_FILE_NAME)).toBe('100\n');
    ledger.commit(200n);
    expect(storage.read(LEDGER_FILE_NAME)).toBe('100\n200\n');
  });

  it('removes entries and reports whether one existed', () => {
    const storage = new MemoryWorldStorage();
    const ledger = new ChoiceLedger(storage);
    ledger.commit(100n);

    expect(ledger.remove(100n)).toBe(true);
    expect(ledger.remove(100n)).toBe(false);
    expect(storage.read(LEDGER_FILE_NAME)).toBe('');
  });

  it('defers the write when asked not to persist', () => {
    const storage = new MemoryWorldStorage();
    const ledger = new ChoiceLedger(storage);
    ledger.commit(100n);
    ledger.commit(200n);

    ledger.remove(100n, false);
    expect(storage.read(LEDGER_FILE_NAME)).toBe('100\n200\n');
    ledger.save();
    expect(storage.read(LEDGER_FILE_NAME)).toBe('200\n');
  });

  it('keeps the in-memory entry when saving fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const storage = new MemoryWorldStorage();
    vi.spyOn(storage, 'write').mockImplementation(() => { throw new Error('read-only'); });

    const ledger = new ChoiceLedger(storage);
    ledger.commit(100n);

    expect(ledger.has(100n)).toBe(true);
    expect(errorSpy).toHaveBeenCalledWith('[FactionAlliance:ERROR] Error saving faction choices: read-only');
  });

  it('produces a new immutable state per change and notifies subscribers', () => {
    const ledger = new ChoiceLedger(new MemoryWorldStorage());
    const listener = vi.fn();
    const unsubscribe = ledger.subscribe(listener);
    const before = ledger.getState();

    ledger.commit(100n);
    const after = ledger.getState();

    expect(after).not.toBe(before);
    expect(before.committed.has(100n)).toBe(false);
    expect(listener).toHaveBeenCalledWith(after);

    unsubscribe();
    ledger.commit(200n);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('does not notify when a commit changes nothing', () => {
    const ledger = new ChoiceLedger(new MemoryWorldStorage());
    ledger.commit(100n);
    const listener = vi.fn();
    ledger.subscribe(listener);
    ledger.commit(100n);
    expect(listener).not.toHaveBeenCalled();
  });

  it('serializes in insertion order', () => {
    expect(serializeLedger({ committed: new Set([3n, 1n, 2n]) })).toBe('3\n1\n2\n');
  });
});
