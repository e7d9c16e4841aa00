// ─────────────────────────────────────────────
//  Choice Ledger — factions that have made their alliance choice
//  Immutable state via immer + subscribe, persisted as one faction
//  id per line. Every mutation rewrites the whole file.
// ─────────────────────────────────────────────

import { enableMapSet, produce, type Draft } from 'immer';
import { LEDGER_FILE_NAME } from '@/config';
import { parseId, type FactionId } from '@/engine/alliance/data/types/Faction';
import type { IWorldStorage } from '@/engine/loader/WorldStorage';
import { Logger } from '@/engine/utils/Logger';

enableMapSet();

export interface LedgerState {
  readonly committed: ReadonlySet<FactionId>;
}

type LedgerListener = (state: LedgerState) => void;

export interface RejectedLedgerLine {
  line: number;
  text: string;
}

export interface LedgerParseResult {
  ids: FactionId[];
  rejected: RejectedLedgerLine[];
}

/** Parse ledger text. Blank lines are ignored; anything else that is not an id is rejected. */
export function parseLedger(text: string): LedgerParseResult {
  const result: LedgerParseResult = { ids: [], rejected: [] };
  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim().length === 0) return;
    const id = parseId(raw);
    if (id === null) result.rejected.push({ line: index + 1, text: raw.trim() });
    else result.ids.push(id);
  });
  return result;
}

export function serializeLedger(state: LedgerState): string {
  return [...state.committed].map(id => `${id}\n`).join('');
}

export class ChoiceLedger {
  private state: LedgerState = { committed: new Set() };
  private listeners: LedgerListener[] = [];

  constructor(
    private readonly storage: IWorldStorage,
    private readonly fileName: string = LEDGER_FILE_NAME,
  ) {}

  getState(): LedgerState {
    return this.state;
  }

  has(factionId: FactionId): boolean {
    return this.state.committed.has(factionId);
  }

  get size(): number {
    return this.state.committed.size;
  }

  /** Replace the in-memory set with the persisted one. A failed read leaves the ledger empty. */
  load(): void {
    let ids: FactionId[] = [];
    try {
      if (this.storage.exists(this.fileName)) {
        const parsed = parseLedger(this.storage.read(this.fileName));
        for (const r of parsed.rejected) {
          Logger.log(`${this.fileName} line ${r.line}: ignored invalid faction id '${r.text}'`, 'warning');
        }
        ids = parsed.ids;
      }
    } catch (err) {
      Logger.log(`Error loading faction choices: ${Logger.describe(err)}`, 'error');
    }
    this.apply(draft => {
      draft.committed = new Set(ids);
    });
    Logger.log(`Loaded ${this.state.committed.size} faction choice records.`, 'system');
  }

  /** Record a completed choice and persist it before returning. */
  commit(factionId: FactionId): void {
    this.apply(draft => {
      draft.committed.add(factionId);
    });
    this.save();
  }

  /** Forget a choice. Returns whether the faction had one. */
  remove(factionId: FactionId, persist = true): boolean {
    const had = this.has(factionId);
    if (had) {
      this.apply(draft => {
        draft.committed.delete(factionId);
      });
    }
    if (persist) this.save();
    return had;
  }

  /** Rewrite the ledger file. Failures are logged; in-memory state stands. */
  save(): void {
    try {
      this.storage.write(this.fileName, serializeLedger(this.state));
    } catch (err) {
      Logger.log(`Error saving faction choices: ${Logger.describe(err)}`, 'error');
    }
  }

  subscribe(listener: LedgerListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private apply(recipe: (draft: Draft<LedgerState>) => void): void {
    const next = produce(this.state, recipe);
    if (next === this.state) return;
    this.state = next;
    for (const listener of this.listeners) listener(this.state);
  }
}
