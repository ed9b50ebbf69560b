import fs from 'fs/promises';
import path from 'path';
import {
  deserializeGameFromJson,
  serializeGameToJson,
  type SerializedGame,
} from '../../shared/engine/contracts';

/**
 * Where GameSession persists games. Records are validated on the way back
 * in, so a store never hands out a malformed snapshot.
 */
export interface GameSnapshotStore {
  save(gameId: string, record: SerializedGame): Promise<void>;
  /** Resolves to null when no record exists for `gameId`. */
  load(gameId: string): Promise<SerializedGame | null>;
  /** Resolves to false when there was nothing to delete. */
  delete(gameId: string): Promise<boolean>;
  list(): Promise<string[]>;
}

const GAME_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function assertValidGameId(gameId: string): void {
  if (!GAME_ID_PATTERN.test(gameId)) {
    throw new Error(`Invalid game id: ${JSON.stringify(gameId)}`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Keeps records as JSON text so a load goes through the same parse and
 * validation path as the file store.
 */
export class InMemorySnapshotStore implements GameSnapshotStore {
  private readonly records = new Map<string, string>();

  async save(gameId: string, record: SerializedGame): Promise<void> {
    assertValidGameId(gameId);
    this.records.set(gameId, serializeGameToJson(record));
  }

  async load(gameId: string): Promise<SerializedGame | null> {
    assertValidGameId(gameId);
    const json = this.records.get(gameId);
    return json === undefined ? null : deserializeGameFromJson(json);
  }

  async delete(gameId: string): Promise<boolean> {
    assertValidGameId(gameId);
    return this.records.delete(gameId);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }
}

/**
 * One pretty-printed `<gameId>.json` file per game under `dir`.
 */
export class FileSnapshotStore implements GameSnapshotStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async save(gameId: string, record: SerializedGame): Promise<void> {
    const target = this.fileFor(gameId);
    const temp = `${target}.tmp`;
    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(temp, serializeGameToJson(record, true), 'utf8');
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }
  }

  async load(gameId: string): Promise<SerializedGame | null> {
    let json: string;
    try {
      json = await fs.readFile(this.fileFor(gameId), 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return deserializeGameFromJson(json);
  }

  async delete(gameId: string): Promise<boolean> {
    try {
      await fs.unlink(this.fileFor(gameId));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return entries
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  private fileFor(gameId: string): string {
    assertValidGameId(gameId);
    return path.join(this.dir, `${gameId}.json`);
  }
}
