import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  FileSnapshotStore,
  InMemorySnapshotStore,
  assertValidGameId,
  type GameSnapshotStore,
} from '../../src/server/game/snapshotStore';
import type { SerializedGame } from '../../src/shared/engine/contracts';
import { InvalidState } from '../../src/shared/engine/errors';
import { engineAt } from '../utils/fixtures';

function sampleRecord(): SerializedGame {
  const { engine } = engineAt(undefined, 'white', [[6, 5]]);
  engine.rollForTurn();
  return engine.snapshot();
}

function describeStore(name: string, makeStore: () => GameSnapshotStore): void {
  describe(name, () => {
    let store: GameSnapshotStore;

    beforeEach(() => {
      store = makeStore();
    });

    it('saves and loads a record', async () => {
      const record = sampleRecord();
      await store.save('game-1', record);
      await expect(store.load('game-1')).resolves.toEqual(record);
    });

    it('resolves to null for an unknown game', async () => {
      await expect(store.load('missing')).resolves.toBeNull();
    });

    it('lists saved games in order and deletes them', async () => {
      await store.save('b-game', sampleRecord());
      await store.save('a-game', sampleRecord());
      await expect(store.list()).resolves.toEqual(['a-game', 'b-game']);

      await expect(store.delete('a-game')).resolves.toBe(true);
      await expect(store.delete('a-game')).resolves.toBe(false);
      await expect(store.list()).resolves.toEqual(['b-game']);
    });

    it('refuses ids that could escape the store', async () => {
      await expect(store.save('../etc', sampleRecord())).rejects.toThrow('Invalid game id');
      await expect(store.load('a/b')).rejects.toThrow('Invalid game id');
    });
  });
}

describe('assertValidGameId', () => {
  it('accepts word characters and dashes only', () => {
    expect(() => assertValidGameId('game_01-x')).not.toThrow();
    expect(() => assertValidGameId('')).toThrow('Invalid game id: ""');
    expect(() => assertValidGameId('a'.repeat(65))).toThrow();
    expect(() => assertValidGameId('a b')).toThrow();
  });
});

describeStore('InMemorySnapshotStore', () => new InMemorySnapshotStore());

describe('file-backed store', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bg-store-'));
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  let counter = 0;
  describeStore('FileSnapshotStore', () => new FileSnapshotStore(path.join(root, `s${counter++}`)));

  it('writes pretty JSON named after the game', async () => {
    const dir = path.join(root, 'pretty');
    const store = new FileSnapshotStore(dir);
    await store.save('game-9', sampleRecord());

    const text = fs.readFileSync(path.join(dir, 'game-9.json'), 'utf8');
    expect(text.startsWith('{\n  "version": 1,')).toBe(true);
    expect(fs.existsSync(path.join(dir, 'game-9.json.tmp'))).toBe(false);
  });

  it('checks the game id before touching the disk', async () => {
    const dir = path.join(root, 'untouched');
    await expect(new FileSnapshotStore(dir).save('../escape', sampleRecord())).rejects.toThrow(
      'Invalid game id'
    );
    expect(fs.existsSync(dir)).toBe(false);
  });

  it('removes the temp file when the final rename fails', async () => {
    const dir = path.join(root, 'blocked');
    fs.mkdirSync(path.join(dir, 'game-2.json'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'game-2.json', 'keep.txt'), 'x', 'utf8');

    await expect(new FileSnapshotStore(dir).save('game-2', sampleRecord())).rejects.toThrow();
    expect(fs.existsSync(path.join(dir, 'game-2.json.tmp'))).toBe(false);
  });

  it('lists nothing before the directory exists', async () => {
    await expect(new FileSnapshotStore(path.join(root, 'never')).list()).resolves.toEqual([]);
  });

  it('rejects a corrupted file with InvalidState', async () => {
    const dir = path.join(root, 'corrupt');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'broken.json'), '{"version":1}', 'utf8');

    await expect(new FileSnapshotStore(dir).load('broken')).rejects.toBeInstanceOf(InvalidState);
  });
});
