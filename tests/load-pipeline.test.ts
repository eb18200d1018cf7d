import { lastValueFrom, toArray } from 'rxjs';
import { where } from '../lib/refgraph/src/providers/interfaces/record-store';
import { MemoryRecordStore } from '../lib/refgraph/src/providers/memory/record-store';
import { EngineEventType } from '../lib/refgraph/src/types/engine-hooks';
import { LogLevel } from '../lib/refgraph/src/types/logger';
import type { IdentifiedRecord, RecordFields } from '../lib/refgraph/src/types/record';
import { createReference } from '../lib/refgraph/src/types/record';
import {
  CircularReferenceRejectedError,
  MappingError,
  RecordNotFoundError,
  StoreOperationFailedError,
} from '../lib/refgraph/src/utils/persistence-error';
import { Folder, FolderSchema, Note, NoteSchema, Person, PersonSchema, person } from './utils/models';
import { createTestEngine } from './utils/test-engine';

function raw(store: MemoryRecordStore, recordType: string, fields: RecordFields): Promise<IdentifiedRecord> {
  return store.save({ recordType, system: {}, fields });
}

async function seedNotes(store: MemoryRecordStore, count: number): Promise<void> {
  for (let index = 1; index <= count; index++) {
    await raw(store, 'Note', { title: `n${index}` });
  }
}

async function saveCouple(store: MemoryRecordStore): Promise<void> {
  const { engine } = createTestEngine({}, store);
  const ada = person('Ada');
  const bob = person('Bob');
  ada.partner = bob;
  bob.partner = ada;
  await engine.repository(PersonSchema).save(ada);
}

describe('Load pipeline', () => {
  describe('load', () => {
    it('decodes a stored record', async () => {
      const { engine, store } = createTestEngine();
      await raw(store, 'Note', { title: 'Plan', priority: 1, due: new Date(3_000) });

      const loaded = await engine.repository(NoteSchema).load('rec-1');

      expect(loaded).toBeInstanceOf(Note);
      expect(loaded.title).toBe('Plan');
      expect(loaded.priority).toBe(1);
      expect(loaded.due).toEqual(new Date(3_000));
      expect(loaded.identity).toBe('rec-1');
      expect(loaded.changeTag).toBe('1');
    });

    it('serves repeated loads from the cache', async () => {
      const { engine, store } = createTestEngine();
      await raw(store, 'Note', { title: 'Plan' });
      const notes = engine.repository(NoteSchema);
      const fetch = jest.spyOn(store, 'fetch');
      const sources: string[] = [];
      engine.on(EngineEventType.RECORD_LOADED, ({ source }) => {
        sources.push(source);
      });

      const first = await notes.load('rec-1');
      const second = await notes.load('rec-1');

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(sources).toEqual(['store', 'cache']);
      expect(second).not.toBe(first);
      expect(second.title).toBe(first.title);
    });

    it('fetches again after the TTL', async () => {
      const { engine, store, clock } = createTestEngine({ cacheTtl: 30 });
      await raw(store, 'Note', { title: 'Plan' });
      const notes = engine.repository(NoteSchema);
      const fetch = jest.spyOn(store, 'fetch');

      await notes.load('rec-1');
      clock.now = 29_000;
      await notes.load('rec-1');
      clock.now = 31_000;
      await notes.load('rec-1');

      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('fails for an unknown identity', async () => {
      const { engine } = createTestEngine();

      await expect(engine.repository(NoteSchema).load('missing')).rejects.toThrow(
        new RecordNotFoundError('missing', 'Note')
      );
    });

    it('wraps fetch failures', async () => {
      const { engine, store } = createTestEngine();
      jest.spyOn(store, 'fetch').mockRejectedValueOnce(new Error('timeout'));

      await expect(engine.repository(NoteSchema).load('rec-1')).rejects.toThrow(
        "Operation 'fetch' failed for type 'Note': timeout"
      );
    });

    it('evicts a fetched record that cannot be decoded', async () => {
      const { engine, store, cache } = createTestEngine();
      await raw(store, 'Note', { title: 42 });
      const invalidated = jest.fn();
      engine.on(EngineEventType.CACHE_INVALIDATED, invalidated);

      await expect(engine.repository(NoteSchema).load('rec-1')).rejects.toThrow(
        "Cannot map record to 'Note' at field 'title': expected string, got number"
      );
      expect(cache.peek('rec-1')).toBeUndefined();
      expect(invalidated).toHaveBeenCalledWith(['rec-1']);
    });

    it('inlines referenced records', async () => {
      const { engine, store } = createTestEngine();
      await raw(store, 'Note', { title: 'first' });
      await raw(store, 'Note', { title: 'second' });
      await raw(store, 'Folder', { name: 'Inbox', notes: [createReference('rec-1'), createReference('rec-2')] });

      const folder = await engine.repository(FolderSchema).load('rec-3');

      expect(folder).toBeInstanceOf(Folder);
      expect(folder.notes?.map(entry => ('title' in entry ? entry.title : undefined))).toEqual([
        'first',
        'second',
      ]);
    });

    it('drops references to records that no longer exist', async () => {
      const store = new MemoryRecordStore();
      await raw(store, 'Person', { name: 'Bob' });
      await raw(store, 'Person', { name: 'Ada', partner: createReference('rec-1') });
      await store.delete('rec-1');
      const { engine, logger } = createTestEngine({}, store);

      const ada = await engine.repository(PersonSchema).load('rec-2');

      expect(ada.name).toBe('Ada');
      expect(ada.partner).toBeUndefined();
      expect(logger.at(LogLevel.WARN)).toEqual([
        "Reference to missing record 'rec-1' dropped while loading 'Person'",
      ]);
    });

    it('rejects a fetched record that closes a cycle through cached records', async () => {
      const { engine, cache } = createTestEngine();
      const people = engine.repository(PersonSchema);
      const ada = person('Ada');
      const bob = person('Bob');
      ada.partner = bob;
      bob.partner = ada;
      await people.save(ada);
      cache.invalidate('rec-1');

      await expect(people.load('rec-1')).rejects.toThrow(
        new CircularReferenceRejectedError('rec-1', 'Person')
      );
      expect(cache.peek('rec-1')).toBeUndefined();
      expect(cache.peek('rec-2')?.identity).toBe('rec-2');
    });

    it('loads a cyclic graph from a cold cache with cycle markers', async () => {
      const store = new MemoryRecordStore();
      await saveCouple(store);
      const { engine } = createTestEngine({}, store);

      const ada = await engine.repository(PersonSchema).load('rec-1');

      expect(ada.partner).toMatchObject({ identity: 'rec-2', name: 'Bob' });
      const bob = ada.partner instanceof Person ? ada.partner : undefined;
      expect(bob?.partner).toEqual({ identity: 'rec-1', isCycle: true });
    });

    it('loads both sides of a cycle again once the cache has expired', async () => {
      const { engine, clock } = createTestEngine();
      const people = engine.repository(PersonSchema);
      const ada = person('Ada');
      const bob = person('Bob');
      ada.partner = bob;
      bob.partner = ada;
      await people.save(ada);
      clock.now += 31_000;

      const loadedAda = await people.load('rec-1');
      const loadedBob = await people.load('rec-2');

      expect(loadedAda.name).toBe('Ada');
      expect(loadedAda.partner).toMatchObject({ identity: 'rec-2', name: 'Bob' });
      expect(loadedBob.name).toBe('Bob');
      expect(loadedBob.partner).toMatchObject({ identity: 'rec-1', name: 'Ada' });
    });

    it('marks cycles when rejection is disabled', async () => {
      const { engine, store, cache } = createTestEngine({ rejectCyclicFetches: false });
      const people = engine.repository(PersonSchema);
      const first = person('Ada');
      const second = person('Bob');
      first.partner = second;
      second.partner = first;
      await people.save(first);
      cache.invalidate('rec-1');
      const fetch = jest.spyOn(store, 'fetch');

      const ada = await people.load('rec-1');

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(ada.partner).toBeInstanceOf(Person);
      expect(ada.partner).toMatchObject({ identity: 'rec-2', name: 'Bob' });
      const bob = ada.partner instanceof Person ? ada.partner : undefined;
      expect(bob?.partner).toEqual({ identity: 'rec-1', isCycle: true });
    });

    it('marks a second visit of the same record as a cycle', async () => {
      const { engine, store } = createTestEngine();
      await raw(store, 'Person', { name: 'Bob' });
      await raw(store, 'Person', {
        name: 'Ada',
        partner: createReference('rec-1'),
        friends: [createReference('rec-1')],
      });

      const ada = await engine.repository(PersonSchema).load('rec-2');

      expect(ada.partner).toBeInstanceOf(Person);
      expect(ada.friends).toEqual([{ identity: 'rec-1', isCycle: true }]);
    });
  });

  describe('loadAll', () => {
    it('walks every page with cursors', async () => {
      const { engine, store } = createTestEngine();
      await seedNotes(store, 5);
      const notes = engine.repository(NoteSchema);

      const first = await notes.loadAll({ limit: 2 });
      expect(first.objects.map(entry => entry.title)).toEqual(['n1', 'n2']);
      expect(first.nextCursor).toBe('2');

      const second = await notes.loadNext('2', { limit: 2 });
      expect(second.objects.map(entry => entry.title)).toEqual(['n3', 'n4']);
      expect(second.nextCursor).toBe('4');

      const third = await notes.loadNext('4', { limit: 2 });
      expect(third.objects.map(entry => entry.title)).toEqual(['n5']);
      expect(third.nextCursor).toBeUndefined();
      expect(third.partialErrors.size).toBe(0);
    });

    it('passes predicate and sort to the store', async () => {
      const { engine, store } = createTestEngine();
      await raw(store, 'Note', { title: 'b', priority: 1 });
      await raw(store, 'Note', { title: 'a', priority: 5 });
      await raw(store, 'Note', { title: 'c', priority: 8 });

      const page = await engine.repository(NoteSchema).loadAll({
        predicate: where.compare('priority', '>', 1),
        sort: [{ field: 'title' }],
      });

      expect(page.objects.map(entry => entry.title)).toEqual(['a', 'c']);
    });

    it('caches every record of a page', async () => {
      const { engine, store, cache } = createTestEngine();
      await seedNotes(store, 3);

      await engine.repository(NoteSchema).loadAll();

      expect(cache.getStats().size).toBe(3);
    });

    it('reports records that fail to decode without failing the page', async () => {
      const { engine, store, cache } = createTestEngine();
      await raw(store, 'Note', { title: 'ok' });
      await raw(store, 'Note', { title: 42 });
      await raw(store, 'Note', { title: 'fine' });
      const partial = jest.fn();
      engine.on(EngineEventType.PARTIAL_ERROR, partial);

      const page = await engine.repository(NoteSchema).loadAll();

      expect(page.objects.map(entry => entry.title)).toEqual(['ok', 'fine']);
      expect(Array.from(page.partialErrors.keys())).toEqual(['rec-2']);
      expect(page.partialErrors.get('rec-2')).toBeInstanceOf(MappingError);
      expect(partial).toHaveBeenCalledTimes(1);
      expect(cache.peek('rec-2')).toBeUndefined();
    });

    it('reports records the store could not return', async () => {
      const { engine, store } = createTestEngine();
      const stored = await raw(store, 'Note', { title: 'ok' });
      jest.spyOn(store, 'query').mockResolvedValueOnce({
        matches: [
          { identity: 'broken', error: new Error('corrupt') },
          { identity: stored.identity, record: stored },
        ],
      });

      const page = await engine.repository(NoteSchema).loadAll();

      expect(page.objects).toHaveLength(1);
      const error = page.partialErrors.get('broken');
      expect(error).toBeInstanceOf(StoreOperationFailedError);
      expect(error?.message).toBe("Operation 'query' failed for type 'Note': corrupt");
    });

    it('fails when the page query fails', async () => {
      const { engine, store } = createTestEngine();
      jest.spyOn(store, 'query').mockRejectedValueOnce(new Error('unavailable'));

      await expect(engine.repository(NoteSchema).loadAll()).rejects.toThrow(
        "Operation 'query' failed for type 'Note': unavailable"
      );
    });
  });

  describe('loadAllExhaustive', () => {
    it('merges every page in order', async () => {
      const { engine, store } = createTestEngine();
      await seedNotes(store, 5);
      const query = jest.spyOn(store, 'query');

      const result = await engine.repository(NoteSchema).loadAllExhaustive({ limit: 2 });

      expect(result.objects.map(entry => entry.title)).toEqual(['n1', 'n2', 'n3', 'n4', 'n5']);
      expect(result.partialErrors.size).toBe(0);
      expect(query).toHaveBeenCalledTimes(3);
    });

    it('keeps the first error reported for an identity', async () => {
      const { engine, store } = createTestEngine();
      jest
        .spyOn(store, 'query')
        .mockResolvedValueOnce({ matches: [{ identity: 'x', error: new Error('first') }], nextCursor: 'c1' })
        .mockResolvedValueOnce({ matches: [{ identity: 'x', error: new Error('second') }] });

      const result = await engine.repository(NoteSchema).loadAllExhaustive();

      expect(result.partialErrors.size).toBe(1);
      expect(result.partialErrors.get('x')?.originalError?.message).toBe('first');
    });

    it('fails when any page query fails', async () => {
      const { engine, store } = createTestEngine();
      await seedNotes(store, 3);
      const query = store.query.bind(store);
      jest
        .spyOn(store, 'query')
        .mockImplementationOnce(query)
        .mockRejectedValueOnce(new Error('unavailable'));

      await expect(engine.repository(NoteSchema).loadAllExhaustive({ limit: 2 })).rejects.toThrow(
        StoreOperationFailedError
      );
    });
  });

  describe('pages', () => {
    it('emits one page per query and completes', async () => {
      const { engine, store } = createTestEngine();
      await seedNotes(store, 5);

      const pages = await lastValueFrom(engine.repository(NoteSchema).pages({ limit: 2 }).pipe(toArray()));

      expect(pages.map(page => page.objects.length)).toEqual([2, 2, 1]);
      expect(pages.map(page => page.nextCursor)).toEqual(['2', '4', undefined]);
    });

    it('does not query before subscription', async () => {
      const { engine, store } = createTestEngine();
      const query = jest.spyOn(store, 'query');

      const stream = engine.repository(NoteSchema).pages();
      expect(query).not.toHaveBeenCalled();

      await lastValueFrom(stream);
      expect(query).toHaveBeenCalledTimes(1);
    });
  });
});
