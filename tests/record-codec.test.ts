import {
  RecordCodec,
  assignSystemFields,
  describeKind,
  sanitizeValue,
  toWire,
} from '../lib/refgraph/src/codec/record-codec';
import { FieldKind } from '../lib/refgraph/src/types/model';
import type { FieldInfo } from '../lib/refgraph/src/types/model';
import { createAsset, createReference } from '../lib/refgraph/src/types/record';
import { MappingError, UnsupportedFieldTypeError } from '../lib/refgraph/src/utils/persistence-error';
import { Note, NoteSchema, PersonSchema, PointSchema, person } from './utils/models';

function info(kind: FieldKind, value: unknown, list = false): FieldInfo {
  return { name: 'value', kind, list, value };
}

describe('RecordCodec', () => {
  const codec = new RecordCodec();

  describe('classify', () => {
    it('treats null and undefined as absent', () => {
      expect(codec.classify(info(FieldKind.STRING, null))).toEqual({ kind: 'absent' });
      expect(codec.classify(info(FieldKind.NUMBER, undefined))).toEqual({ kind: 'absent' });
    });

    it('accepts primitives of the declared kind', () => {
      const due = new Date(1_000);

      expect(codec.classify(info(FieldKind.STRING, 'x'))).toEqual({ kind: 'primitive', value: 'x' });
      expect(codec.classify(info(FieldKind.BOOLEAN, false))).toEqual({ kind: 'primitive', value: false });
      expect(codec.classify(info(FieldKind.TIMESTAMP, due))).toEqual({ kind: 'primitive', value: due });
    });

    it('rejects values that match no supported kind', () => {
      const classify = (value: unknown) => () => codec.classify(info(FieldKind.STRING, value), 'Note');

      expect(classify(new Map())).toThrow(UnsupportedFieldTypeError);
      expect(classify(new Map())).toThrow(
        "Unsupported value of kind 'Map' in field 'value' of type 'Note'"
      );
      expect(classify({ a: 1 })).toThrow("Unsupported value of kind 'object' in field 'value' of type 'Note'");
      expect(classify(() => 1)).toThrow("Unsupported value of kind 'function' in field 'value' of type 'Note'");
      expect(classify(42)).toThrow("Unsupported value of kind 'number' in field 'value' of type 'Note'");
    });

    it('rejects an invalid date', () => {
      expect(() => codec.classify(info(FieldKind.TIMESTAMP, new Date(Number.NaN)))).toThrow(
        "Unsupported value of kind 'Date' in field 'value'"
      );
    });

    it('rejects numbers that have no JSON form', () => {
      expect(() => codec.classify(info(FieldKind.NUMBER, Number.POSITIVE_INFINITY), 'Note')).toThrow(
        "Unsupported value of kind 'non-finite number' in field 'value' of type 'Note'"
      );
      expect(() => codec.classify(info(FieldKind.NUMBER, [1, Number.NaN], true))).toThrow(
        "Unsupported value of kind 'array<number|non-finite number>' in field 'value'"
      );
      expect(codec.classify(info(FieldKind.NUMBER, -0.5))).toEqual({ kind: 'primitive', value: -0.5 });
    });

    it('reports every element kind of a mixed list', () => {
      const classify = () => codec.classify(info(FieldKind.STRING, ['a', 1, 'b', true], true));

      expect(classify).toThrow(UnsupportedFieldTypeError);
      expect(classify).toThrow("Unsupported value of kind 'array<string|number|boolean>' in field 'value'");
    });

    it('classifies binary values and references', () => {
      const bytes = new Uint8Array([1, 2]);
      const target = person('Ada');

      expect(codec.classify(info(FieldKind.BLOB, bytes))).toEqual({ kind: 'blob', value: bytes });
      expect(
        codec.classify({ name: 'partner', kind: FieldKind.REFERENCE, list: false, value: target, target: PersonSchema })
      ).toEqual({ kind: 'reference', value: target, target: PersonSchema });
    });

    it('rejects a reference field without a model object', () => {
      expect(() =>
        codec.classify({ name: 'partner', kind: FieldKind.REFERENCE, list: false, value: 'Ada', target: PersonSchema })
      ).toThrow("Unsupported value of kind 'string' in field 'partner'");
    });
  });

  describe('encodeLeaf', () => {
    it('copies primitive lists and wraps binary values in assets', () => {
      const tags = ['a', 'b'];
      const encoded = codec.encodeLeaf({ kind: 'primitiveList', value: tags });

      expect(encoded).toEqual(['a', 'b']);
      expect(encoded).not.toBe(tags);
      expect(codec.encodeLeaf({ kind: 'blob', value: new Uint8Array([7]) })).toEqual(
        createAsset(new Uint8Array([7]))
      );
      expect(codec.encodeLeaf({ kind: 'absent' })).toBeUndefined();
    });
  });

  describe('decode', () => {
    it('decodes a sanitized tree with system attributes', () => {
      const note = codec.decode(NoteSchema, {
        identity: 'rec-1',
        createdAt: 5,
        changeTag: '3',
        title: 'Hello',
        priority: 2,
        pinned: true,
        due: 1_000,
        tags: ['a', 'b'],
        attachment: 'AQID',
      });

      expect(note).toBeInstanceOf(Note);
      expect(note.identity).toBe('rec-1');
      expect(note.createdAt).toEqual(new Date(5));
      expect(note.changeTag).toBe('3');
      expect(note.title).toBe('Hello');
      expect(note.priority).toBe(2);
      expect(note.pinned).toBe(true);
      expect(note.due).toEqual(new Date(1_000));
      expect(note.tags).toEqual(['a', 'b']);
      expect(note.attachment).toEqual(new Uint8Array([1, 2, 3]));
      expect(note.body).toBeUndefined();
    });

    it('fails on a missing required field', () => {
      expect(() => codec.decode(NoteSchema, { identity: 'rec-1' })).toThrow(
        "Cannot map record to 'Note' at field 'title': missing required value"
      );
    });

    it('fails on a value of the wrong shape', () => {
      expect(() => codec.decode(NoteSchema, { title: 't', priority: 'high' })).toThrow(
        "Cannot map record to 'Note' at field 'priority': expected number, got string"
      );
      expect(() => codec.decode(NoteSchema, { title: 't', tags: ['a', 2] })).toThrow(
        "Cannot map record to 'Note' at field 'tags': [1] expected string, got number"
      );
      expect(() => codec.decode(NoteSchema, { title: 't', createdBy: 4 })).toThrow(MappingError);
    });

    it('decodes nested references and cycle markers', () => {
      const ada = codec.decode(PersonSchema, {
        identity: 'p1',
        name: 'Ada',
        partner: { identity: 'p2', name: 'Bob', partner: { identity: 'p1', isCycle: true } },
      });

      expect(ada.partner).toMatchObject({ identity: 'p2', name: 'Bob' });
      expect(ada.partner && 'partner' in ada.partner ? ada.partner.partner : undefined).toEqual({
        identity: 'p1',
        isCycle: true,
      });
    });

    it('uses the custom codec of a model', () => {
      const point = codec.decode(PointSchema, { identity: 'pt', coordinates: '3,4' });

      expect(point.x).toBe(3);
      expect(point.y).toBe(4);
      expect(point.identity).toBe('pt');
      expect(() => codec.decode(PointSchema, { coordinates: 7 })).toThrow(
        "Cannot map record to 'Point': coordinates must be text"
      );
    });
  });
});

describe('sanitizeValue', () => {
  it('converts record values to JSON-safe values', () => {
    expect(sanitizeValue(null)).toBeUndefined();
    expect(sanitizeValue(new Date(1_700_000_000_000))).toBe(1_700_000_000_000);
    expect(sanitizeValue(new Uint8Array([1, 2, 3]))).toBe('AQID');
    expect(sanitizeValue(createAsset(new Uint8Array([255])))).toBe('/w==');
    expect(sanitizeValue(createReference('x'))).toEqual({ identity: 'x' });
    expect(sanitizeValue({ identity: 'x', isCycle: true })).toEqual({ identity: 'x', isCycle: true });
    expect(sanitizeValue(Number.NaN)).toBe('NaN');
    expect(sanitizeValue(Number.POSITIVE_INFINITY)).toBe('Infinity');
  });

  it('drops null members and keeps list positions', () => {
    expect(sanitizeValue({ a: null, b: [1, null, 'c'], c: { d: undefined } })).toEqual({
      b: [1, null, 'c'],
      c: {},
    });
  });
});

describe('toWire', () => {
  it('puts identity and system attributes before the fields', () => {
    const wire = toWire({
      identity: 'rec-1',
      recordType: 'Note',
      system: { createdBy: 'local', createdAt: new Date(1_000), changeTag: '1' },
      fields: { title: 't', ref: createReference('rec-2'), blob: createAsset(new Uint8Array([255])) },
    });

    expect(wire).toEqual({
      identity: 'rec-1',
      createdBy: 'local',
      createdAt: 1_000,
      changeTag: '1',
      title: 't',
      ref: { identity: 'rec-2' },
      blob: '/w==',
    });
    expect(Object.keys(wire)).toEqual(['identity', 'createdBy', 'createdAt', 'changeTag', 'title', 'ref', 'blob']);
  });
});

describe('assignSystemFields', () => {
  it('copies identity and system attributes onto the object', () => {
    const note = new Note();
    assignSystemFields(note, {
      identity: 'rec-9',
      recordType: 'Note',
      system: { modifiedBy: 'local', modifiedAt: new Date(2), changeTag: '4' },
      fields: {},
    });

    expect(note.identity).toBe('rec-9');
    expect(note.modifiedAt).toEqual(new Date(2));
    expect(note.changeTag).toBe('4');
    expect(note.createdBy).toBeUndefined();
  });
});

describe('describeKind', () => {
  it('names class instances by constructor', () => {
    expect(describeKind(new Note())).toBe('Note');
    expect(describeKind([])).toBe('array');
    expect(describeKind(null)).toBe('null');
    expect(describeKind(new Set())).toBe('Set');
  });
});
