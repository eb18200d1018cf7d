import type {
  FieldDescriptor,
  ModelSchema,
  NestedDecoder,
  Persistable,
  ReferenceValue,
} from '../types/model';
import { FieldKind } from '../types/model';
import type { CycleMarker, JsonObject, JsonValue } from '../types/record';
import { base64ToBytes, isBase64 } from '../codec/base64';

/**
 * Options shared by all field builders
 */
export interface FieldOptions {
  /**
   * Fail decoding when the stored record lacks the field
   * @default false
   */
  readonly required?: boolean;
}

type JsonReader<V> = (json: JsonValue, decoder: NestedDecoder) => V;

function isJsonObject(json: JsonValue): json is JsonObject {
  return typeof json === 'object' && json !== null && !Array.isArray(json);
}

function describeJson(json: JsonValue): string {
  if (json === null) return 'null';
  if (Array.isArray(json)) return 'array';
  return typeof json;
}

function expected(kind: string, json: JsonValue): Error {
  return new Error(`expected ${kind}, got ${describeJson(json)}`);
}

const readString: JsonReader<string> = json => {
  if (typeof json !== 'string') throw expected('string', json);
  return json;
};

const readNumber: JsonReader<number> = json => {
  if (typeof json !== 'number') throw expected('number', json);
  return json;
};

const readBoolean: JsonReader<boolean> = json => {
  if (typeof json !== 'boolean') throw expected('boolean', json);
  return json;
};

// Timestamps are sanitized to milliseconds since the Unix epoch
const readTimestamp: JsonReader<Date> = json => {
  if (typeof json !== 'number' || !Number.isFinite(json)) throw expected('epoch timestamp', json);
  return new Date(json);
};

const readBlob: JsonReader<Uint8Array> = json => {
  if (typeof json !== 'string' || !isBase64(json)) throw expected('base64 text', json);
  return base64ToBytes(json);
};

function readReference<R extends Persistable>(
  target: () => ModelSchema<R>
): JsonReader<ReferenceValue<R>> {
  return (json, decoder) => {
    if (!isJsonObject(json)) throw expected('object', json);
    const identity = json.identity;
    if (json.isCycle === true && typeof identity === 'string') {
      const marker: CycleMarker = { identity, isCycle: true };
      return marker;
    }
    return decoder.decodeNested(target(), json);
  };
}

function readList<V>(reader: JsonReader<V>): JsonReader<V[]> {
  return (json, decoder) => {
    if (!Array.isArray(json)) throw expected('array', json);
    return json.map((item, index) => {
      try {
        return reader(item, decoder);
      } catch (error) {
        throw new Error(`[${index}] ${error instanceof Error ? error.message : String(error)}`);
      }
    });
  };
}

function createDescriptor<T, V>(
  kind: FieldKind,
  list: boolean,
  name: string,
  get: (object: T) => unknown,
  set: (object: T, value: V) => void,
  reader: JsonReader<V>,
  options: FieldOptions,
  target?: () => ModelSchema<Persistable>
): FieldDescriptor<T> {
  return {
    name,
    kind,
    list,
    required: options.required ?? false,
    target,
    read: object => get(object),
    write: (object, value, decoder) => set(object, reader(value, decoder)),
  };
}

/**
 * Builders for explicit field descriptors
 *
 * @example
 * ```typescript
 * const AuthorSchema: ModelSchema<Author> = defineModel({
 *   recordType: 'Author',
 *   create: () => new Author(),
 *   fields: [
 *     field.string<Author>('name', a => a.name, (a, v) => { a.name = v; }, { required: true }),
 *     field.reference<Author, Book>('latest', () => BookSchema, a => a.latest, (a, v) => { a.latest = v; }),
 *   ],
 * });
 * ```
 */
export const field = {
  string<T>(
    name: string,
    get: (object: T) => string | undefined,
    set: (object: T, value: string) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.STRING, false, name, get, set, readString, options);
  },

  number<T>(
    name: string,
    get: (object: T) => number | undefined,
    set: (object: T, value: number) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.NUMBER, false, name, get, set, readNumber, options);
  },

  boolean<T>(
    name: string,
    get: (object: T) => boolean | undefined,
    set: (object: T, value: boolean) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.BOOLEAN, false, name, get, set, readBoolean, options);
  },

  timestamp<T>(
    name: string,
    get: (object: T) => Date | undefined,
    set: (object: T, value: Date) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.TIMESTAMP, false, name, get, set, readTimestamp, options);
  },

  blob<T>(
    name: string,
    get: (object: T) => Uint8Array | undefined,
    set: (object: T, value: Uint8Array) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.BLOB, false, name, get, set, readBlob, options);
  },

  reference<T, R extends Persistable>(
    name: string,
    target: () => ModelSchema<R>,
    get: (object: T) => ReferenceValue<R> | undefined,
    set: (object: T, value: ReferenceValue<R>) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(
      FieldKind.REFERENCE,
      false,
      name,
      get,
      set,
      readReference(target),
      options,
      target
    );
  },

  stringList<T>(
    name: string,
    get: (object: T) => readonly string[] | undefined,
    set: (object: T, value: string[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.STRING, true, name, get, set, readList(readString), options);
  },

  numberList<T>(
    name: string,
    get: (object: T) => readonly number[] | undefined,
    set: (object: T, value: number[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.NUMBER, true, name, get, set, readList(readNumber), options);
  },

  booleanList<T>(
    name: string,
    get: (object: T) => readonly boolean[] | undefined,
    set: (object: T, value: boolean[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.BOOLEAN, true, name, get, set, readList(readBoolean), options);
  },

  timestampList<T>(
    name: string,
    get: (object: T) => readonly Date[] | undefined,
    set: (object: T, value: Date[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(
      FieldKind.TIMESTAMP,
      true,
      name,
      get,
      set,
      readList(readTimestamp),
      options
    );
  },

  blobList<T>(
    name: string,
    get: (object: T) => readonly Uint8Array[] | undefined,
    set: (object: T, value: Uint8Array[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(FieldKind.BLOB, true, name, get, set, readList(readBlob), options);
  },

  referenceList<T, R extends Persistable>(
    name: string,
    target: () => ModelSchema<R>,
    get: (object: T) => readonly ReferenceValue<R>[] | undefined,
    set: (object: T, value: ReferenceValue<R>[]) => void,
    options: FieldOptions = {}
  ): FieldDescriptor<T> {
    return createDescriptor(
      FieldKind.REFERENCE,
      true,
      name,
      get,
      set,
      readList(readReference(target)),
      options,
      target
    );
  },
};

/**
 * Declares a model schema. Identity function that fixes the type parameter.
 */
export function defineModel<T extends Persistable>(schema: ModelSchema<T>): ModelSchema<T> {
  return schema;
}
