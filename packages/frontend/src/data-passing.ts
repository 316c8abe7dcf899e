/**
 * Data passing - type registry and value serializer
 *
 * Each registered type name carries two views of the same codec: functions
 * used at compile time (serializing defaults) and the JavaScript source the
 * shim embeds to decode arguments and encode outputs inside the container.
 */

import { Result, ok, error } from "./types/result.js";
import { BUILTIN_TYPE_NAMES } from "./type-mapper.js";

export type ConstantValue =
  | null
  | string
  | number
  | boolean
  | bigint
  | readonly ConstantValue[]
  | { readonly [key: string]: ConstantValue };

/**
 * Shim source for a codec: an expression naming a one-argument function,
 * plus an optional definition it depends on
 */
export type CodecSource = {
  readonly expression: string;
  readonly definition?: string;
};

export type TypeCodec = {
  readonly serialize: (value: ConstantValue) => string;
  readonly deserialize: (text: string) => ConstantValue;
  readonly serializerSource: CodecSource;
  readonly deserializerSource: CodecSource;
};

export type TypeRegistry = {
  readonly typeNames: ReadonlyMap<string, string>;
  readonly codecs: ReadonlyMap<string, TypeCodec>;
};

const describeValue = (value: ConstantValue): string =>
  typeof value === "bigint" ? `${value}n` : JSON.stringify(value);

const serializeString = (value: ConstantValue): string => {
  if (typeof value !== "string") {
    throw new TypeError(`Value "${describeValue(value)}" is not a string`);
  }
  return value;
};

const serializeInteger = (value: ConstantValue): string => {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return String(value);
  }
  throw new TypeError(`Value "${describeValue(value)}" is not an integer`);
};

const serializeFloat = (value: ConstantValue): string => {
  if (typeof value !== "number") {
    throw new TypeError(`Value "${describeValue(value)}" is not a number`);
  }
  return String(value);
};

const serializeBoolean = (value: ConstantValue): string => {
  if (typeof value !== "boolean") {
    throw new TypeError(`Value "${describeValue(value)}" is not a boolean`);
  }
  return String(value);
};

const serializeJson = (value: ConstantValue): string =>
  typeof value === "string" ? value : JSON.stringify(value);

const deserializeFloat = (text: string): number => {
  const value = Number(text);
  if (Number.isNaN(value) && text.trim() !== "NaN") {
    throw new TypeError(`Cannot parse "${text}" as a number`);
  }
  return value;
};

const deserializeBoolean = (text: string): boolean => {
  const normalized = text.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new TypeError(`Cannot parse "${text}" as a boolean`);
};

const deserializeJson = (text: string): ConstantValue => {
  const parsed: unknown = JSON.parse(text);
  return toConstantValue(parsed);
};

const toConstantValue = (value: unknown): ConstantValue => {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toConstantValue);
  }
  if (typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toConstantValue(entry)])
    );
  }
  throw new TypeError(`Unsupported JSON value: ${String(value)}`);
};

const SERIALIZE_STRING_SOURCE = `const _serializeString = (value) => {
  if (typeof value !== "string") {
    throw new TypeError("Value " + String(value) + " is not a string");
  }
  return value;
};`;

const SERIALIZE_INTEGER_SOURCE = `const _serializeInteger = (value) => {
  if (typeof value === "bigint" || Number.isInteger(value)) {
    return String(value);
  }
  throw new TypeError("Value " + String(value) + " is not an integer");
};`;

const SERIALIZE_FLOAT_SOURCE = `const _serializeFloat = (value) => {
  if (typeof value !== "number") {
    throw new TypeError("Value " + String(value) + " is not a number");
  }
  return String(value);
};`;

const SERIALIZE_BOOLEAN_SOURCE = `const _serializeBoolean = (value) => {
  if (typeof value !== "boolean") {
    throw new TypeError("Value " + String(value) + " is not a boolean");
  }
  return String(value);
};`;

const SERIALIZE_JSON_SOURCE = `const _serializeJson = (value) =>
  typeof value === "string" ? value : JSON.stringify(value);`;

const DESERIALIZE_INTEGER_SOURCE = `const _deserializeInteger = (text) => BigInt(text.trim());`;

const DESERIALIZE_FLOAT_SOURCE = `const _deserializeFloat = (text) => {
  const value = Number(text);
  if (Number.isNaN(value) && text.trim() !== "NaN") {
    throw new TypeError("Cannot parse " + JSON.stringify(text) + " as a number");
  }
  return value;
};`;

const DESERIALIZE_BOOLEAN_SOURCE = `const _deserializeBoolean = (text) => {
  const normalized = text.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new TypeError("Cannot parse " + JSON.stringify(text) + " as a boolean");
};`;

const jsonCodec: TypeCodec = {
  serialize: serializeJson,
  deserialize: deserializeJson,
  serializerSource: {
    expression: "_serializeJson",
    definition: SERIALIZE_JSON_SOURCE,
  },
  deserializerSource: { expression: "JSON.parse" },
};

export const BUILTIN_CODECS: ReadonlyMap<string, TypeCodec> = new Map<
  string,
  TypeCodec
>([
  [
    "String",
    {
      serialize: serializeString,
      deserialize: (text) => text,
      serializerSource: {
        expression: "_serializeString",
        definition: SERIALIZE_STRING_SOURCE,
      },
      deserializerSource: { expression: "String" },
    },
  ],
  [
    "Integer",
    {
      serialize: serializeInteger,
      deserialize: (text) => BigInt(text.trim()),
      serializerSource: {
        expression: "_serializeInteger",
        definition: SERIALIZE_INTEGER_SOURCE,
      },
      deserializerSource: {
        expression: "_deserializeInteger",
        definition: DESERIALIZE_INTEGER_SOURCE,
      },
    },
  ],
  [
    "Float",
    {
      serialize: serializeFloat,
      deserialize: deserializeFloat,
      serializerSource: {
        expression: "_serializeFloat",
        definition: SERIALIZE_FLOAT_SOURCE,
      },
      deserializerSource: {
        expression: "_deserializeFloat",
        definition: DESERIALIZE_FLOAT_SOURCE,
      },
    },
  ],
  [
    "Boolean",
    {
      serialize: serializeBoolean,
      deserialize: deserializeBoolean,
      serializerSource: {
        expression: "_serializeBoolean",
        definition: SERIALIZE_BOOLEAN_SOURCE,
      },
      deserializerSource: {
        expression: "_deserializeBoolean",
        definition: DESERIALIZE_BOOLEAN_SOURCE,
      },
    },
  ],
  ["JsonObject", jsonCodec],
  ["JsonArray", jsonCodec],
]);

export const createTypeRegistry = (
  extraCodecs: ReadonlyMap<string, TypeCodec> = new Map(),
  extraTypeNames: ReadonlyMap<string, string> = new Map()
): TypeRegistry => ({
  typeNames: new Map([...BUILTIN_TYPE_NAMES, ...extraTypeNames]),
  codecs: new Map([...BUILTIN_CODECS, ...extraCodecs]),
});

export const defaultTypeRegistry: TypeRegistry = createTypeRegistry();

/**
 * Name the type of a value that carries no annotation
 */
export const inferTypeName = (value: ConstantValue): string => {
  if (value === null) return "None";
  if (Array.isArray(value)) return "JsonArray";
  switch (typeof value) {
    case "string":
      return "String";
    case "number":
      return "Float";
    case "bigint":
      return "Integer";
    case "boolean":
      return "Boolean";
    default:
      return "JsonObject";
  }
};

/**
 * Serialize a value with the serializer registered for its type name.
 *
 * Strings pass through untouched since they are already in wire form.
 */
export const serializeValue = (
  value: ConstantValue,
  typeName: string,
  registry: TypeRegistry = defaultTypeRegistry
): Result<string, string> => {
  if (typeof value === "string") {
    return ok(value);
  }

  const codec = registry.codecs.get(typeName);
  if (!codec) {
    return error(
      `There is no registered serializer for type "${typeName}", so the value ${describeValue(value)} cannot be serialized`
    );
  }

  try {
    return ok(codec.serialize(value));
  } catch (e) {
    return error(
      `Failed to serialize the value ${describeValue(value)} as type "${typeName}": ${e instanceof Error ? e.message : String(e)}`
    );
  }
};
