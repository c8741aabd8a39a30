import { MalformedDataError } from "./errors.js";
import { bigintToHex, hexToBigint } from "./hex.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type Optional<T> = { present: true; value: T } | { present: false };

export function present<T>(value: T): Optional<T> {
  return { present: true, value };
}

export function absent<T>(): Optional<T> {
  return { present: false };
}

export function optionalToUndefined<T>(o: Optional<T>): T | undefined {
  return o.present ? o.value : undefined;
}

export interface SerializableEntity {
  serialize(serializer: ObjectSerializer): void;
}

function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Writes named fields into a JSON object, keeping write order. */
export class ObjectSerializer {
  private readonly fields: JsonObject = {};

  writeBigInt(label: string, value: bigint | undefined): void {
    this.fields[label] = value === undefined ? null : bigintToHex(value);
  }

  writeString(label: string, value: string): void {
    this.fields[label] = value;
  }

  writeInt(label: string, value: number): void {
    this.fields[label] = value;
  }

  writeObject(label: string, entity: SerializableEntity | undefined): void {
    this.fields[label] = entity === undefined ? null : serializeToObject(entity);
  }

  toObject(): JsonObject {
    return { ...this.fields };
  }

  toJson(): string {
    return JSON.stringify(this.fields);
  }
}

export class ObjectDeserializer {
  constructor(
    private readonly fields: JsonObject,
    readonly path = "",
  ) {}

  static fromJson(text: string): ObjectDeserializer {
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      throw new MalformedDataError("Invalid JSON", undefined, e);
    }
    if (!isJsonObject(parsed)) throw new MalformedDataError("Expected a JSON object");
    return new ObjectDeserializer(parsed);
  }

  private labelOf(label: string): string {
    return this.path ? `${this.path}.${label}` : label;
  }

  private parseBigInt(label: string, v: JsonValue): bigint {
    if (typeof v !== "string") throw new MalformedDataError("expected hex integer string", this.labelOf(label));
    try {
      return hexToBigint(v);
    } catch (e) {
      throw new MalformedDataError(`invalid hex integer ${JSON.stringify(v)}`, this.labelOf(label), e);
    }
  }

  readBigInt(label: string): bigint {
    const v = this.fields[label];
    if (v === undefined || v === null) throw new MalformedDataError("required field is missing", this.labelOf(label));
    return this.parseBigInt(label, v);
  }

  readOptionalBigInt(label: string): Optional<bigint> {
    const v = this.fields[label];
    if (v === undefined || v === null) return absent();
    return present(this.parseBigInt(label, v));
  }

  readString(label: string): string {
    const v = this.fields[label];
    if (typeof v !== "string") throw new MalformedDataError("expected string", this.labelOf(label));
    return v;
  }

  readInt(label: string): number {
    const v = this.fields[label];
    if (typeof v !== "number" || !Number.isInteger(v)) {
      throw new MalformedDataError("expected integer", this.labelOf(label));
    }
    return v;
  }

  /**
   * Decodes a nested object with `decode`. Failures inside `decode` surface
   * as MalformedDataError under this field's path.
   */
  readOptionalObject<T>(label: string, decode: (deserializer: ObjectDeserializer) => T): Optional<T> {
    const v = this.fields[label];
    if (v === undefined || v === null) return absent();
    const path = this.labelOf(label);
    if (!isJsonObject(v)) throw new MalformedDataError("expected object", path);
    try {
      return present(decode(new ObjectDeserializer(v, path)));
    } catch (e) {
      if (e instanceof MalformedDataError) throw e;
      throw new MalformedDataError(e instanceof Error ? e.message : String(e), path, e);
    }
  }
}

export function serializeToObject(entity: SerializableEntity): JsonObject {
  const serializer = new ObjectSerializer();
  entity.serialize(serializer);
  return serializer.toObject();
}

export function serializeToJson(entity: SerializableEntity): string {
  return JSON.stringify(serializeToObject(entity));
}
