import * as yaml from "js-yaml";
import { StoreError } from "../errors";
import type { SessionData } from "../store/SessionStore";

/**
 * Stored form of a session value: text for text codecs, bytes for binary ones.
 */
export type SerializedData = string | Uint8Array;

/**
 * Codec contract turning a session value into a storable blob and back.
 *
 * `deserialize` receives the column value exactly as the driver returned it,
 * so a codec that writes bytes gets the same bytes back.
 */
export type Serializer<TValue = SessionData> = {
    serialize: (value: TValue) => SerializedData;
    deserialize: (raw: SerializedData) => TValue;
};

export type SerializerName = "json" | "yaml";

export type SerializerConfig =
    | { name: "json"; space?: number }
    | { name: "yaml"; options?: yaml.DumpOptions };

/**
 * Accepted forms of the `serializer` store option.
 */
export type SerializerInput<TValue = SessionData> = SerializerName | SerializerConfig | Serializer<TValue>;

export const DEFAULT_SERIALIZER: SerializerName = "json";

export function createJsonSerializer<TValue>(space?: number): Serializer<TValue> {
    return {
        serialize(value) {
            const raw = JSON.stringify(value, null, space);
            // JSON.stringify returns undefined for undefined, functions and symbols
            if (typeof raw !== "string") {
                throw new TypeError(`Value of type ${typeof value} is not JSON-serializable.`);
            }
            return raw;
        },
        deserialize(raw) {
            return JSON.parse(toText(raw)) as TValue;
        },
    };
}

export function createYamlSerializer<TValue>(options?: yaml.DumpOptions): Serializer<TValue> {
    return {
        serialize(value) {
            return yaml.dump(value, { skipInvalid: false, ...options });
        },
        deserialize(raw) {
            return yaml.load(toText(raw)) as TValue;
        },
    };
}

/**
 * Builds a {@link Serializer} from a codec name, a codec configuration or an
 * existing instance. Instances are returned untouched.
 */
export function resolveSerializer<TValue = SessionData>(
    input: SerializerInput<TValue> = DEFAULT_SERIALIZER
): Serializer<TValue> {
    if (typeof input === "string") {
        return fromConfig<TValue>({ name: input });
    }

    if (isSerializer<TValue>(input)) {
        return input;
    }

    return fromConfig<TValue>(input);
}

export function isSerializer<TValue>(value: unknown): value is Serializer<TValue> {
    if (!value || typeof value !== "object") {
        return false;
    }

    const target = value as Partial<Serializer<TValue>>;
    return typeof target.serialize === "function" && typeof target.deserialize === "function";
}

/**
 * Runs the codec's `serialize`, reporting failures as `SERIALIZATION_FAILED`.
 */
export function encodeValue<TValue>(serializer: Serializer<TValue>, key: string, value: TValue): SerializedData {
    try {
        return serializer.serialize(value);
    } catch (e) {
        throw new StoreError("SERIALIZATION_FAILED", `Failed to serialize session "${key}".`, e, { key });
    }
}

/**
 * Runs the codec's `deserialize`, reporting failures as `DESERIALIZATION_FAILED`.
 */
export function decodeValue<TValue>(serializer: Serializer<TValue>, key: string, raw: SerializedData): TValue {
    try {
        return serializer.deserialize(raw);
    } catch (e) {
        throw new StoreError("DESERIALIZATION_FAILED", `Failed to deserialize session "${key}".`, e, { key });
    }
}

/**
 * Text codecs accept byte columns holding UTF-8 text.
 */
export function toText(raw: SerializedData): string {
    return typeof raw === "string" ? raw : textDecoder.decode(raw);
}

const textDecoder = new TextDecoder("utf-8");

function fromConfig<TValue>(config: { name: string; space?: number; options?: yaml.DumpOptions }): Serializer<TValue> {
    switch (config.name) {
        case "json":
            return createJsonSerializer<TValue>(config.space);
        case "yaml":
            return createYamlSerializer<TValue>(config.options);
        default:
            throw new StoreError("INVALID_CONFIG", `Unknown serializer: ${config.name}`, undefined, {
                serializer: config.name,
            });
    }
}
