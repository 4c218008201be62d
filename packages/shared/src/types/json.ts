export type JsonScalar = string | number | boolean | null;

export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}
