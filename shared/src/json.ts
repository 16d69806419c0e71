export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type PathSegment = string | number;
export type ClaimPath = readonly PathSegment[];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Assignment that keeps keys such as "__proto__" as plain own properties. */
export function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function hasOwn(target: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

export function parseClaimPath(path: string | ClaimPath): ClaimPath {
  if (typeof path !== 'string') return path;
  return path.split('.').map((seg) => (/^(0|[1-9]\d*)$/.test(seg) ? Number(seg) : seg));
}

export function formatClaimPath(path: ClaimPath): string {
  return path.length === 0 ? '(root)' : path.map(String).join('.');
}

export function pathKey(path: ClaimPath): string {
  return JSON.stringify(path);
}

export function isPathPrefix(prefix: ClaimPath, path: ClaimPath): boolean {
  if (prefix.length > path.length) return false;
  return prefix.every((seg, i) => seg === path[i]);
}

export function getAtPath(root: JsonValue, path: ClaimPath): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const seg of path) {
    if (current === undefined) return undefined;
    if (typeof seg === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[seg];
    } else {
      if (!isJsonObject(current) || !hasOwn(current, seg)) return undefined;
      current = current[seg];
    }
  }
  return current;
}

function sortValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortValue);
  if (isJsonObject(value)) {
    return Object.keys(value)
      .sort()
      .reduce<JsonObject>((acc, key) => {
        setOwn(acc, key, sortValue(value[key]));
        return acc;
      }, {});
  }
  return value;
}

export function canonicalizeJson(value: JsonValue): string {
  return JSON.stringify(sortValue(value));
}
