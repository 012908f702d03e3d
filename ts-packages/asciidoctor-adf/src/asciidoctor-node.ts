/**
 * Asciidoctor Node View
 *
 * Asciidoctor.js objects are Opal objects: absent values may come back as
 * `undefined`, `null` or Opal's `nil`, and attribute values may be numbers.
 * `AsciidoctorNode` wraps one object and exposes typed reads that narrow
 * every value at runtime.
 */

export type Method = (...args: unknown[]) => unknown;

/**
 * Opal classes (`ConverterFactory`, `LoggerManager`) are functions, instances are objects
 */
export function hasMethod<K extends string>(value: unknown, name: K): value is Record<K, Method> {
  return ((typeof value === 'object' && value !== null) || typeof value === 'function')
    && typeof Reflect.get(value, name) === 'function';
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * String form of an attribute value. Numbers are stringified; `nil`,
 * booleans and objects yield undefined.
 */
export function attributeString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * Copy an attribute hash, keeping entries with string or number values
 */
export function stringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isObject(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    const text = attributeString(entry);
    if (text !== undefined) {
      result[key] = text;
    }
  }
  return result;
}

export class AsciidoctorNode {
  constructor(readonly raw: object) {}

  static from(value: unknown): AsciidoctorNode | undefined {
    return isObject(value) ? new AsciidoctorNode(value) : undefined;
  }

  call(name: string, ...args: unknown[]): unknown {
    const target = this.raw;
    return hasMethod(target, name) ? target[name](...args) : undefined;
  }

  string(method: string, ...args: unknown[]): string | undefined {
    const value = this.call(method, ...args);
    return typeof value === 'string' ? value : undefined;
  }

  number(method: string): number | undefined {
    const value = this.call(method);
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  }

  bool(method: string): boolean {
    return this.call(method) === true;
  }

  node(method: string): AsciidoctorNode | undefined {
    const value = this.call(method);
    return hasMethod(value, 'getNodeName') ? new AsciidoctorNode(value) : undefined;
  }

  nodes(method: string): AsciidoctorNode[] {
    return toNodes(this.call(method));
  }

  attr(name: string): string | undefined {
    return attributeString(this.call('getAttribute', name));
  }

  attributes(): Record<string, string> {
    return stringRecord(this.call('getAttributes'));
  }

  get nodeName(): string {
    return this.string('getNodeName') ?? '';
  }

  get document(): AsciidoctorNode {
    return this.node('getDocument') ?? this;
  }
}

export function toNodes(value: unknown): AsciidoctorNode[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isObject).map(item => new AsciidoctorNode(item));
}

/**
 * Rows of a table section: an array of arrays of cells
 */
export function toRows(value: unknown): AsciidoctorNode[][] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map(row => toNodes(row));
}
