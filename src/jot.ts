export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

export interface StringNodeOptions {
  trim?: boolean;
  minLength?: number;
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: StringNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    const result = this.options.trim ? value.trim() : value;
    const minLength = this.options.minLength ?? 0;
    if (result.length < minLength) {
      throw new TypeError(`${path} must be at least ${minLength} character${minLength === 1 ? '' : 's'} long`);
    }

    return result;
  }
}

export interface NumberNodeOptions {
  positive?: boolean;
  coerce?: boolean;
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: NumberNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    const candidate = this.options.coerce && typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof candidate !== 'number' || !Number.isFinite(candidate)) {
      throw new TypeError(`${path} must be a finite number`);
    }

    if (this.options.positive && candidate <= 0) {
      throw new TypeError(`${path} must be greater than 0`);
    }

    return candidate;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class RecordNode<T> implements JotSchema<Record<string, T>> {
  constructor(readonly valueNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): Record<string, T> {
    const source = asPlainObject(value, path);
    // fromEntries defines own properties, so a `__proto__` key stays data.
    return Object.fromEntries(
      Object.entries(source).map(([key, item]): [string, T] => [
        key,
        this.valueNode.parse(item, `${path}[${JSON.stringify(key)}]`),
      ]),
    );
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.inner.parse(value, path);
  }
}

class DefaultNode<T> implements JotSchema<T> {
  constructor(readonly inner: JotSchema<T>, readonly fallback: T) {}

  parse(value: unknown, path: string = 'value'): T {
    if (value === undefined || value === null) {
      return this.fallback;
    }
    return this.inner.parse(value, path);
  }
}

type ObjectShape = Record<string, JotSchema<unknown>>;

class ObjectNode<Shape extends ObjectShape> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape) {}

  parse(value: unknown, path: string = 'value') {
    const source = asPlainObject(value, path);
    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(source[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

function asPlainObject(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError(`${path} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (options?: StringNodeOptions): JotSchema<string> => new StringNode(options),
  number: (options?: NumberNodeOptions): JotSchema<number> => new NumberNode(options),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  record: <T>(schema: JotSchema<T>): JotSchema<Record<string, T>> => new RecordNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  withDefault: <T>(schema: JotSchema<T>, fallback: T): JotSchema<T> => new DefaultNode(schema, fallback),
  object: <Shape extends ObjectShape>(shape: Shape) => new ObjectNode(shape),
};
