import Ajv, { type AnySchema, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { Serializer } from '@/interfaces/serialization';
import { DEFAULT_SERIALIZATION, type SerializationConfig } from '@/models/config';

/**
 * Raised when a body cannot be encoded or a response cannot be decoded
 */
export class SerializationError extends Error {
  public readonly operation: 'encode' | 'decode';
  public readonly errors: string[];

  constructor(
    message: string,
    options: { operation?: 'encode' | 'decode'; errors?: string[]; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SerializationError';
    this.operation = options.operation ?? 'decode';
    this.errors = options.errors ?? [];
  }
}

/**
 * JSON encoding and decoding with optional schema validation
 */
export class JsonSerializer implements Serializer {
  public readonly contentType = 'application/json';
  private options: SerializationConfig;
  private ajv: Ajv;

  constructor(options: Partial<SerializationConfig> = {}) {
    this.options = { ...DEFAULT_SERIALIZATION, ...options };
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
      removeAdditional: this.options.ignoreUnknownKeys ? 'all' : false,
    });
    addFormats(this.ajv);
  }

  encode(value: unknown): string {
    let text: string | undefined;
    try {
      text = JSON.stringify(value, null, this.options.prettyPrint ? 2 : undefined);
    } catch (error) {
      throw new SerializationError('Request body could not be encoded as JSON', { operation: 'encode', cause: error });
    }
    if (text === undefined) {
      throw new SerializationError(`Request body of type ${typeof value} has no JSON representation`, {
        operation: 'encode',
      });
    }
    return text;
  }

  decode<T>(text: string, schema?: AnySchema): T {
    if (text.trim() === '') {
      return this.validate(undefined, schema);
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      if (!this.options.isLenient) {
        throw new SerializationError('Response body is not valid JSON', { cause: error });
      }
      value = text;
    }

    return this.validate(value, schema);
  }

  private validate<T>(value: unknown, schema?: AnySchema): T {
    if (schema === undefined) {
      // Without a schema the caller's type parameter is taken on trust
      return value as T;
    }

    // ajv caches compiled schemas by identity
    const validator: ValidateFunction<T> = this.ajv.compile<T>(schema);
    if (validator(value)) {
      return value;
    }

    const errors = (validator.errors ?? []).map(
      (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
    );
    throw new SerializationError(`Response body does not match the expected schema: ${errors.join('; ')}`, { errors });
  }
}
