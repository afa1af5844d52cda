import type { AnySchema } from 'ajv';

/**
 * Converts request bodies to wire text and response text back to values
 */
export interface Serializer {
  /** Content-Type sent with encoded bodies */
  readonly contentType: string;

  encode(value: unknown): string;

  /**
   * Decode a response body, validating it against a JSON schema when one is
   * given
   */
  decode<T>(text: string, schema?: AnySchema): T;
}
