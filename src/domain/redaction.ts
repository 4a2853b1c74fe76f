/**
 * Secret redaction.
 *
 * A SecretRedactor is owned by one run. Every credential value resolved for
 * any of the run's stages is registered here, and every string that leaves
 * the engine (stage logs, typed errors, log lines, events) is passed through
 * redact() first.
 */

import { TypedError } from './errors';

export const REDACTED = '[REDACTED]';

export class SecretRedactor {
  private values: string[] = [];

  /** Register secret values. Empty strings are ignored. */
  add(values: Iterable<string>): void {
    for (const value of values) {
      if (value.length > 0 && !this.values.includes(value)) {
        this.values.push(value);
      }
    }
    // Longest first so a secret that contains another is replaced whole.
    this.values.sort((a, b) => b.length - a.length);
  }

  get size(): number {
    return this.values.length;
  }

  redact(text: string): string {
    let result = text;
    for (const value of this.values) {
      // split/join avoids regex escaping of arbitrary secret characters
      result = result.split(value).join(REDACTED);
    }
    return result;
  }

  /** Deep-redact string leaves of a JSON-like value. */
  redactValue(value: unknown): unknown {
    if (typeof value === 'string') return this.redact(value);
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item));
    if (value !== null && typeof value === 'object') {
      const out: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value)) {
        out[key] = this.redactValue(inner);
      }
      return out;
    }
    return value;
  }

  redactError(error: TypedError): TypedError {
    const details = error.details ? this.redactValue(error.details) : undefined;
    return {
      ...error,
      message: this.redact(error.message),
      details: isRecord(details) ? details : undefined,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
