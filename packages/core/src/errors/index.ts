/**
 * Custom Error Classes
 */

/**
 * Base error class for all debslice errors
 */
export class DebsliceError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DebsliceError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid option values (unknown media name, conflicting flags)
 */
export class ConfigurationError extends DebsliceError {
  constructor(option: string, message: string) {
    super(
      message,
      'CONFIGURATION_ERROR',
      { option }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * An index document could not be read or decompressed
 */
export class IndexReadError extends DebsliceError {
  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to read index ${file}: ${reason}`,
      'INDEX_READ_ERROR',
      { file, reason }
    );
    this.name = 'IndexReadError';
  }
}

export type OversizedItemKind = 'package' | 'source';

/**
 * A single package or source does not fit into an empty partition
 */
export class OversizedItemError extends DebsliceError {
  public readonly kind: OversizedItemKind;
  public readonly item: string;
  public readonly size: number;
  public readonly capacity: number;

  constructor(
    kind: OversizedItemKind,
    item: string,
    size: number,
    capacity: number,
    partition: number
  ) {
    super(
      `Size '${capacity}' is too small to locate ${kind} '${item}' in ${kind === 'source' ? 'source ' : ''}partition ${partition}: size '${size}'`,
      'OVERSIZED_ITEM',
      { kind, item, size, capacity, partition }
    );
    this.name = 'OversizedItemError';
    this.kind = kind;
    this.item = item;
    this.size = size;
    this.capacity = capacity;
  }
}

export function isDebsliceError(error: unknown): error is DebsliceError {
  return error instanceof DebsliceError;
}
