/**
 * Error taxonomy
 * Channel-level errors travel as values inside Result; run-level errors end a run.
 */

import type { GuideVariant } from '../types/guide';

export class EpgError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'EpgError';
  }
}

export class ConfigError extends EpgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class RegistryError extends EpgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRY_ERROR', details);
    this.name = 'RegistryError';
  }
}

export type FetchErrorKind =
  | 'timeout'
  | 'network'
  | 'unexpected-status'
  | 'empty-response'
  | 'canceled'
  | 'no-lookup-key';

export class FetchError extends EpgError {
  constructor(
    public readonly channelId: string,
    public readonly kind: FetchErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', { channelId, kind, ...details });
    this.name = 'FetchError';
  }
}

export type ParseErrorKind = 'malformed-input' | 'unrecognized-format';

export class ParseError extends EpgError {
  constructor(
    public readonly channelId: string,
    public readonly kind: ParseErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PARSE_ERROR', { channelId, kind, ...details });
    this.name = 'ParseError';
  }
}

export class SerializeError extends EpgError {
  constructor(
    public readonly variant: GuideVariant,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'SERIALIZE_ERROR', { variant, ...details });
    this.name = 'SerializeError';
  }
}

export type RunErrorReason = 'no-usable-channels' | 'serialize-failed' | 'publish-failed' | 'busy';

export class RunError extends EpgError {
  constructor(
    public readonly reason: RunErrorReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'RUN_ERROR', { reason, ...details });
    this.name = 'RunError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
