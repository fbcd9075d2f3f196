import type { BaseLogger } from "pino";

export interface StorageLogFields {
  op: string;
  source: string;
  durationMs: number;
  code?: string;
  key?: string;
  prefix?: string;
  attempt?: number;
}

type LogFields = StorageLogFields & Record<string, unknown>;

export interface StorageLogger {
  debug(fields: LogFields): void;
  info(fields: LogFields): void;
  warn(fields: LogFields): void;
  error(fields: LogFields): void;
}

export function isStorageLogger(value: unknown): value is StorageLogger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    "info" in value &&
    "warn" in value &&
    "error" in value
  );
}

export function createNoopStorageLogger(): StorageLogger {
  const noop = () => undefined;
  return { debug: noop, info: noop, warn: noop, error: noop };
}

/** Routes adapter log records into a pino logger, using `op` as the message. */
export function createPinoStorageLogger(base: BaseLogger): StorageLogger {
  return {
    debug: (fields) => base.debug(fields, `storage.${fields.op}`),
    info: (fields) => base.info(fields, `storage.${fields.op}`),
    warn: (fields) => base.warn(fields, `storage.${fields.op}`),
    error: (fields) => base.error(fields, `storage.${fields.op}`),
  };
}
