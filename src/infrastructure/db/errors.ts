import {
  FatalStorageError,
  IngestError,
  RowRejectedError,
  TransientStorageError,
  describeError,
} from '../../domain/index.js';

const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

/** SQLSTATE codes outside the transient classes that are still worth retrying. */
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57014', '57P01', '57P02', '57P03']);

/** SQLSTATE classes: connection exception, insufficient resources. */
const TRANSIENT_CLASSES = new Set(['08', '53']);

/** SQLSTATE classes: data exception, integrity constraint violation. */
const ROW_CLASSES = new Set(['22', '23']);

function codeOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

function isSqlState(code: string): boolean {
  return /^[0-9A-Z]{5}$/.test(code);
}

/**
 * Maps a postgres.js failure onto the storage error taxonomy.
 *
 * SQLSTATE classes decide for server errors; Node socket codes and the
 * driver's own connection codes are transient. Anything unrecognised is fatal.
 */
export function toStorageError(err: unknown): IngestError {
  if (err instanceof IngestError) return err;

  const code = codeOf(err) ?? codeOf(err instanceof Error ? err.cause : undefined);
  const message = describeError(err);

  if (code !== undefined) {
    if (TRANSIENT_SOCKET_CODES.has(code)) {
      return new TransientStorageError(`Database connection failed: ${message}`, code, { cause: err });
    }

    if (isSqlState(code)) {
      const sqlClass = code.slice(0, 2);
      if (TRANSIENT_SQLSTATES.has(code) || TRANSIENT_CLASSES.has(sqlClass)) {
        return new TransientStorageError(`Transient database error ${code}: ${message}`, code, { cause: err });
      }
      if (ROW_CLASSES.has(sqlClass)) {
        return new RowRejectedError(`Row rejected ${code}: ${message}`, code, { cause: err });
      }
      return new FatalStorageError(`Database error ${code}: ${message}`, code, { cause: err });
    }
  }

  return new FatalStorageError(`Database error: ${message}`, code, { cause: err });
}
