/**
 * Logging API table
 *
 * Maps (module, member) to the argument positions that may hold the log
 * message. Positions are tried in order; the first one that exists in the
 * call and holds a string-typed argument is the message.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One logging library and the message positions of its methods
 */
export interface LoggingApiFamily {
  /** npm module the methods are declared in */
  module: string;
  /** Member name to candidate message positions */
  methods: Readonly<Record<string, readonly number[]>>;
}

/**
 * Read-only lookup built from the API families
 */
export interface LoggingApiSpec {
  /** Candidate message positions, or undefined when the member is not a logging API */
  messagePositions(modulePath: string, memberName: string): readonly number[] | undefined;
  /** Number of (module, member) entries */
  readonly size: number;
}

// ============================================================================
// Families
// ============================================================================

/** pino: `logger.info(msg, ...args)` or `logger.info(mergingObject, msg, ...args)` */
const PINO_POSITIONS = Object.freeze([0, 1]);

export const PINO_API: LoggingApiFamily = Object.freeze({
  module: 'pino',
  methods: Object.freeze({
    trace: PINO_POSITIONS,
    debug: PINO_POSITIONS,
    info: PINO_POSITIONS,
    warn: PINO_POSITIONS,
    error: PINO_POSITIONS,
    fatal: PINO_POSITIONS,
  }),
});

/**
 * winston: `logger.info(message, ...meta)` and `logger.log(level, message, ...meta)`.
 * Covers the npm, cli and syslog level sets.
 */
const WINSTON_LEVEL_POSITIONS = Object.freeze([0]);

export const WINSTON_API: LoggingApiFamily = Object.freeze({
  module: 'winston',
  methods: Object.freeze({
    error: WINSTON_LEVEL_POSITIONS,
    warn: WINSTON_LEVEL_POSITIONS,
    info: WINSTON_LEVEL_POSITIONS,
    http: WINSTON_LEVEL_POSITIONS,
    verbose: WINSTON_LEVEL_POSITIONS,
    debug: WINSTON_LEVEL_POSITIONS,
    silly: WINSTON_LEVEL_POSITIONS,
    help: WINSTON_LEVEL_POSITIONS,
    data: WINSTON_LEVEL_POSITIONS,
    prompt: WINSTON_LEVEL_POSITIONS,
    input: WINSTON_LEVEL_POSITIONS,
    emerg: WINSTON_LEVEL_POSITIONS,
    alert: WINSTON_LEVEL_POSITIONS,
    crit: WINSTON_LEVEL_POSITIONS,
    warning: WINSTON_LEVEL_POSITIONS,
    notice: WINSTON_LEVEL_POSITIONS,
    log: Object.freeze([1]),
  }),
});

export const DEFAULT_LOGGING_APIS: readonly LoggingApiFamily[] = Object.freeze([PINO_API, WINSTON_API]);

// ============================================================================
// Spec Construction
// ============================================================================

function entryKey(modulePath: string, memberName: string): string {
  return `${modulePath}#${memberName}`;
}

/**
 * Build the immutable lookup from a list of API families
 */
export function createLoggingApiSpec(
  families: readonly LoggingApiFamily[] = DEFAULT_LOGGING_APIS
): LoggingApiSpec {
  const entries = new Map<string, readonly number[]>();

  for (const family of families) {
    for (const [member, positions] of Object.entries(family.methods)) {
      entries.set(entryKey(family.module, member), positions);
    }
  }

  return Object.freeze({
    messagePositions(modulePath: string, memberName: string): readonly number[] | undefined {
      return entries.get(entryKey(modulePath, memberName));
    },
    size: entries.size,
  });
}
