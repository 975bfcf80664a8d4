/**
 * Centralized Meter Error Types
 *
 * Human-readable error codes with titles and hints for UI surfacing.
 * Stack traces remain in console, UI shows clean messages.
 *
 * @module core/meterErrors
 */

/** Error severity levels */
export type MeterErrorSeverity = 'warning' | 'error' | 'fatal';

/** METER_ERR error codes */
export type MeterErrorCode =
  // Capture lifecycle errors
  | 'METER_ERR_PERMISSION_DENIED'
  | 'METER_ERR_ENGINE_START_FAILED'
  // Configuration errors
  | 'METER_ERR_INVALID_CONFIGURATION'
  // Stream errors
  | 'METER_ERR_STREAM_FAILED';

/** Error definition with human-readable messages */
export interface MeterErrorDef {
  code: MeterErrorCode;
  title: string;
  body: string;
  hint?: string;
  severity: MeterErrorSeverity;
}

/** Error catalog mapping codes to definitions */
export const METER_ERROR_CATALOG: Record<MeterErrorCode, Omit<MeterErrorDef, 'code'>> = {
  METER_ERR_PERMISSION_DENIED: {
    title: 'Microphone Access Denied',
    body: 'Microphone access was declined for this session.',
    hint: 'Allow microphone access in the system privacy settings, then start again.',
    severity: 'error',
  },
  METER_ERR_ENGINE_START_FAILED: {
    title: 'Audio Input Failed',
    body: 'The audio input could not be started.',
    hint: 'The device may be busy or use an unsupported format. Try again or pick another input.',
    severity: 'error',
  },
  METER_ERR_INVALID_CONFIGURATION: {
    title: 'Invalid Meter Configuration',
    body: 'The level meter was configured with out-of-range values.',
    hint: 'maxDecibels must be greater than minDecibels and silenceFloor must be positive.',
    severity: 'fatal',
  },
  METER_ERR_STREAM_FAILED: {
    title: 'Input Stream Error',
    body: 'The input stream reported an error and stopped delivering audio.',
    severity: 'warning',
  },
};

/**
 * Get full error definition by code
 */
export function getErrorDef(code: MeterErrorCode): MeterErrorDef {
  const def = METER_ERROR_CATALOG[code];
  return { code, ...def };
}

/**
 * Create a meter error object for throwing/displaying
 */
export function createMeterError(
  code: MeterErrorCode,
  details?: string,
  cause?: unknown
): MeterError {
  const def = getErrorDef(code);
  return new MeterError(code, def.title, def.body, def.hint, def.severity, details, cause);
}

/**
 * MeterError class - extends Error with structured info
 */
export class MeterError extends Error {
  readonly code: MeterErrorCode;
  readonly title: string;
  readonly body: string;
  readonly hint?: string;
  readonly severity: MeterErrorSeverity;
  readonly details?: string;

  constructor(
    code: MeterErrorCode,
    title: string,
    body: string,
    hint?: string,
    severity: MeterErrorSeverity = 'error',
    details?: string,
    cause?: unknown
  ) {
    super(`${code}: ${title}`, cause === undefined ? undefined : { cause });
    this.name = 'MeterError';
    this.code = code;
    this.title = title;
    this.body = body;
    this.hint = hint;
    this.severity = severity;
    this.details = details;
  }

  /**
   * Get formatted message for UI display (no stack trace)
   */
  toUIMessage(): string {
    return this.body + (this.hint ? ` ${this.hint}` : '');
  }

  /**
   * Get formatted message for console (with code)
   */
  toConsoleMessage(): string {
    let msg = `[${this.code}] ${this.title}: ${this.body}`;
    if (this.details) msg += ` (${this.details})`;
    if (this.hint) msg += ` Hint: ${this.hint}`;
    return msg;
  }
}

/**
 * Narrow an unknown value to a MeterError, optionally of a given code.
 */
export function isMeterError(value: unknown, code?: MeterErrorCode): value is MeterError {
  return value instanceof MeterError && (code === undefined || value.code === code);
}

/**
 * Log meter error to console
 */
export function logMeterError(error: MeterError | MeterErrorCode, details?: string): void {
  const meterError = typeof error === 'string'
    ? createMeterError(error, details)
    : error;

  if (meterError.severity === 'fatal') {
    console.error(meterError.toConsoleMessage(), meterError);
  } else if (meterError.severity === 'error') {
    console.error(meterError.toConsoleMessage());
  } else {
    console.warn(meterError.toConsoleMessage());
  }
}

/**
 * Describe an unknown thrown value for error details.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
