import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type CompdbWarningCode = 'DUPLICATE_ENTRY' | 'EMPTY_COMMAND';

export type CompdbWarning = {
  code: CompdbWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * This must never throw. It prints only with debug logging on, and is also
 * emitted as a `warning` trace event when tracing is on.
 */
export function warn(w: CompdbWarning) {
  try {
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    logWarn(`warning(${w.code}): ${w.message}${hint}`);
    traceWarn('warning', { code: w.code, message: w.message });
  } catch {
    // Never throw from warnings.
  }
}
