/**
 * exprvm Core - Diagnostics
 *
 * Console reporting with the `exprvm:` prefix. Warnings are development
 * only; errors go to a configured handler first and to the console when
 * there is none.
 */

export const isDev = (): boolean =>
  typeof process === 'undefined' || process.env?.NODE_ENV !== 'production';

export interface ErrorContext {
  /** Stage that failed. */
  phase: 'compile' | 'evaluate' | 'builtin';
  message: string;
  /** Builtin name or expression source, when known. */
  subject?: string;
}

export type ErrorHandler = (err: unknown, context: ErrorContext) => void;

export function warn(message: string, ...details: unknown[]): void {
  if (isDev()) console.warn(`exprvm: ${message}`, ...details);
}

export function reportError(handler: ErrorHandler | null | undefined, err: unknown, context: ErrorContext): void {
  if (typeof handler === 'function') {
    handler(err, context);
    return;
  }
  console.error(`exprvm: ${context.message}`, err);
}
