/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Severity order, lowest first. */
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface Logger {
  /** Independent copy; context changes on the copy do not reach the original. */
  clone(): Logger;
  setContext(context: string | undefined): void;
  trace(message: string, ...attributes: unknown[]): void;
  debug(message: string, ...attributes: unknown[]): void;
  info(message: string, ...attributes: unknown[]): void;
  warn(message: string, ...attributes: unknown[]): void;
  error(message: string, ...attributes: unknown[]): void;
}

/** Clone of `logger` (or of `fallback()`) tagged with `context`. */
export function contextLogger(
  logger: Logger | undefined,
  context: string,
  fallback: () => Logger
): Logger {
  const child = (logger ?? fallback()).clone();
  child.setContext(context);
  return child;
}
