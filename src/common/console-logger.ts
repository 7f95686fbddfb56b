/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { LOG_LEVELS, type LogLevel, type Logger } from './logger';

/**
 * Logger writing through the console. Messages below `level` are dropped,
 * the context (when set) is printed ahead of the message.
 */
export class ConsoleLogger implements Logger {
  private context: string | undefined;

  constructor(private readonly level: LogLevel = 'info', context?: string) {
    this.context = context;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level, this.context);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.write('trace', console.trace, message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.write('debug', console.debug, message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.write('info', console.info, message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.write('warn', console.warn, message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.write('error', console.error, message, attributes);
  }

  private write(
    level: LogLevel,
    sink: (...data: unknown[]) => void,
    message: string,
    attributes: unknown[]
  ): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;
    if (this.context) sink(this.context, message, ...attributes);
    else sink(message, ...attributes);
  }
}
