/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './client-data';
export type { Logger, LogLevel } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
