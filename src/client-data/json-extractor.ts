/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import { contextLogger, type Logger } from '../common/logger';
import { JsonTextWalker, isJsonObject } from './json-text-walker';
import { DefaultTextVisitor } from './text-visitor';
import type { ClientDataOptions, JsonValue, TextVisitor } from './types';

/** JSON client data, kept as the value received. */
export class JsonClientDataExtractor {
  readonly kind = 'json';
  private readonly visitor: TextVisitor;
  private readonly logger: Logger;

  constructor(
    readonly id: string,
    private readonly contents: JsonValue,
    options: ClientDataOptions = {}
  ) {
    this.logger = contextLogger(options.logger, 'JsonClientDataExtractor', () => new ConsoleLogger());
    this.visitor = options.visitor ?? new DefaultTextVisitor();
  }

  /**
   * Text of the field `name`, rendered through `visitor`.
   *
   * Without a name the whole contents come back as compact JSON. When the
   * contents are an array the array itself is rendered, whatever the name
   * (pass '' for plain text runs). A missing field logs a warning and yields ''.
   */
  getText(name?: string | null, visitor?: TextVisitor): string {
    if (name === undefined || name === null) {
      return JSON.stringify(this.contents);
    }
    const activeVisitor = visitor ?? this.visitor;
    if (Array.isArray(this.contents)) {
      return new JsonTextWalker(this.contents).visit(activeVisitor);
    }
    if (!isJsonObject(this.contents) || !Object.prototype.hasOwnProperty.call(this.contents, name)) {
      this.logger.warn(`No client data content named: ${name}`, { id: this.id });
      return '';
    }
    return new JsonTextWalker(this.contents[name]).visit(activeVisitor);
  }
}
