/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { IncompatibleFormatterError, UnknownClientDataIdError } from './errors';
import { createClientDataExtractor, type ClientDataExtractor } from './factory';
import {
  isHighlightFormatter,
  isTextVisitor,
  type ClientDataOptions,
  type ClientDataReply,
  type RawClientData,
  type TextStrategy,
} from './types';

/**
 * Client data of one reply, by id. Every extractor is built up front; a
 * later record with an already seen id replaces the earlier one.
 */
export class ClientDataManager {
  private readonly extractors: ReadonlyMap<string, ClientDataExtractor>;

  constructor(records: Iterable<RawClientData>, options: ClientDataOptions = {}) {
    const extractors = new Map<string, ClientDataExtractor>();
    for (const record of records) {
      const extractor = createClientDataExtractor(record, options);
      extractors.set(extractor.id, extractor);
    }
    this.extractors = extractors;
  }

  static fromReply(reply: ClientDataReply, options: ClientDataOptions = {}): ClientDataManager {
    return new ClientDataManager(reply.clientData ?? [], options);
  }

  /** Ids in the order they were first seen. */
  ids(): string[] {
    return [...this.extractors.keys()];
  }

  has(id: string): boolean {
    return this.extractors.has(id);
  }

  get(id: string): ClientDataExtractor {
    const extractor = this.extractors.get(id);
    if (!extractor) throw new UnknownClientDataIdError(id);
    return extractor;
  }

  /**
   * Text of client data `id`. `name` is an XPath for XML data and a field
   * name for JSON data; `formatter` must suit the kind of data stored.
   */
  getText(id: string, name?: string | null, formatter?: TextStrategy): string {
    const extractor = this.get(id);
    if (formatter === undefined) {
      return extractor.getText(name);
    }
    switch (extractor.kind) {
      case 'xml':
        if (!isHighlightFormatter(formatter)) throw new IncompatibleFormatterError(id, 'xml');
        return extractor.getText(name, formatter);
      case 'json':
        if (!isTextVisitor(formatter)) throw new IncompatibleFormatterError(id, 'json');
        return extractor.getText(name, formatter);
    }
  }
}
