/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import { contextLogger, type Logger } from '../common/logger';
import { AFS_NAMESPACE, AFS_PREFIX, HIGHLIGHT_TAG } from './constants';
import { flattenText } from './dom-text';
import { InvalidPathError, MalformedXmlError } from './errors';
import { BoldHighlightFormatter } from './highlight-formatter';
import { parseXmlDocument, repairHighlightNamespace, xmlWindow } from './xml-parser';
import type { ClientDataOptions, HighlightFormatter } from './types';

const namespaceResolver = {
  lookupNamespaceURI(prefix: string | null): string | null {
    return prefix === AFS_PREFIX ? AFS_NAMESPACE : null;
  },
};

/**
 * XML client data. The document is parsed once, at construction, after the
 * highlight namespace repair; it is never modified afterwards.
 */
export class XmlClientDataExtractor {
  readonly kind = 'xml';
  readonly hasHighlightMarkup: boolean;
  private readonly doc: Document;
  private readonly formatter: HighlightFormatter;
  private readonly logger: Logger;

  /** @throws MalformedXmlError when the (repaired) contents are not well formed */
  constructor(
    readonly id: string,
    private readonly contents: string,
    options: ClientDataOptions = {}
  ) {
    this.logger = contextLogger(options.logger, 'XmlClientDataExtractor', () => new ConsoleLogger());
    const repair = repairHighlightNamespace(contents);
    this.formatter =
      options.formatter ??
      new BoldHighlightFormatter(
        HIGHLIGHT_TAG,
        repair.hasBareMarkup ? [AFS_NAMESPACE, null] : [AFS_NAMESPACE]
      );
    this.hasHighlightMarkup = repair.hasHighlightMarkup;
    if (repair.text !== contents) {
      this.logger.debug(`declared highlight namespace in client data '${id}'`);
    }

    const parsed = parseXmlDocument(repair.text);
    if (!('documentElement' in parsed)) {
      throw new MalformedXmlError(id, parsed.message, parsed.line, parsed.column);
    }
    this.doc = parsed;
  }

  /**
   * Text of the first node selected by `path`.
   *
   * Without a path the original contents are returned untouched. A path that
   * selects nothing yields '', the same as a path selecting an empty element.
   * @throws InvalidPathError when `path` is not a valid node-set expression
   */
  getText(path?: string | null, formatter?: HighlightFormatter): string {
    if (path === undefined || path === null) {
      return this.contents;
    }
    const node = this.selectFirst(path);
    if (!node) {
      return '';
    }
    return this.hasHighlightMarkup
      ? flattenText(node, formatter ?? this.formatter)
      : flattenText(node);
  }

  private selectFirst(path: string): Node | null {
    const snapshotType: number = xmlWindow().XPathResult.ORDERED_NODE_SNAPSHOT_TYPE;
    let result: XPathResult;
    try {
      result = this.doc.evaluate(
        path,
        this.doc,
        namespaceResolver,
        snapshotType,
        null
      );
    } catch (err) {
      throw new InvalidPathError(path, err);
    }
    return result.snapshotLength > 0 ? result.snapshotItem(0) : null;
  }
}
