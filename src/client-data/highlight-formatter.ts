/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { AFS_NAMESPACE, HIGHLIGHT_TAG } from './constants';
import type { HighlightFormatter, TextVisitor } from './types';

/**
 * Wraps highlighted text in `<b>…</b>`.
 *
 * Marker elements are those with local name `tagName` in one of `namespaces`;
 * `null` stands for elements outside any namespace, such as a bare `<match>`.
 */
export class BoldHighlightFormatter implements HighlightFormatter {
  constructor(
    readonly tagName: string = HIGHLIGHT_TAG,
    readonly namespaces: readonly (string | null)[] = [AFS_NAMESPACE]
  ) {}

  matches(element: Element): boolean {
    return element.localName === this.tagName && this.namespaces.includes(element.namespaceURI);
  }

  render(text: string): string {
    return `<b>${text}</b>`;
  }
}

/** Bold rendering usable for both XML and JSON client data. */
export class BoldHighlighter extends BoldHighlightFormatter implements TextVisitor {
  onPlain(text: string): string {
    return text;
  }

  onHighlighted(text: string): string {
    return this.render(text);
  }
}
