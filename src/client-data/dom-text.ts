/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { HighlightFormatter } from './types';

// Node has no global Node constructor; compare nodeType against the DOM values.
const ELEMENT_NODE = 1;
const ATTRIBUTE_NODE = 2;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Concatenate the text below `node` in document order, ignoring markup,
 * comments and processing instructions. Elements accepted by `formatter`
 * are replaced by `formatter.render()` of their own plain text.
 */
export function flattenText(node: Node, formatter?: HighlightFormatter): string {
  switch (node.nodeType) {
    case TEXT_NODE:
    case CDATA_SECTION_NODE:
    case ATTRIBUTE_NODE:
      return node.nodeValue ?? '';
  }
  if (isElement(node) && formatter?.matches(node)) {
    return formatter.render(flattenText(node));
  }
  let text = '';
  for (const child of Array.from(node.childNodes)) {
    text += flattenText(child, formatter);
  }
  return text;
}
