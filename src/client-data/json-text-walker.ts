/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { KWIC_STRING, KWIC_TEXT_KEY, KWIC_TYPE_KEY } from './constants';
import type { JsonObject, JsonValue, TextVisitor } from './types';

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Payload of a `{ "afs:t": "KwicString", "text": … }` fragment, else undefined. */
export function highlightedText(value: JsonValue): string | undefined {
  if (!isJsonObject(value) || value[KWIC_TYPE_KEY] !== KWIC_STRING) return undefined;
  const text = value[KWIC_TEXT_KEY];
  return typeof text === 'string' ? text : undefined;
}

/**
 * Walks a JSON text run and renders each fragment through a visitor.
 * Arrays concatenate their elements with no separator; shapes that are
 * neither strings nor highlight markers are passed on as their JSON text.
 */
export class JsonTextWalker {
  constructor(private readonly value: JsonValue) {}

  visit(visitor: TextVisitor): string {
    return visitJsonText(this.value, visitor);
  }
}

export function visitJsonText(value: JsonValue, visitor: TextVisitor): string {
  if (Array.isArray(value)) {
    return value.map((item) => visitJsonText(item, visitor)).join('');
  }
  if (typeof value === 'string') {
    return visitor.onPlain(value);
  }
  const highlighted = highlightedText(value);
  if (highlighted !== undefined) {
    return visitor.onHighlighted(highlighted);
  }
  return visitor.onPlain(JSON.stringify(value));
}
