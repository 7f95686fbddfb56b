/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * One client data entry of a search reply, as deserialized from the wire.
 * XML contents arrive as a raw string, JSON contents as a parsed value.
 */
export interface ClientDataRecord {
  id: string;
  mimeType: string;
  contents: JsonValue;
}

/** Record as received; any field may be missing until the factory checks it. */
export type RawClientData = Partial<ClientDataRecord>;

/** Reply-shaped input: only the client data collection is read. */
export interface ClientDataReply {
  clientData?: RawClientData[];
}

/**
 * Renders XML highlight markers. `matches` picks the marker elements,
 * `render` decorates their flattened text.
 */
export interface HighlightFormatter {
  matches(element: Element): boolean;
  render(text: string): string;
}

/** Renders the fragments of a JSON text run. */
export interface TextVisitor {
  onPlain(text: string): string;
  onHighlighted(text: string): string;
}

export type TextStrategy = HighlightFormatter | TextVisitor;

export interface ClientDataOptions {
  logger?: Logger;
  /** Replaces the bold formatter used by XML extractors when a call passes none. */
  formatter?: HighlightFormatter;
  /** Replaces the bold visitor used by JSON extractors when a call passes none. */
  visitor?: TextVisitor;
}

export function isHighlightFormatter(strategy: TextStrategy): strategy is HighlightFormatter {
  return 'matches' in strategy && 'render' in strategy;
}

export function isTextVisitor(strategy: TextStrategy): strategy is TextVisitor {
  return 'onPlain' in strategy && 'onHighlighted' in strategy;
}
