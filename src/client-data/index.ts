/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './constants';
export * from './errors';
export { ClientDataManager } from './manager';
export { createClientDataExtractor } from './factory';
export type { ClientDataExtractor } from './factory';
export { XmlClientDataExtractor } from './xml-extractor';
export { JsonClientDataExtractor } from './json-extractor';
export { JsonTextWalker, visitJsonText, highlightedText, isJsonObject } from './json-text-walker';
export { BoldHighlightFormatter, BoldHighlighter } from './highlight-formatter';
export { DefaultTextVisitor } from './text-visitor';
export { flattenText } from './dom-text';
export { checkWellFormed, repairHighlightNamespace } from './xml-parser';
export type { XmlParseError, HighlightRepair } from './xml-parser';
export { isHighlightFormatter, isTextVisitor } from './types';
export type {
  ClientDataOptions,
  ClientDataRecord,
  ClientDataReply,
  HighlightFormatter,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RawClientData,
  TextStrategy,
  TextVisitor,
} from './types';
