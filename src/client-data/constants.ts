/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/** Namespace of the highlight markers emitted by the search service. */
export const AFS_NAMESPACE = 'http://ref.antidot.net/v7/afs#';
export const AFS_PREFIX = 'afs';

/** Local name of the XML highlight element (`<afs:match>`). */
export const HIGHLIGHT_TAG = 'match';

/** Discriminant key and value of a highlighted JSON fragment. */
export const KWIC_TYPE_KEY = 'afs:t';
export const KWIC_STRING = 'KwicString';
export const KWIC_TEXT_KEY = 'text';

export const XML_MIME_TYPES = ['text/xml', 'application/xml'] as const;
export const JSON_MIME_TYPES = ['text/json', 'application/json'] as const;

export type XmlMimeType = (typeof XML_MIME_TYPES)[number];
export type JsonMimeType = (typeof JSON_MIME_TYPES)[number];
