/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { JSON_MIME_TYPES, XML_MIME_TYPES } from './constants';
import { MalformedXmlError, MissingFieldError, UnsupportedMimeTypeError } from './errors';
import { JsonClientDataExtractor } from './json-extractor';
import { XmlClientDataExtractor } from './xml-extractor';
import type { ClientDataOptions, RawClientData } from './types';

export type ClientDataExtractor = XmlClientDataExtractor | JsonClientDataExtractor;

function includes(list: readonly string[], value: string): boolean {
  return list.includes(value);
}

/**
 * Build the extractor matching the record's mime type.
 * @throws MissingFieldError, UnsupportedMimeTypeError, MalformedXmlError
 */
export function createClientDataExtractor(
  record: RawClientData,
  options: ClientDataOptions = {}
): ClientDataExtractor {
  const { id, mimeType, contents } = record;
  if (mimeType === undefined) throw new MissingFieldError('mimeType');
  if (contents === undefined) throw new MissingFieldError('contents');
  if (id === undefined) throw new MissingFieldError('id');

  if (includes(XML_MIME_TYPES, mimeType)) {
    if (typeof contents !== 'string') {
      throw new MalformedXmlError(id, 'contents is not a string');
    }
    return new XmlClientDataExtractor(id, contents, options);
  }
  if (includes(JSON_MIME_TYPES, mimeType)) {
    return new JsonClientDataExtractor(id, contents, options);
  }
  throw new UnsupportedMimeTypeError(mimeType);
}
