/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { JSDOM, type DOMWindow } from 'jsdom';
import { AFS_NAMESPACE, AFS_PREFIX, HIGHLIGHT_TAG } from './constants';

export interface XmlParseError {
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
  message: string;
}

export interface HighlightRepair {
  /** Text to hand to the parser. */
  text: string;
  hasHighlightMarkup: boolean;
  /** True when the only markers are the bare `<match>`, outside any namespace. */
  hasBareMarkup: boolean;
}

const PREFIXED_MARKER = `<${AFS_PREFIX}:${HIGHLIGHT_TAG}>`;
const BARE_MARKER = `<${HIGHLIGHT_TAG}>`;
const NAMESPACE_DECLARATION = `xmlns:${AFS_PREFIX}=`;
const PARSER_ERROR_NAMESPACE = 'http://www.mozilla.org/newlayout/xml/parsererror.xml';

/**
 * Highlighted client data uses the afs prefix without declaring it.
 * When a marker is present the declaration is spliced in front of the first '>',
 * which is assumed to close the root start tag. Documents starting with a
 * prolog, comment or processing instruction come out broken and fail to parse.
 */
export function repairHighlightNamespace(raw: string): HighlightRepair {
  const hasPrefixedMarkup = raw.includes(PREFIXED_MARKER);
  const hasBareMarkup = !hasPrefixedMarkup && raw.includes(BARE_MARKER);
  if (!hasBareMarkup && !hasPrefixedMarkup) {
    return { text: raw, hasHighlightMarkup: false, hasBareMarkup };
  }
  const firstClose = raw.indexOf('>');
  if (firstClose >= 0 && raw.slice(0, firstClose).includes(NAMESPACE_DECLARATION)) {
    return { text: raw, hasHighlightMarkup: true, hasBareMarkup };
  }
  return {
    text: raw.replace('>', ` ${NAMESPACE_DECLARATION}"${AFS_NAMESPACE}">`),
    hasHighlightMarkup: true,
    hasBareMarkup,
  };
}

/**
 * Strict, namespace-aware sax pass over the text, used to locate the errors
 * of a document the DOM parser rejected. sax is stricter than the DOM parser
 * (no internal DTD entities), so an empty list is not a verdict on its own.
 */
export function checkWellFormed(text: string): XmlParseError[] {
  const errors: XmlParseError[] = [];
  let sawRoot = false;

  const parser = sax.parser(true, { xmlns: true });
  parser.onerror = (err: Error) => {
    errors.push({
      line: parser.line + 1,
      column: parser.column + 1,
      message: err.message.split('\n')[0],
    });
    parser.resume();
  };
  parser.onopentag = () => {
    sawRoot = true;
  };

  parser.write(text).close();

  if (!sawRoot && errors.length === 0) {
    errors.push({ line: parser.line + 1, column: parser.column + 1, message: 'No root element' });
  }
  return errors;
}

let sharedWindow: DOMWindow | undefined;

/** Window whose DOMParser and XPathResult serve every extractor. */
export function xmlWindow(): DOMWindow {
  if (!sharedWindow) sharedWindow = new JSDOM('').window;
  return sharedWindow;
}

/**
 * Parse into a DOM document. On failure the position comes from
 * {@link checkWellFormed}, falling back to 1:1 with the DOM parser's message.
 */
export function parseXmlDocument(text: string): Document | XmlParseError {
  const window = xmlWindow();
  const doc = new window.DOMParser().parseFromString(text, 'application/xml');
  const failure = doc.getElementsByTagNameNS(PARSER_ERROR_NAMESPACE, 'parsererror').item(0);
  if (!failure) {
    return doc;
  }
  const [located] = checkWellFormed(text);
  return located ?? {
    line: 1,
    column: 1,
    message: (failure.textContent ?? '').trim() || 'Parse error',
  };
}
