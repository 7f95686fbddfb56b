/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { RecordingLogger } from '../test/recording-logger';
import { InvalidPathError, MalformedXmlError } from './errors';
import { XmlClientDataExtractor } from './xml-extractor';
import type { HighlightFormatter } from './types';

const PLAIN = '<doc>\n  <title>Hello <em>big</em> world</title>\n  <empty/>\n</doc>';
const HIGHLIGHTED = '<doc><title>Hello <afs:match>world</afs:match>!</title></doc>';

const brackets: HighlightFormatter = {
  matches: (element) => element.localName === 'match',
  render: (text) => `[${text}]`,
};

describe('XmlClientDataExtractor', () => {
  describe('without highlight markup', () => {
    const extractor = new XmlClientDataExtractor('plain', PLAIN);

    it('does not flag highlight markup', () => {
      expect(extractor.hasHighlightMarkup).toBe(false);
      expect(extractor.kind).toBe('xml');
      expect(extractor.id).toBe('plain');
    });

    it('returns the original contents when no path is given', () => {
      expect(extractor.getText()).toBe(PLAIN);
      expect(extractor.getText(null)).toBe(PLAIN);
    });

    it('flattens the text of the selected node', () => {
      expect(extractor.getText('/doc/title')).toBe('Hello big world');
    });

    it('ignores a formatter when no markup was flagged', () => {
      expect(extractor.getText('//title', brackets)).toBe('Hello big world');
    });

    it('returns an empty string for unknown and empty nodes alike', () => {
      expect(extractor.getText('/doc/missing')).toBe('');
      expect(extractor.getText('/doc/empty')).toBe('');
    });

    it('throws InvalidPathError for malformed expressions', () => {
      expect(() => extractor.getText('/doc/[')).toThrow(InvalidPathError);
    });
  });

  describe('with highlight markup', () => {
    const logger = new RecordingLogger();
    const extractor = new XmlClientDataExtractor('hl', HIGHLIGHTED, { logger });

    it('flags highlight markup and logs the repair', () => {
      expect(extractor.hasHighlightMarkup).toBe(true);
      expect(logger.entries).toContainEqual({
        level: 'debug',
        context: 'XmlClientDataExtractor',
        message: "declared highlight namespace in client data 'hl'",
        attributes: [],
      });
    });

    it('returns the contents as received, without the declared namespace', () => {
      expect(extractor.getText(null)).toBe(HIGHLIGHTED);
    });

    it('renders matches in bold by default', () => {
      expect(extractor.getText('/doc/title')).toBe('Hello <b>world</b>!');
    });

    it('applies a caller supplied formatter', () => {
      expect(extractor.getText('/doc/title', brackets)).toBe('Hello [world]!');
    });

    it('resolves the afs prefix in expressions', () => {
      expect(extractor.getText('//afs:match')).toBe('<b>world</b>');
    });

    it('uses the formatter from the options as default', () => {
      const custom = new XmlClientDataExtractor('hl', HIGHLIGHTED, { formatter: brackets, logger });
      expect(custom.getText('/doc/title')).toBe('Hello [world]!');
    });

    it('renders bare match elements', () => {
      const bare = new XmlClientDataExtractor('bare', '<doc><match>x</match> y</doc>', { logger });
      expect(bare.hasHighlightMarkup).toBe(true);
      expect(bare.getText('/doc')).toBe('<b>x</b> y');
    });
  });

  describe('markup the DOM parser accepts', () => {
    it('keeps elements named parsererror', () => {
      const extractor = new XmlClientDataExtractor('p', '<doc><parsererror>x</parsererror></doc>');
      expect(extractor.getText('/doc/parsererror')).toBe('x');
    });

    it('expands internal DTD entities', () => {
      const extractor = new XmlClientDataExtractor('dtd', '<!DOCTYPE doc [<!ENTITY e "ent">]><doc>&e;</doc>');
      expect(extractor.getText('/doc')).toBe('ent');
    });

    it('repairs documents mentioning the declaration in their text', () => {
      const raw = '<doc><note>use xmlns:afs=</note><afs:match>hit</afs:match></doc>';
      const extractor = new XmlClientDataExtractor('note', raw, { logger: new RecordingLogger() });
      expect(extractor.getText('/doc')).toBe('use xmlns:afs=<b>hit</b>');
    });

    it('leaves bare match elements alone when markers are prefixed', () => {
      const raw = '<doc><afs:match>hit</afs:match><meta><match>score</match></meta></doc>';
      const extractor = new XmlClientDataExtractor('mixed', raw, { logger: new RecordingLogger() });
      expect(extractor.getText('/doc')).toBe('<b>hit</b>score');
    });
  });

  describe('malformed contents', () => {
    it('throws MalformedXmlError with the position of the first error', () => {
      let caught: unknown;
      try {
        new XmlClientDataExtractor('bad', '<doc><a></doc>');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MalformedXmlError);
      if (caught instanceof MalformedXmlError) {
        expect(caught.id).toBe('bad');
        expect(caught.line).toBe(1);
      }
    });

    it('fails when a prolog precedes the root of highlighted contents', () => {
      const raw = '<?xml version="1.0"?><doc><afs:match>x</afs:match></doc>';
      expect(() => new XmlClientDataExtractor('prolog', raw, { logger: new RecordingLogger() })).toThrow(
        MalformedXmlError
      );
    });
  });
});
