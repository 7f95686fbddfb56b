/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { TextVisitor } from './types';

/** Plain fragments pass through; highlighted ones are wrapped in `<b>…</b>`. */
export class DefaultTextVisitor implements TextVisitor {
  onPlain(text: string): string {
    return text;
  }

  onHighlighted(text: string): string {
    return `<b>${text}</b>`;
  }
}
