/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export const getErrorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Base class of every error raised while extracting client data. */
export class ClientDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingFieldError extends ClientDataError {
  constructor(readonly field: 'id' | 'mimeType' | 'contents') {
    super(`No ${field} available for provided client data.`);
  }
}

export class UnsupportedMimeTypeError extends ClientDataError {
  constructor(readonly mimeType: string) {
    super(`Unmanaged client data type: ${mimeType}`);
  }
}

/** Line and column are 1-based; both are undefined when the input was not a string. */
export class MalformedXmlError extends ClientDataError {
  constructor(
    readonly id: string,
    readonly reason: string,
    readonly line?: number,
    readonly column?: number
  ) {
    super(
      line !== undefined && column !== undefined
        ? `Malformed XML in client data '${id}' at ${line}:${column}: ${reason}`
        : `Malformed XML in client data '${id}': ${reason}`
    );
  }
}

export class InvalidPathError extends ClientDataError {
  constructor(readonly path: string, cause: unknown) {
    super(`Invalid XPath expression '${path}': ${getErrorMessage(cause)}`, { cause });
  }
}

export class UnknownClientDataIdError extends ClientDataError {
  constructor(readonly id: string) {
    super(`No client data with id '${id}' found.`);
  }
}

export class IncompatibleFormatterError extends ClientDataError {
  constructor(readonly id: string, readonly kind: 'xml' | 'json') {
    super(
      kind === 'xml'
        ? `Client data '${id}' is XML and needs a highlight formatter.`
        : `Client data '${id}' is JSON and needs a text visitor.`
    );
  }
}
