export type LabelErrorCode =
  | 'INVALID_INPUT'
  | 'OUT_OF_BOUNDS'
  | 'TOO_MANY_ITEMS'
  | 'INVALID_OPTION'
  | 'UNSUPPORTED_FORMAT'
  | 'MISSING_EXTENSION'
  | 'EXPORT_UNAVAILABLE'
  | 'UNENCODABLE_TEXT';

/** Base class for every failure caused by the caller's labels, options or filename */
export class LabelError extends Error {
  constructor(readonly code: LabelErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Labels are not one of the accepted shapes */
export class InvalidInputError extends LabelError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export type GridAxis = 'row' | 'column';

/** A position-keyed label lies outside the sheet's grid */
export class OutOfBoundsError extends LabelError {
  constructor(
    readonly axis: GridAxis,
    readonly value: number,
    readonly limit: number,
  ) {
    super('OUT_OF_BOUNDS', `${axis} ${value} is out of bounds, must be in range [0, ${limit - 1}]`);
  }
}

/** More rows, columns or labels than the sheet holds */
export class TooManyItemsError extends LabelError {
  constructor(message: string) {
    super('TOO_MANY_ITEMS', message);
  }
}

export class InvalidOptionError extends LabelError {
  constructor(message: string) {
    super('INVALID_OPTION', message);
  }
}

export class UnsupportedFormatError extends LabelError {
  constructor(readonly extension: string, supported: readonly string[]) {
    super(
      'UNSUPPORTED_FORMAT',
      `Unsupported file extension "${extension}"; must end in ${supported.map((e) => `.${e}`).join(', ')}`,
    );
  }
}

export class MissingExtensionError extends LabelError {
  constructor(readonly filename: string, supported: readonly string[]) {
    super(
      'MISSING_EXTENSION',
      `File name "${filename}" has no extension; must end in ${supported.map((e) => `.${e}`).join(', ')}`,
    );
  }
}

/** The library needed for an export format could not be loaded */
export class ExportUnavailableError extends LabelError {
  constructor(readonly format: string, readonly dependency: string, cause: unknown) {
    super(
      'EXPORT_UNAVAILABLE',
      `Cannot export ${format}: module "${dependency}" failed to load (${cause instanceof Error ? cause.message : String(cause)})`,
    );
  }
}

/** Label text has characters no available PDF font can draw */
export class UnencodableTextError extends LabelError {
  constructor(readonly text: string, fontFile: string) {
    super(
      'UNENCODABLE_TEXT',
      `Cannot draw "${text}" in PDF: the standard fonts cannot encode it and no Unicode font was found at ${fontFile}; `
        + 'add that font or export as .svg or .png',
    );
  }
}
