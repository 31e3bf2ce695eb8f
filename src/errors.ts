/**
 * Error taxonomy
 * Every failure the tool reports to the operator is one of these
 */

export class MacropadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Conflicting or missing command-line arguments */
export class ConfigurationError extends MacropadError {}

/** Serial device could not be opened (bad path, permissions, unplugged) */
export class OpenError extends MacropadError {
  readonly deviceId: string | undefined;

  constructor(deviceId: string | undefined, message: string, options?: ErrorOptions) {
    super(message, options);
    this.deviceId = deviceId;
  }
}

export class ReadError extends MacropadError {}

/** Device sent bytes that are not valid UTF-8 */
export class DecodeError extends ReadError {}

export class WriteError extends MacropadError {}

