/**
 * Error taxonomy
 *
 * Every error raised while declaring, decoding or encoding carries the
 * location (root-relative element path) where it happened. The message
 * always ends with that location so it can be read on its own.
 */

/**
 * Base class for all processing errors
 */
export class XmlError extends Error {
  readonly location: string;

  constructor(message: string, location = '', options?: { cause?: unknown }) {
    super(location ? `${message} at ${location}` : message, options);
    this.name = new.target.name;
    this.location = location;
  }
}

/**
 * A required element, attribute, container or value field is absent
 */
export class MissingValue extends XmlError {}

/**
 * Text is present but cannot be converted to the declared primitive type
 */
export class InvalidPrimitiveValue extends XmlError {
  readonly rawText: string;

  constructor(message: string, location = '', options?: { cause?: unknown; rawText?: string }) {
    super(message, location, options);
    this.rawText = options?.rawText ?? '';
  }
}

/**
 * Declaration-time misuse of a processor, detected independently of any document
 */
export class InvalidRootConfiguration extends XmlError {}

/**
 * Failure raised from a user hook
 */
export class UserFailure extends XmlError {}

/**
 * Constructor shape accepted by `ProcessorStateView.raiseError()`
 *
 * Any Error subclass constructible from a message works. Subclasses of
 * `XmlError` receive the location separately; other classes get it
 * appended to the message.
 */
export type LocatedErrorClass = new (message: string) => Error;

function isXmlErrorClass(value: unknown): value is typeof XmlError {
  return value === XmlError || (typeof value === 'function' && value.prototype instanceof XmlError);
}

/**
 * Class of an error, for building a copy of it elsewhere
 */
export function errorClassOf(error: XmlError): typeof XmlError {
  const errorClass: unknown = error.constructor;
  return isXmlErrorClass(errorClass) ? errorClass : XmlError;
}

/**
 * Build an error of the given class that carries `location`
 *
 * `options` reaches XmlError subclasses only.
 */
export function createLocatedError(
  errorClass: LocatedErrorClass,
  message: string,
  location: string,
  options?: { cause?: unknown; rawText?: string }
): Error {
  const error = isXmlErrorClass(errorClass)
    ? new errorClass(message, location, options)
    : new errorClass(location ? `${message} at ${location}` : message);
  return markLocated(error);
}

const located = new WeakSet<Error>();

/**
 * Remember that an error already has its location attached
 */
export function markLocated<E extends Error>(error: E): E {
  located.add(error);
  return error;
}

/**
 * True when the error already carries a location and must not be wrapped again
 *
 * An XmlError thrown without a location does not count.
 */
export function isLocated(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return located.has(error) || (error instanceof XmlError && error.location !== '');
}
