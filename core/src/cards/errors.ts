/**
 * Card protocol errors.
 */

/** A body carried the card marker but the envelope could not be used. */
export class MalformedCardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedCardError";
  }
}

/** A renderer submitted a response the card does not allow. */
export class InvalidCardResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCardResponseError";
  }
}
