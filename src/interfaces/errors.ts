/**
 * @module interfaces/errors
 * @description Error taxonomy for handshakes and fragment traffic.
 *
 * Handshake errors are terminal for one attempt and reach only the caller
 * that asked for the channel. Fragment errors are per fragment. None of
 * them is retried inside the library.
 */

/**
 * Base class for every protocol-level error.
 */
export abstract class SecureChannelError<C extends string = string> extends Error {
  constructor(
    message: string,
    public readonly code: C
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A curve point or key encoding is malformed or not on the curve.
 */
export class IdentificationError extends SecureChannelError<
  "INVALID_POINT" | "INVALID_KEY_ENCODING"
> {}

/**
 * A peer's static public key is not in the authorization set.
 */
export class AuthorizationError extends SecureChannelError<"NOT_AUTHORIZED"> {}

/**
 * A frame or handshake message does not match any known shape.
 */
export class ProtocolViolationError extends SecureChannelError<
  "MALFORMED_FRAME" | "MISSING_FIELD" | "UNEXPECTED_MESSAGE"
> {}

/**
 * A fragment's authentication tag does not verify.
 */
export class AuthenticationError extends SecureChannelError<"TAG_MISMATCH"> {}
