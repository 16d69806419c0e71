export type SdJwtErrorCode =
  | 'encoding_error'
  | 'invalid_signature'
  | 'unresolved_digest'
  | 'duplicate_digest'
  | 'credential_expired'
  | 'credential_not_yet_valid'
  | 'holder_binding_invalid'
  | 'holder_binding_missing'
  | 'policy_error'
  | 'signing_failed'
  | 'unknown_claim_selected'
  | 'binding_key_missing'
  | 'unknown_issuer'
  | 'invalid_config';

export class SdJwtError extends Error {
  constructor(readonly code: SdJwtErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Artifact, disclosure or payload structure does not follow the SD-JWT grammar. */
export class EncodingError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('encoding_error', message, options);
  }
}

export class InvalidSignatureError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_signature', message, options);
  }
}

/** A presented disclosure matches no placeholder in the signed payload. */
export class UnresolvedDigestError extends SdJwtError {
  constructor(message: string) {
    super('unresolved_digest', message);
  }
}

export class DuplicateDigestError extends SdJwtError {
  constructor(message: string) {
    super('duplicate_digest', message);
  }
}

export class ExpiredCredentialError extends SdJwtError {
  constructor(message: string) {
    super('credential_expired', message);
  }
}

export class NotYetValidError extends SdJwtError {
  constructor(message: string) {
    super('credential_not_yet_valid', message);
  }
}

export class HolderBindingError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('holder_binding_invalid', message, options);
  }
}

export class MissingBindingError extends SdJwtError {
  constructor(message: string) {
    super('holder_binding_missing', message);
  }
}

export class PolicyError extends SdJwtError {
  constructor(message: string) {
    super('policy_error', message);
  }
}

export class SigningError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('signing_failed', message, options);
  }
}

export class UnknownClaimSelectedError extends SdJwtError {
  constructor(message: string) {
    super('unknown_claim_selected', message);
  }
}

export class MissingBindingKeyError extends SdJwtError {
  constructor(message: string) {
    super('binding_key_missing', message);
  }
}

export class UnknownIssuerError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('unknown_issuer', message, options);
  }
}

export class ConfigError extends SdJwtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_config', message, options);
  }
}

export function isSdJwtError(err: unknown): err is SdJwtError {
  return err instanceof SdJwtError;
}

export function httpStatusFor(err: SdJwtError): number {
  switch (err.code) {
    case 'encoding_error':
    case 'policy_error':
    case 'unknown_claim_selected':
    case 'binding_key_missing':
    case 'invalid_config':
      return 400;
    case 'signing_failed':
      return 500;
    default:
      return 401;
  }
}
