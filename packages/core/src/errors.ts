export type IntakeErrorCode =
  | 'SUBSCRIPTION_NOT_FOUND'
  | 'MALFORMED_REQUEST'
  | 'UNSUPPORTED_EVENT_KIND'
  | 'INVALID_SIGNATURE'
  | 'MALFORMED_BODY'
  | 'PAYLOAD_SCHEMA_MISMATCH';

/**
 * Classification failure for one inbound webhook request. Terminal for the
 * request: nothing is retried internally.
 */
export class IntakeError extends Error {
  constructor(readonly code: IntakeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SubscriptionNotFoundError extends IntakeError {
  constructor(readonly subscriptionId: string | null) {
    super('SUBSCRIPTION_NOT_FOUND', subscriptionId ? `Webhook ${subscriptionId} not found` : 'Missing webhook id');
  }
}

export class MalformedRequestError extends IntakeError {
  constructor(readonly header: string) {
    super('MALFORMED_REQUEST', `Missing ${header} header`);
  }
}

export class UnsupportedEventKindError extends IntakeError {
  constructor(readonly eventKind: string) {
    super('UNSUPPORTED_EVENT_KIND', `Unsupported event kind "${eventKind}"`);
  }
}

export class InvalidSignatureError extends IntakeError {
  constructor() {
    super('INVALID_SIGNATURE', 'Invalid signature');
  }
}

export class MalformedBodyError extends IntakeError {
  constructor(reason: string) {
    super('MALFORMED_BODY', reason);
  }
}

export class PayloadSchemaMismatchError extends IntakeError {
  constructor(readonly eventKind: string, readonly issues: string[]) {
    super('PAYLOAD_SCHEMA_MISMATCH', `Payload does not match ${eventKind} schema: ${issues.join('; ')}`);
  }
}

/** A subscription for the same repository and channel already exists. */
export class DuplicateSubscriptionError extends Error {
  constructor(readonly repo: string, readonly channelId: string) {
    super(`A webhook for ${repo} in ${channelId} already exists`);
    this.name = 'DuplicateSubscriptionError';
  }
}
