export const WEBHOOK_VERIFIER = Symbol('WEBHOOK_VERIFIER');

/**
 * Checks that a webhook body was produced by the provider and returns the
 * decoded event. Implementations throw `WebhookSignatureError` when it was not.
 */
export interface WebhookVerifier {
  verify(rawBody: Buffer, signatureHeader: string | undefined): unknown;
}
