import * as crypto from 'crypto';

const SHA256_HEX_LENGTH = 64;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

/**
 * HMAC-SHA256 signature verification over the raw request body
 *
 * Stateless: the secret is passed on every call.
 */
export class SignatureVerifier {
  readonly algorithm = 'sha256';

  /**
   * Lowercase hex HMAC of the body
   */
  sign(rawBody: Buffer | string, secret: string | Buffer): string {
    return crypto.createHmac(this.algorithm, secret).update(rawBody).digest('hex');
  }

  /**
   * Check a claimed hex signature against the body.
   *
   * Hex digits compare case-insensitively; the digest comparison is
   * constant-time. Anything absent, empty, non-hex or of the wrong length
   * is rejected before hashing.
   */
  verify(
    rawBody: Buffer,
    claimedSignatureHex: string | undefined | null,
    secret: string | Buffer | undefined | null,
  ): boolean {
    if (!secret || secret.length === 0) {
      return false;
    }

    if (
      typeof claimedSignatureHex !== 'string' ||
      claimedSignatureHex.length !== SHA256_HEX_LENGTH ||
      !HEX_PATTERN.test(claimedSignatureHex)
    ) {
      return false;
    }

    const expected = crypto
      .createHmac(this.algorithm, secret)
      .update(rawBody)
      .digest();
    const claimed = Buffer.from(claimedSignatureHex, 'hex');

    return this.timingSafeEqual(expected, claimed);
  }

  private timingSafeEqual(a: Buffer, b: Buffer): boolean {
    if (a.length !== b.length) {
      return false;
    }
    return crypto.timingSafeEqual(a, b);
  }
}
