import { createCipheriv, createDecipheriv, createHash } from "node:crypto";
import { DecodeError } from "../../errors";

const HEADER_SIZE = 4;

/**
 * @description
 * Payload encryption for UDP datagrams.
 *
 * AES-256-CBC with PKCS#7 padding. Key and IV are derived from the session's
 * client id and a secret shared with the relay: the key is SHA-256 of
 * `clientId + secret`, the IV is the second half of that digest.
 *
 * Packet layout:
 * ```
 * ┌──────────────────────┬─────────────────┐
 * │ Ciphertext length    │   Ciphertext    │
 * │ (u32, little endian) │   (N bytes)     │
 * └──────────────────────┴─────────────────┘
 * ```
 */
export class UdpEncryption {
  private readonly key: Buffer;
  private readonly iv: Buffer;

  constructor(sessionId: string, sharedSecret: string) {
    const digest = createHash("sha256").update(sessionId + sharedSecret, "utf8").digest();
    this.key = digest;
    this.iv = digest.subarray(16, 32);
  }

  encrypt(plaintext: string): Uint8Array {
    const cipher = createCipheriv("aes-256-cbc", this.key, this.iv);
    return Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  }

  /**
   * @throws DecodeError when the ciphertext does not decrypt under this session's key
   */
  decrypt(ciphertext: Uint8Array): string {
    try {
      const decipher = createDecipheriv("aes-256-cbc", this.key, this.iv);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
    } catch (error) {
      throw new DecodeError("decrypt-failed", `Datagram failed to decrypt: ${String(error)}`);
    }
  }

  /**
   * Encrypt and prepend the length header.
   */
  seal(plaintext: string): Uint8Array {
    const body = this.encrypt(plaintext);
    const packet = Buffer.alloc(HEADER_SIZE + body.byteLength);
    packet.writeUInt32LE(body.byteLength, 0);
    packet.set(body, HEADER_SIZE);
    return packet;
  }

  /**
   * Check the length header and decrypt.
   * @throws DecodeError on a short packet, a header/size mismatch or a bad ciphertext
   */
  open(packet: Uint8Array): string {
    if (packet.byteLength < HEADER_SIZE) {
      throw new DecodeError("decrypt-failed", `Datagram too short for header (${packet.byteLength} bytes)`);
    }

    const view = new DataView(packet.buffer, packet.byteOffset, packet.byteLength);
    const length = view.getUint32(0, true);
    if (length === 0 || length !== packet.byteLength - HEADER_SIZE) {
      throw new DecodeError(
        "decrypt-failed",
        `Datagram length header ${length} does not match body ${packet.byteLength - HEADER_SIZE}`
      );
    }

    return this.decrypt(packet.subarray(HEADER_SIZE));
  }
}
