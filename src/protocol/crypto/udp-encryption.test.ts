import { describe, expect, it } from "vitest";
import { DecodeError } from "../../errors";
import { UdpEncryption } from "./udp-encryption";

function catchDecodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error("Expected a DecodeError");
}

describe("UdpEncryption", () => {
  it("opens what it sealed", () => {
    const encryption = new UdpEncryption("client_1", "test-secret");

    const packet = encryption.seal('{"type":"HEARTBEAT"}');

    expect(encryption.open(packet)).toBe('{"type":"HEARTBEAT"}');
  });

  it("prefixes the ciphertext with its little-endian length", () => {
    const encryption = new UdpEncryption("client_1", "test-secret");

    const packet = encryption.seal("hello");

    expect(packet.byteLength).toBe(20);
    expect(Array.from(packet.subarray(0, 4))).toEqual([16, 0, 0, 0]);
  });

  it("derives the key from the session and the secret", () => {
    const a = new UdpEncryption("client_1", "test-secret");
    const b = new UdpEncryption("client_1", "test-secret");
    const other = new UdpEncryption("client_2", "test-secret");

    expect(Array.from(a.seal("hello"))).toEqual(Array.from(b.seal("hello")));
    expect(Array.from(a.seal("hello"))).not.toEqual(Array.from(other.seal("hello")));
  });

  it("rejects a packet sealed for another session", () => {
    const plaintext = '{"type":"HEARTBEAT"}';
    const sealed = new UdpEncryption("client_2", "test-secret").seal(plaintext);

    // a wrong key usually fails the padding check, and never yields the plaintext
    let opened: string | undefined;
    try {
      opened = new UdpEncryption("client_1", "test-secret").open(sealed);
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
    }
    expect(opened).not.toBe(plaintext);
  });

  it("rejects a packet too short for its header", () => {
    const error = catchDecodeError(() => new UdpEncryption("client_1", "test-secret").open(new Uint8Array(2)));

    expect(error.reason).toBe("decrypt-failed");
    expect(error.message).toBe("Datagram too short for header (2 bytes)");
  });

  it("rejects a length header that does not match the body", () => {
    const encryption = new UdpEncryption("client_1", "test-secret");
    const truncated = encryption.seal("hello").subarray(0, 19);

    const error = catchDecodeError(() => encryption.open(truncated));

    expect(error.reason).toBe("decrypt-failed");
    expect(error.message).toBe("Datagram length header 16 does not match body 15");
  });
});
