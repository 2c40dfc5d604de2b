/**
 * Node identity: an Ed25519 keypair addressed by the SHA-256 of its public key
 */

import { readFile, writeFile } from 'fs/promises';
import { ed25519 } from '@noble/curves/ed25519';
import { CryptoError, IdentityError, errorMessage } from '../error.js';
import { bytesToHex, sha256Hash } from './utils.js';

export const PRIVATE_KEY_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;
export const ADDRESS_LENGTH = 32;

/** 32-byte hash used as the routing key of a destination */
export type Address = Uint8Array;

export class Identity {
  private readonly secretKey: Uint8Array;
  private readonly verifyingKey: Uint8Array;

  private constructor(secretKey: Uint8Array) {
    this.secretKey = secretKey;
    this.verifyingKey = ed25519.getPublicKey(secretKey);
  }

  /**
   * Generate a new random identity
   */
  static generate(): Identity {
    return new Identity(ed25519.utils.randomPrivateKey());
  }

  /**
   * Create an identity from raw private key bytes
   */
  static fromBytes(privateKey: Uint8Array): Identity {
    if (privateKey.length !== PRIVATE_KEY_LENGTH) {
      throw new IdentityError(`Private key must be ${PRIVATE_KEY_LENGTH} bytes`, {
        length: privateKey.length,
      });
    }
    return new Identity(Uint8Array.from(privateKey));
  }

  /**
   * Load an identity saved with saveToFile()
   */
  static async loadFromFile(path: string): Promise<Identity> {
    let contents: Uint8Array;
    try {
      contents = await readFile(path);
    } catch (error) {
      throw new IdentityError(`Failed to read identity file: ${errorMessage(error)}`, { path });
    }
    return Identity.fromBytes(contents);
  }

  static addressFromPublicKey(publicKey: Uint8Array): Address {
    return sha256Hash(publicKey);
  }

  /**
   * Verify a signature made by another identity's public key
   */
  static verifyExternal(publicKey: Uint8Array, data: Uint8Array, signature: Uint8Array): void {
    if (publicKey.length !== PUBLIC_KEY_LENGTH) {
      throw new CryptoError(`Public key must be ${PUBLIC_KEY_LENGTH} bytes`, {
        length: publicKey.length,
      });
    }
    if (signature.length !== SIGNATURE_LENGTH) {
      throw new CryptoError(`Signature must be ${SIGNATURE_LENGTH} bytes`, {
        length: signature.length,
      });
    }

    let valid: boolean;
    try {
      valid = ed25519.verify(signature, data, publicKey);
    } catch (error) {
      throw new CryptoError(`Invalid public key: ${errorMessage(error)}`);
    }
    if (!valid) {
      throw new CryptoError('Signature verification failed');
    }
  }

  publicKey(): Uint8Array {
    return Uint8Array.from(this.verifyingKey);
  }

  /**
   * Private key bytes; the only state needed to restore the identity
   */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.secretKey);
  }

  address(): Address {
    return Identity.addressFromPublicKey(this.verifyingKey);
  }

  addressHex(): string {
    return bytesToHex(this.address());
  }

  sign(data: Uint8Array): Uint8Array {
    return ed25519.sign(data, this.secretKey);
  }

  verify(data: Uint8Array, signature: Uint8Array): void {
    Identity.verifyExternal(this.verifyingKey, data, signature);
  }

  async saveToFile(path: string): Promise<void> {
    try {
      await writeFile(path, this.secretKey, { mode: 0o600 });
    } catch (error) {
      throw new IdentityError(`Failed to write identity file: ${errorMessage(error)}`, { path });
    }
  }

  toString(): string {
    return `Identity(${this.addressHex()})`;
  }
}
