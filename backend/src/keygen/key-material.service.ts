import { Injectable } from '@nestjs/common';
import { createPublicKey, generateKeyPair } from 'crypto';
import { promisify } from 'util';
import { KeySpec, isRsaKeyBits } from './job-spec';
import { KeyMaterial } from './result-store/result-record';
import { PermanentProcessingError, TransientInfrastructureError } from './keygen.errors';
import { errorCode, errorMessage } from '../common/utils/errors';

const generateKeyPairAsync = promisify(generateKeyPair);

const RSA_PUBLIC_EXPONENT = 0x10001;

/** Node error codes raised when the generator rejects its parameters. */
const PERMANENT_ERROR_CODES = new Set([
  'ERR_INVALID_ARG_VALUE',
  'ERR_INVALID_ARG_TYPE',
  'ERR_OUT_OF_RANGE',
  'ERR_CRYPTO_INVALID_KEYLEN',
  'ERR_CRYPTO_UNKNOWN_CIPHER',
  'ERR_FEATURE_UNAVAILABLE_ON_PLATFORM',
]);

interface PemKeyPair {
  publicKey: string;
  privateKey: string;
}

/**
 * Key Material Generator.
 *
 * Produces PEM key pairs (SPKI public, unencrypted PKCS#8 private) and encodes
 * both as base64 of the PEM text for storage. The public key is also rendered
 * as an OpenSSH authorized_keys line.
 */
@Injectable()
export class KeyMaterialService {
  async generate(spec: KeySpec): Promise<KeyMaterial> {
    const pair = await this.generatePem(spec);

    return {
      public_key: Buffer.from(pair.publicKey, 'utf8').toString('base64'),
      private_key: Buffer.from(pair.privateKey, 'utf8').toString('base64'),
      public_key_openssh: toOpenSshPublicKey(pair.publicKey),
    };
  }

  private async generatePem(spec: KeySpec): Promise<PemKeyPair> {
    switch (spec.key_type) {
      case 'rsa':
        if (!isRsaKeyBits(spec.key_bits)) {
          throw new PermanentProcessingError(`Unsupported RSA modulus length ${String(spec.key_bits)}`);
        }
        return generateKeyPairAsync('rsa', {
          modulusLength: spec.key_bits,
          publicExponent: RSA_PUBLIC_EXPONENT,
          publicKeyEncoding: { type: 'spki', format: 'pem' },
          privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        });
      case 'ed25519':
        return generateKeyPairAsync('ed25519', {
          publicKeyEncoding: { type: 'spki', format: 'pem' },
          privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        });
    }
  }
}

/**
 * Sorts a generator failure into permanent (bad parameters, will fail again)
 * or transient (resource exhaustion and anything unrecognised; the queue's
 * redelivery and dead-letter limit bound the retries).
 */
export function classifyGenerationError(error: unknown): PermanentProcessingError | TransientInfrastructureError {
  if (error instanceof PermanentProcessingError || error instanceof TransientInfrastructureError) {
    return error;
  }

  const code = errorCode(error);
  if (code && PERMANENT_ERROR_CODES.has(code)) {
    return new PermanentProcessingError(`Key generation rejected parameters: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return new TransientInfrastructureError(`Key generation failed: ${errorMessage(error)}`, { cause: error });
}

// ─── OpenSSH wire encoding (RFC 4253 §6.6, RFC 8709) ─────────────────────

function sshString(data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length, 0);
  return Buffer.concat([length, data]);
}

function sshMpint(unsigned: Buffer): Buffer {
  let start = 0;
  while (start < unsigned.length && unsigned[start] === 0) start++;
  const trimmed = unsigned.subarray(start);
  if (trimmed.length > 0 && (trimmed[0] & 0x80) !== 0) {
    return sshString(Buffer.concat([Buffer.from([0]), trimmed]));
  }
  return sshString(trimmed);
}

function jwkField(value: string | undefined, name: string): Buffer {
  if (!value) {
    throw new PermanentProcessingError(`Public key JWK has no ${name}`);
  }
  return Buffer.from(value, 'base64url');
}

/** Renders an SPKI PEM public key as `ssh-rsa AAAA…` or `ssh-ed25519 AAAA…`. */
export function toOpenSshPublicKey(publicKeyPem: string): string {
  const key = createPublicKey(publicKeyPem);
  const jwk = key.export({ format: 'jwk' });

  switch (key.asymmetricKeyType) {
    case 'rsa': {
      const blob = Buffer.concat([
        sshString(Buffer.from('ssh-rsa')),
        sshMpint(jwkField(jwk.e, 'e')),
        sshMpint(jwkField(jwk.n, 'n')),
      ]);
      return `ssh-rsa ${blob.toString('base64')}`;
    }
    case 'ed25519': {
      const blob = Buffer.concat([
        sshString(Buffer.from('ssh-ed25519')),
        sshString(jwkField(jwk.x, 'x')),
      ]);
      return `ssh-ed25519 ${blob.toString('base64')}`;
    }
    default:
      throw new PermanentProcessingError(
        `No OpenSSH encoding for key type ${String(key.asymmetricKeyType)}`,
      );
  }
}
