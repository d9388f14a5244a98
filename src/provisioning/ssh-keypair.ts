import { generateKeyPairSync } from 'crypto';

export interface SshKeyPair {
  /** PEM encoded (PKCS#1) private key */
  privateKey: string;
  /** OpenSSH authorized_keys line */
  publicKey: string;
}

export type KeyPairGenerator = (comment: string) => SshKeyPair;

/**
 * Generates an RSA keypair for a single build and renders the public half in OpenSSH format.
 */
export function generateSshKeyPair(comment: string, modulusLength = 2048): SshKeyPair {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength });

  const jwk = publicKey.export({ format: 'jwk' });
  if (!jwk.n || !jwk.e) {
    throw new Error('Generated RSA key is missing its modulus or exponent');
  }

  const blob = Buffer.concat([
    sshString(Buffer.from('ssh-rsa')),
    sshString(mpint(Buffer.from(jwk.e, 'base64url'))),
    sshString(mpint(Buffer.from(jwk.n, 'base64url')))
  ]);

  return {
    privateKey: privateKey.export({ type: 'pkcs1', format: 'pem' }).toString(),
    publicKey: `ssh-rsa ${blob.toString('base64')} ${comment}`
  };
}

function sshString(data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  return Buffer.concat([length, data]);
}

// mpints are two's complement, so a set high bit needs a leading zero byte
function mpint(data: Buffer): Buffer {
  return data.length > 0 && (data[0] ?? 0) & 0x80 ? Buffer.concat([Buffer.from([0]), data]) : data;
}
