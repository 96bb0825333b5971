import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Ed25519PrivateKey } from '@aptos-labs/ts-sdk';
import { AuthSessionService } from '../src/modules/auth-session/auth-session.service.js';

describe('AuthSessionService', () => {
  let service: AuthSessionService;

  beforeEach(() => {
    service = new AuthSessionService(new ConfigService({ session: { ttlSeconds: 60, challengeTtlSeconds: 30 } }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates challenge and verifies session with a valid signature', () => {
    const privateKey = Ed25519PrivateKey.generate();
    const publicKey = privateKey.publicKey();
    const address = publicKey.authKey().derivedAddress().toString();

    const challenge = service.createChallenge(address);
    expect(challenge.address).toBe(address);
    expect(challenge.message).toBe(`stakevault login challenge: ${challenge.nonce}`);

    const signature = privateKey.sign(challenge.message);
    const result = service.verifyChallenge({
      address,
      publicKey: publicKey.toString(),
      signature: signature.toString()
    });

    expect(result.address).toBe(address);
    expect(service.requireSessionAddress(result.sessionId)).toBe(address);
    expect(service.getSession(result.sessionId)?.expiresAt).toBe(result.expiresAt);
  });

  it('consumes the challenge once verified', () => {
    const privateKey = Ed25519PrivateKey.generate();
    const publicKey = privateKey.publicKey();
    const address = publicKey.authKey().derivedAddress().toString();
    const challenge = service.createChallenge(address);
    const params = {
      address,
      publicKey: publicKey.toString(),
      signature: privateKey.sign(challenge.message).toString()
    };

    service.verifyChallenge(params);
    expect(() => service.verifyChallenge(params)).toThrow('Challenge not found or expired');
  });

  it('throws when verifying with an invalid signature', () => {
    const privateKey = Ed25519PrivateKey.generate();
    const publicKey = privateKey.publicKey();
    const address = publicKey.authKey().derivedAddress().toString();

    service.createChallenge(address);

    expect(() =>
      service.verifyChallenge({
        address,
        publicKey: publicKey.toString(),
        signature: `0x${'00'.repeat(64)}`
      })
    ).toThrow(UnauthorizedException);
  });

  it('rejects a key that does not derive the claimed address', () => {
    const privateKey = Ed25519PrivateKey.generate();
    const other = Ed25519PrivateKey.generate().publicKey();
    const address = privateKey.publicKey().authKey().derivedAddress().toString();
    const challenge = service.createChallenge(address);

    expect(() =>
      service.verifyChallenge({
        address,
        publicKey: other.toString(),
        signature: privateKey.sign(challenge.message).toString()
      })
    ).toThrow('Public key does not match address');
  });

  it('expires sessions after their ttl', () => {
    const privateKey = Ed25519PrivateKey.generate();
    const publicKey = privateKey.publicKey();
    const address = publicKey.authKey().derivedAddress().toString();
    const challenge = service.createChallenge(address);
    const { sessionId } = service.verifyChallenge({
      address,
      publicKey: publicKey.toString(),
      signature: privateKey.sign(challenge.message).toString()
    });

    const now = Date.now();
    jest.spyOn(Date, 'now').mockReturnValue(now + 61_000);
    expect(service.getSession(sessionId)).toBeNull();
    expect(() => service.requireSessionAddress(sessionId)).toThrow(UnauthorizedException);
  });

  it('throws for invalid address input', () => {
    expect(() => service.createChallenge('not-an-address')).toThrow(BadRequestException);
    expect(() => service.requireSessionAddress(null)).toThrow(UnauthorizedException);
  });
});
