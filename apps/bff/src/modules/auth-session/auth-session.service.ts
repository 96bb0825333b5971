import { BadRequestException, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { Ed25519PublicKey, Ed25519Signature } from '@aptos-labs/ts-sdk';
import type { SessionChallengeDto, SessionDto } from '@stakevault/shared/dto/session';

interface ChallengeEntry {
  nonce: string;
  expiresAt: number;
}

interface SessionEntry {
  address: string;
  expiresAt: number;
}

export interface VerifyChallengeParams {
  address: string;
  publicKey: string;
  signature: string;
  fullMessage?: string;
}

export interface VerifiedSession extends SessionDto {
  sessionId: string;
}

const DEFAULT_CHALLENGE_TTL_SECONDS = 5 * 60;
const DEFAULT_SESSION_TTL_SECONDS = 60 * 60;

/**
 * Wallet sign-in. A caller asks for a nonce, signs the challenge with its
 * Ed25519 key and gets back a session bound to the address the key derives.
 */
@Injectable()
export class AuthSessionService {
  private readonly logger = new Logger(AuthSessionService.name);
  private readonly challenges = new Map<string, ChallengeEntry>();
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly challengeTtlMs: number;
  readonly sessionTtlSeconds: number;

  constructor(config: ConfigService) {
    this.challengeTtlMs = config.get<number>('session.challengeTtlSeconds', DEFAULT_CHALLENGE_TTL_SECONDS) * 1000;
    this.sessionTtlSeconds = config.get<number>('session.ttlSeconds', DEFAULT_SESSION_TTL_SECONDS);
  }

  createChallenge(address: string | undefined): SessionChallengeDto {
    const normalizedAddress = this.normalizeAddress(address);
    if (!normalizedAddress) {
      throw new BadRequestException('Invalid account address');
    }

    const nonce = randomUUID();
    this.challenges.set(normalizedAddress, { nonce, expiresAt: Date.now() + this.challengeTtlMs });

    return {
      address: normalizedAddress,
      nonce,
      message: this.buildChallengeMessage(nonce)
    };
  }

  verifyChallenge(params: VerifyChallengeParams): VerifiedSession {
    const normalizedAddress = this.normalizeAddress(params.address);
    if (!normalizedAddress) {
      throw new BadRequestException('Invalid account address');
    }

    const challenge = this.challenges.get(normalizedAddress);
    if (!challenge) {
      throw new UnauthorizedException('Challenge not found or expired');
    }
    if (challenge.expiresAt <= Date.now()) {
      this.challenges.delete(normalizedAddress);
      throw new UnauthorizedException('Challenge expired');
    }

    // wallets may wrap the challenge in their own envelope; the nonce must survive it
    const signedMessage = params.fullMessage ?? this.buildChallengeMessage(challenge.nonce);
    if (!signedMessage.includes(challenge.nonce)) {
      throw new UnauthorizedException('Signed message does not contain the challenge nonce');
    }
    this.verifySignature({
      expectedAddress: normalizedAddress,
      publicKey: params.publicKey,
      signature: params.signature,
      message: signedMessage
    });

    const sessionId = randomUUID();
    const expiresAt = Date.now() + this.sessionTtlSeconds * 1000;
    this.sessions.set(sessionId, { address: normalizedAddress, expiresAt });
    this.challenges.delete(normalizedAddress);
    this.logger.log(`Session opened for ${normalizedAddress}`);

    return { sessionId, address: normalizedAddress, expiresAt: new Date(expiresAt).toISOString() };
  }

  getSession(sessionId: string | null): SessionDto | null {
    if (!sessionId) {
      return null;
    }
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.sessions.delete(sessionId);
      return null;
    }
    return { address: entry.address, expiresAt: new Date(entry.expiresAt).toISOString() };
  }

  /** Address bound to the session; rejects a missing or expired one. */
  requireSessionAddress(sessionId: string | null): string {
    const session = this.getSession(sessionId);
    if (!session) {
      throw new UnauthorizedException('A valid session is required');
    }
    return session.address;
  }

  destroySession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private verifySignature(args: { expectedAddress: string; publicKey: string; signature: string; message: string }): void {
    const { expectedAddress, publicKey, signature, message } = args;

    try {
      const pubKey = new Ed25519PublicKey(publicKey);
      const derivedAddress = pubKey.authKey().derivedAddress().toString().toLowerCase();
      if (derivedAddress !== expectedAddress) {
        throw new UnauthorizedException('Public key does not match address');
      }

      const signatureInstance = new Ed25519Signature(signature);
      const messageBytes = new TextEncoder().encode(message);
      const isValid = pubKey.verifySignature({ message: messageBytes, signature: signatureInstance });
      if (!isValid) {
        throw new UnauthorizedException('Invalid signature for challenge');
      }
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        throw error;
      }
      this.logger.warn(`Signature verification failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new UnauthorizedException('Unable to verify signature');
    }
  }

  private buildChallengeMessage(nonce: string): string {
    return `stakevault login challenge: ${nonce}`;
  }

  private normalizeAddress(address: string | undefined): string {
    if (!address) {
      return '';
    }
    const normalized = address.trim().toLowerCase();
    return /^0x[a-f0-9]{1,64}$/.test(normalized) ? normalized : '';
  }
}
