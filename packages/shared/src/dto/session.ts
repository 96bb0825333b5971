export interface SessionChallengeDto {
  address: string;
  nonce: string;
  message: string;
}

export interface SessionDto {
  address: string;
  expiresAt: string; // ISO
}
