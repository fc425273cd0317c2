/** First-step response: the token plus the slice of the shared key it expects back. */
export interface AuthChallenge {
  token: string;
  keyOffset: number;
  keyLength: number;
}

export interface AuthConfirmation {
  areaId: string | null;
}

export interface AuthHandshakePort {
  requestChallenge(): Promise<AuthChallenge>;
  confirm(challenge: AuthChallenge, partialKey: string): Promise<AuthConfirmation>;
}
