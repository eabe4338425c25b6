export type TokenType = 'access' | 'refresh';

export interface TokenPayload {
  sub: string;
  email: string;
  isStaff: boolean;
  tokenType: TokenType;
}

export interface TokenPair {
  access: string;
  refresh: string;
}
