export interface PaymentTokenStorePort {
  save(tokenId: string, expiresAt: number): Promise<void>;
  has(tokenId: string): Promise<boolean>;
  /**
   * Returns false when the token was already gone.
   */
  delete(tokenId: string): Promise<boolean>;
  withTokenLock<TOutput>(key: string, operation: () => Promise<TOutput>): Promise<TOutput>;
}
