/**
 * A value that decides its own expiry, e.g. a token carrying its deadline.
 */
export interface CanExpire {
  isExpired(): boolean
}
