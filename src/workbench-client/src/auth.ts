/**
 * In-memory bearer token holder. The client asks it for a token on every
 * request; without one the request goes out unauthenticated.
 */
export interface TokenStore {
  getToken(): string | null
  setToken(token: string): void
  clearToken(): void
  isAuthenticated(): boolean
}

export function createTokenStore(initial: string | null = null): TokenStore {
  let token = initial

  return {
    getToken: () => token,
    setToken(next) {
      token = next.trim() || null
    },
    clearToken() {
      token = null
    },
    isAuthenticated: () => token !== null,
  }
}
