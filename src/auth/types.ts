export interface Credentials {
  accessToken: string
  refreshToken?: string
  /**
   * Epoch milliseconds when the access token expires.
   */
  expiresAt: number
  scopes: string[]
}

export interface ClientSecrets {
  clientId: string
  clientSecret: string
}
