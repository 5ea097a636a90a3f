export type SessionState = 'unauthenticated' | 'authenticated' | 'expired'

export interface Credentials {
  email: string
  password: string
}

/**
 * A cookie session with the MELCloud Home web API.
 * Expiry is only ever detected reactively, when a request answers 401.
 */
export class Session {
  private currentState: SessionState
  readonly email: string
  readonly authenticatedAt: Date | null

  constructor(email: string, state: SessionState = 'unauthenticated') {
    this.email = email
    this.currentState = state
    this.authenticatedAt = state === 'authenticated' ? new Date() : null
  }

  static unauthenticated(email = ''): Session {
    return new Session(email, 'unauthenticated')
  }

  get state(): SessionState {
    return this.currentState
  }

  get isAuthenticated(): boolean {
    return this.currentState === 'authenticated'
  }

  /**
   * The server rejected this session
   */
  expire(): void {
    if (this.currentState === 'authenticated') {
      this.currentState = 'expired'
    }
  }

  /**
   * Logged out or released on shutdown
   */
  close(): void {
    this.currentState = 'unauthenticated'
  }
}
