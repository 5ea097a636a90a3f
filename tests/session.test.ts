import { describe, expect, it } from 'vitest'
import { Session } from '../src/session.js'

describe('Session', () => {
  it('should start unauthenticated', () => {
    const session = Session.unauthenticated('test@example.com')

    expect(session.state).toBe('unauthenticated')
    expect(session.isAuthenticated).toBe(false)
    expect(session.authenticatedAt).toBeNull()
  })

  it('should record when it was authenticated', () => {
    const session = new Session('test@example.com', 'authenticated')

    expect(session.isAuthenticated).toBe(true)
    expect(session.authenticatedAt).toBeInstanceOf(Date)
  })

  it('should expire only an authenticated session', () => {
    const authenticated = new Session('test@example.com', 'authenticated')
    const unauthenticated = Session.unauthenticated('test@example.com')

    authenticated.expire()
    unauthenticated.expire()

    expect(authenticated.state).toBe('expired')
    expect(unauthenticated.state).toBe('unauthenticated')
  })

  it('should be unauthenticated after close', () => {
    const session = new Session('test@example.com', 'authenticated')
    session.expire()

    session.close()

    expect(session.state).toBe('unauthenticated')
  })
})
