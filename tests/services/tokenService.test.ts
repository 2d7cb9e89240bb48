import jwt from 'jsonwebtoken'
import { issueTokenPair, refreshAccessToken, verifyToken } from '@services/tokenService'
import { UnauthorizedError } from '@utils/ResponseError'

describe('Token Service', () => {
  it('issues an access and a refresh token for the account', () => {
    const { access, refresh } = issueTokenPair(42)

    expect(verifyToken(access, 'access')).toEqual({ accountId: 42 })
    expect(verifyToken(refresh, 'refresh')).toEqual({ accountId: 42 })
  })

  it('signs tokens with the configured lifetimes', () => {
    const { access, refresh } = issueTokenPair(7)

    const accessPayload = jwt.decode(access, { json: true })
    const refreshPayload = jwt.decode(refresh, { json: true })

    expect(accessPayload).toMatchObject({ accountId: 7, type: 'access' })
    expect(refreshPayload).toMatchObject({ accountId: 7, type: 'refresh' })
    expect((accessPayload?.exp ?? 0) - (accessPayload?.iat ?? 0)).toBe(3600)
    expect((refreshPayload?.exp ?? 0) - (refreshPayload?.iat ?? 0)).toBe(604800)
  })

  it('rejects a token of the wrong type', () => {
    const { access, refresh } = issueTokenPair(1)

    expect(() => verifyToken(refresh, 'access')).toThrow(UnauthorizedError)
    expect(() => verifyToken(access, 'refresh')).toThrow(UnauthorizedError)
  })

  it('rejects a token signed with another key', () => {
    const forged = jwt.sign({ accountId: 1, type: 'access' }, 'other-secret')

    expect(() => verifyToken(forged, 'access')).toThrow('Invalid token')
  })

  it('rejects an expired token', () => {
    const expired = jwt.sign(
      { accountId: 1, type: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
      'test-secret'
    )

    expect(() => verifyToken(expired, 'access')).toThrow(UnauthorizedError)
  })

  it('rejects a token without the expected claims', () => {
    const foreign = jwt.sign({ userId: 'abc' }, 'test-secret')

    expect(() => verifyToken(foreign, 'access')).toThrow(UnauthorizedError)
  })

  it('rejects garbage', () => {
    expect(() => verifyToken('not-a-jwt', 'access')).toThrow(UnauthorizedError)
  })

  it('refreshes into a valid access token for the same account', () => {
    const { refresh } = issueTokenPair(9)

    const { access } = refreshAccessToken(refresh)

    expect(verifyToken(access, 'access')).toEqual({ accountId: 9 })
  })

  it('does not refresh from an access token', () => {
    const { access } = issueTokenPair(9)

    expect(() => refreshAccessToken(access)).toThrow(UnauthorizedError)
  })
})
