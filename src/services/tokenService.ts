import jwt from 'jsonwebtoken'
import { z } from 'zod'
import { env } from '@config/env'
import { UnauthorizedError } from '@utils/ResponseError'

export type TokenType = 'access' | 'refresh'

export interface TokenPair {
  access: string
  refresh: string
}

const tokenPayloadSchema = z.object({
  accountId: z.number().int().positive(),
  type: z.enum(['access', 'refresh']),
})

function signToken(accountId: number, type: TokenType): string {
  return jwt.sign(
    { accountId, type },
    env.secretKey,
    {
      algorithm: 'HS256',
      expiresIn: type === 'access' ? env.accessTokenLifetime : env.refreshTokenLifetime,
    }
  )
}

export function issueTokenPair(accountId: number): TokenPair {
  return {
    access: signToken(accountId, 'access'),
    refresh: signToken(accountId, 'refresh'),
  }
}

/**
 * Verifies signature, expiry and token type. Any failure surfaces as a
 * 401 so callers never distinguish a forged token from an expired one.
 */
export function verifyToken(token: string, type: TokenType): { accountId: number } {
  let decoded: string | jwt.JwtPayload
  try {
    decoded = jwt.verify(token, env.secretKey, { algorithms: ['HS256'] })
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      throw new UnauthorizedError('Invalid token')
    }
    throw error
  }

  const payload = tokenPayloadSchema.safeParse(decoded)
  if (!payload.success || payload.data.type !== type) {
    throw new UnauthorizedError('Invalid token')
  }

  return { accountId: payload.data.accountId }
}

export function refreshAccessToken(refreshToken: string): { access: string } {
  const { accountId } = verifyToken(refreshToken, 'refresh')
  return { access: signToken(accountId, 'access') }
}
