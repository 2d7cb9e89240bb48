import rateLimit from 'express-rate-limit'
import { env } from '@config/env'
import { TooManyRequestsError } from '@utils/ResponseError'

export interface IpRateLimitOptions {
  limit: number
  windowMinutes: number
}

/** Per-client-IP cap on OTP requests; the per-phone cap lives in otpService. */
export function createOtpIpLimiter({ limit, windowMinutes }: IpRateLimitOptions) {
  return rateLimit({
    windowMs: windowMinutes * 60 * 1000,
    limit,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res, next) => {
      next(new TooManyRequestsError('Too many OTP requests. Please try again later.'))
    },
  })
}

export const otpIpLimiter = createOtpIpLimiter({
  limit: env.otpIpRateLimitCount,
  windowMinutes: env.otpRateLimitMinutes,
})
