import { z } from 'zod'
import { endpoint, endpointAuth, noInput } from '@middleware/endpoint'
import { Account } from '@entities/Account'
import { OTP_PURPOSES } from '@entities/OtpCode'
import * as authService from '@services/authService'
import { refreshAccessToken } from '@services/tokenService'
import { NotFoundError } from '@utils/ResponseError'
import { phoneNumberSchema } from '@utils/phoneNumber'

function toAccountResponse(account: Account) {
  return {
    id: account.id,
    phone_number: account.phoneNumber,
    name: account.name,
    national_id: account.nationalId,
    is_phone_verified: account.isPhoneVerified,
    created_at: account.createdAt,
    updated_at: account.updatedAt,
  }
}

const purposeSchema = z.enum(OTP_PURPOSES)

export const requestOtp = endpoint(
  async (req) => {
    const { phone_number, purpose } = req.body
    const { expiresInMinutes } = await authService.requestOtp(phone_number, purpose)
    return {
      message: 'OTP code has been sent to your phone number',
      expires_in_minutes: expiresInMinutes,
    }
  },
  z.object({
    body: z.object({
      phone_number: phoneNumberSchema,
      purpose: purposeSchema,
    }),
  })
)

export const verifyOtp = endpoint(
  async (req) => {
    const { phone_number, code, purpose } = req.body
    const result = await authService.verifyOtp(phone_number, code, purpose)
    return {
      access: result.tokens.access,
      refresh: result.tokens.refresh,
      user: toAccountResponse(result.account),
      is_new_user: result.isNewUser,
    }
  },
  z.object({
    body: z.object({
      phone_number: phoneNumberSchema,
      code: z.string().regex(/^\d{1,10}$/, 'OTP code must contain only digits'),
      purpose: purposeSchema,
    }),
  })
)

export const refreshToken = endpoint(
  async (req) => refreshAccessToken(req.body.refresh),
  z.object({
    body: z.object({
      refresh: z.string().min(1),
    }),
  })
)

export const getProfile = endpointAuth(async (req) => {
  const account = await authService.getAccount(req.auth.accountId)
  if (!account) {
    throw new NotFoundError('Account not found')
  }
  return toAccountResponse(account)
}, noInput)

// Unknown and read-only keys (phone_number, is_phone_verified, ...) are stripped
export const updateProfile = endpointAuth(
  async (req) => {
    const { name, national_id } = req.body
    const account = await authService.updateAccount(req.auth.accountId, {
      ...(name !== undefined && { name }),
      ...(national_id !== undefined && { nationalId: national_id }),
    })
    return toAccountResponse(account)
  },
  z.object({
    body: z.object({
      name: z.string().trim().max(100).nullable().optional(),
      national_id: z
        .string()
        .regex(/^\d{10}$/, 'National ID must be exactly 10 digits')
        .nullable()
        .optional(),
    }),
  })
)
