import { AppDataSource } from '@config/database'
import { env } from '@config/env'
import { Account } from '@entities/Account'
import { OtpPurpose } from '@entities/OtpCode'
import * as otpService from '@services/otpService'
import { sendOtpSms } from '@services/smsService'
import { issueTokenPair, TokenPair } from '@services/tokenService'
import { BadRequestError, NotFoundError, UnauthorizedError } from '@utils/ResponseError'

const INVALID_OTP_MESSAGE = 'Invalid or expired OTP code'

export interface VerifiedLogin {
  tokens: TokenPair
  account: Account
  isNewUser: boolean
}

export interface AccountUpdates {
  name?: string | null
  nationalId?: string | null
}

/**
 * Issues a code and hands it to the SMS gateway. Login codes are only sent
 * to registered numbers; registration codes only to unregistered ones.
 */
export async function requestOtp(
  phoneNumber: string,
  purpose: OtpPurpose
): Promise<{ expiresInMinutes: number }> {
  const accountRepo = AppDataSource.getRepository(Account)
  const exists = (await accountRepo.count({ where: { phoneNumber } })) > 0

  if (purpose === 'login' && !exists) {
    throw new NotFoundError('Account not found')
  }
  if (purpose === 'register' && exists) {
    throw new BadRequestError('Account with this phone number already exists')
  }

  const { code, otp } = await otpService.createOtp(phoneNumber, purpose)
  try {
    await sendOtpSms(phoneNumber, code)
  } catch (error) {
    // An undelivered code must neither supersede the last delivered one nor
    // count against the rate limit
    await otpService.discardOtp(otp.id)
    throw error
  }

  return { expiresInMinutes: env.otpExpiryMinutes }
}

async function findOrCreateAccount(phoneNumber: string): Promise<{ account: Account; isNewUser: boolean }> {
  const accountRepo = AppDataSource.getRepository(Account)

  const existing = await accountRepo.findOne({ where: { phoneNumber } })
  if (existing) {
    return { account: existing, isNewUser: false }
  }

  const { id } = await accountRepo.save(
    accountRepo.create({ phoneNumber, isPhoneVerified: true })
  )
  const account = await accountRepo.findOneOrFail({ where: { id } })
  return { account, isNewUser: true }
}

export async function verifyOtp(
  phoneNumber: string,
  code: string,
  purpose: OtpPurpose
): Promise<VerifiedLogin> {
  const otp = await otpService.verifyOtp(phoneNumber, code, purpose)
  if (!otp) {
    throw new UnauthorizedError(INVALID_OTP_MESSAGE)
  }

  const accountRepo = AppDataSource.getRepository(Account)
  let account: Account
  let isNewUser = false

  if (purpose === 'register') {
    ({ account, isNewUser } = await findOrCreateAccount(phoneNumber))
  } else {
    const found = await accountRepo.findOne({ where: { phoneNumber } })
    if (!found) {
      throw new UnauthorizedError(INVALID_OTP_MESSAGE)
    }
    account = found
  }

  if (!account.isPhoneVerified) {
    await accountRepo.update(account.id, { isPhoneVerified: true })
    account = await accountRepo.findOneOrFail({ where: { id: account.id } })
  }

  console.log(`[Auth] ${isNewUser ? 'Registered' : 'Logged in'} account ${account.id}`)

  return { tokens: issueTokenPair(account.id), account, isNewUser }
}

export async function getAccount(accountId: number): Promise<Account | null> {
  const accountRepo = AppDataSource.getRepository(Account)
  return accountRepo.findOne({ where: { id: accountId } })
}

export async function updateAccount(
  accountId: number,
  updates: AccountUpdates
): Promise<Account> {
  const accountRepo = AppDataSource.getRepository(Account)

  if (Object.keys(updates).length > 0) {
    await accountRepo.update(accountId, updates)
  }

  const account = await accountRepo.findOneOrFail({
    where: { id: accountId },
  })

  return account
}
