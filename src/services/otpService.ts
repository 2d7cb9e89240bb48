import { randomInt } from 'crypto'
import bcrypt from 'bcryptjs'
import { EntityManager, LessThan } from 'typeorm'
import { AppDataSource } from '@config/database'
import { env } from '@config/env'
import { OtpCode, OtpPurpose } from '@entities/OtpCode'
import { TooManyRequestsError } from '@utils/ResponseError'

// Compared against when no candidate record exists, so a missing code costs
// the same bcrypt work as a wrong one.
let dummyHash: Promise<string> | null = null

function getDummyHash(): Promise<string> {
  if (!dummyHash) {
    dummyHash = bcrypt.hash('0'.repeat(env.otpCodeLength), env.otpHashRounds).catch((error: unknown) => {
      dummyHash = null
      throw error
    })
  }
  return dummyHash
}

export function generateOtpCode(length: number = env.otpCodeLength): string {
  let code = ''
  for (let i = 0; i < length; i++) {
    code += randomInt(0, 10).toString()
  }
  return code
}

// Tail of the issue queue for each phone number in this process
const issueQueues = new Map<string, Promise<void>>()

function serializePerPhone<T>(phoneNumber: string, task: () => Promise<T>): Promise<T> {
  const previous = issueQueues.get(phoneNumber) ?? Promise.resolve()
  const run = previous.then(task)
  const settled = run.then(() => undefined, () => undefined)
  issueQueues.set(phoneNumber, settled)
  void settled.then(() => {
    if (issueQueues.get(phoneNumber) === settled) {
      issueQueues.delete(phoneNumber)
    }
  })
  return run
}

// Other API instances are held off by a transaction-scoped advisory lock
function withPhoneLock<T>(
  phoneNumber: string,
  work: (manager: EntityManager) => Promise<T>
): Promise<T> {
  return serializePerPhone(phoneNumber, () => {
    if (AppDataSource.options.type !== 'postgres') {
      return work(AppDataSource.manager)
    }
    return AppDataSource.transaction(async manager => {
      await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [phoneNumber])
      return work(manager)
    })
  })
}

async function assertWithinRateLimit(manager: EntityManager, phoneNumber: string): Promise<void> {
  const otpRepo = manager.getRepository(OtpCode)
  const since = new Date(Date.now() - env.otpRateLimitMinutes * 60 * 1000)

  const recent = await otpRepo.find({
    where: { phoneNumber },
    order: { createdAt: 'DESC', id: 'DESC' },
    take: env.otpRateLimitCount,
  })

  const inWindow = recent.filter(otp => otp.createdAt.getTime() >= since.getTime())

  if (inWindow.length >= env.otpRateLimitCount) {
    throw new TooManyRequestsError('Too many OTP requests. Please try again later.')
  }
}

/**
 * Stores a hashed code for the phone number and returns the plaintext for
 * delivery. The rate-limit check and the insert run under a per-phone lock.
 * Earlier codes for the same purpose stay in the table but are superseded:
 * verification only ever looks at the newest one.
 */
export async function createOtp(
  phoneNumber: string,
  purpose: OtpPurpose
): Promise<{ code: string; otp: OtpCode }> {
  const code = generateOtpCode()
  const codeHash = await bcrypt.hash(code, env.otpHashRounds)

  const otp = await withPhoneLock(phoneNumber, async manager => {
    await assertWithinRateLimit(manager, phoneNumber)

    const otpRepo = manager.getRepository(OtpCode)
    return otpRepo.save(
      otpRepo.create({
        phoneNumber,
        codeHash,
        purpose,
        expiresAt: new Date(Date.now() + env.otpExpiryMinutes * 60 * 1000),
      })
    )
  })

  console.log(`[OTP] Issued ${purpose} code for ${phoneNumber}, expires ${otp.expiresAt.toISOString()}`)

  return { code, otp }
}

/** Removes a code that never reached the user. */
export async function discardOtp(id: number): Promise<void> {
  await AppDataSource.getRepository(OtpCode).delete({ id })
  console.log(`[OTP] Discarded undelivered code ${id}`)
}

export async function verifyOtp(
  phoneNumber: string,
  code: string,
  purpose: OtpPurpose
): Promise<OtpCode | null> {
  const otpRepo = AppDataSource.getRepository(OtpCode)

  // Newest code regardless of state; once it is used, older ones stay dead
  const otp = await otpRepo.findOne({
    where: { phoneNumber, purpose },
    order: { createdAt: 'DESC', id: 'DESC' },
  })

  const matches = await bcrypt.compare(code, otp ? otp.codeHash : await getDummyHash())

  if (!otp || !matches || otp.consumed || otp.isExpired()) {
    return null
  }

  // Only one of several concurrent verifications can flip the flag
  const consumedAt = new Date()
  const result = await otpRepo.update(
    { id: otp.id, consumed: false },
    { consumed: true, consumedAt }
  )

  if (result.affected !== 1) {
    return null
  }

  otp.consumed = true
  otp.consumedAt = consumedAt
  return otp
}

export async function cleanupExpiredOtps(): Promise<number> {
  const otpRepo = AppDataSource.getRepository(OtpCode)
  const result = await otpRepo.delete({ expiresAt: LessThan(new Date()) })
  return result.affected ?? 0
}
